// =============================================================================
// DRIVER ERROR CLASSIFICATION
// =============================================================================
// pg surfaces server errors with the SQLSTATE in `code` plus optional
// `constraint`, `table` and `column` fields. Only those fields are kept;
// the server's `detail` text can echo row values and is dropped.

export type DriverErrorKind =
	| "unique_violation"
	| "foreign_key_violation"
	| "not_null_violation"
	| "check_violation"
	| "query_canceled"
	| "connection_failure"
	| "unknown";

export interface DriverErrorDetails {
	kind: DriverErrorKind;
	sqlState?: string;
	constraint?: string;
	table?: string;
	column?: string;
}

const SQLSTATE_KINDS: Record<string, DriverErrorKind> = {
	"23505": "unique_violation",
	"23503": "foreign_key_violation",
	"23502": "not_null_violation",
	"23514": "check_violation",
	// statement_timeout and pg_cancel_backend
	"57014": "query_canceled",
};

// Socket-level errors raised by Node before any SQLSTATE exists
const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE"]);

function readString(source: object, key: string): string | undefined {
	const value: unknown = Reflect.get(source, key);
	return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function classifyDriverError(error: unknown): DriverErrorDetails {
	if (!error || typeof error !== "object") {
		return { kind: "unknown" };
	}

	const code = readString(error, "code");
	const details: DriverErrorDetails = { kind: "unknown" };

	if (code && CONNECTION_ERROR_CODES.has(code)) {
		details.kind = "connection_failure";
		return details;
	}

	if (code && /^[0-9A-Z]{5}$/.test(code)) {
		details.sqlState = code;
		// Class 08: connection exception
		details.kind = SQLSTATE_KINDS[code] ?? (code.startsWith("08") ? "connection_failure" : "unknown");
	}

	const constraint = readString(error, "constraint");
	const table = readString(error, "table");
	const column = readString(error, "column");
	if (constraint) details.constraint = constraint;
	if (table) details.table = table;
	if (column) details.column = column;

	return details;
}
