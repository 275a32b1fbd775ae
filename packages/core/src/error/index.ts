import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";
import { classifyDriverError } from "./driver.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";
export { classifyDriverError, type DriverErrorDetails } from "./driver.js";

export type WardenErrorCode = BaseErrorCode;

export class WardenError extends Error {
	readonly code: WardenErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the failure came from the database rather than from the input.
	 * Transient failures are the only ones the façade reports as `null`.
	 */
	readonly transient: boolean;

	constructor(
		code: WardenErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		const raw = BASE_ERROR_CODES[code];
		this.code = code;
		this.status = raw.status;
		this.transient = raw.transient;
		this.details = options?.details;
		this.name = "WardenError";
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			status: this.status,
			details: this.details,
		};
	}

	static fromCode(
		code: WardenErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): WardenError {
		return new WardenError(code, options?.message ?? BASE_ERROR_CODES[code].message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	static securityViolation(message = "Security violation", details?: Record<string, unknown>) {
		return new WardenError("SECURITY_VIOLATION", message, { details });
	}

	static validation(message = "Invalid input", details?: Record<string, unknown>) {
		return new WardenError("VALIDATION_ERROR", message, { details });
	}

	static invalidConfig(message = "Invalid configuration") {
		return new WardenError("INVALID_CONFIG", message);
	}

	static notInitialized(message: string = BASE_ERROR_CODES.NOT_INITIALIZED.message) {
		return new WardenError("NOT_INITIALIZED", message);
	}

	static transient(
		message = "Database operation failed",
		cause?: unknown,
		details?: Record<string, unknown>,
	) {
		return new WardenError("TRANSIENT_FAILURE", message, { cause, details });
	}
}

export function isWardenError(error: unknown, code?: WardenErrorCode): error is WardenError {
	return error instanceof WardenError && (code === undefined || error.code === code);
}

/**
 * Normalize anything thrown during a database call into a WardenError.
 * WardenErrors pass through; everything else is a transient driver failure.
 */
export function toWardenError(error: unknown): WardenError {
	if (error instanceof WardenError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return WardenError.transient(message, error, driverDetails(error));
}

function driverDetails(error: unknown): Record<string, unknown> {
	const details = classifyDriverError(error);
	const out: Record<string, unknown> = { kind: details.kind };
	if (details.sqlState) out.sqlState = details.sqlState;
	if (details.constraint) out.constraint = details.constraint;
	if (details.table) out.table = details.table;
	if (details.column) out.column = details.column;
	return out;
}

