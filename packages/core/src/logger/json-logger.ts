// =============================================================================
// JSON LOGGER — one JSON object per line, for log shippers
// =============================================================================

import stringify from "safe-stable-stringify";
import type { LogLevel, WardenLogger } from "../types/config.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export type LogSink = (line: string, level: LogLevel) => void;

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Value of the `service` field. Default: `"pgwarden"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]". Default: common credential/PII keys */
	redactKeys?: string[];
	/** Where lines go. Default: stderr for warn/error, stdout otherwise */
	sink?: LogSink;
}

const defaultSink: LogSink = (line, level) => {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
};

/**
 * Create a structured JSON logger.
 *
 * Data fields are merged into the top-level object; `timestamp`, `level`,
 * `service` and `message` always win over data keys of the same name.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): WardenLogger {
	const { level = "info", service = "pgwarden", sink = defaultSink } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			...redactData(data, redactKeys),
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
		};

		// bigint and circular values must not take the process down
		const line = stringify(entry) ?? "{}";
		sink(line, lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
