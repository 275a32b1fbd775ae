import type { LogFormat, LogLevel, WardenLogger } from "../types/config.js";
import { createConsoleLogger } from "./console-logger.js";
import { createJsonLogger } from "./json-logger.js";

export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions, type LogSink } from "./json-logger.js";
export { isLogLevel, LEVEL_PRIORITY } from "./levels.js";
export { buildRedactKeys, REDACTED, redactData } from "./redact.js";

const noop = () => {};

/** Discards everything. */
export const silentLogger: WardenLogger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

/** Pick the logger implementation for a configured format. */
export function createLogger(
	options: { level?: LogLevel; format?: LogFormat; prefix?: string } = {},
): WardenLogger {
	if (options.format === "json") {
		return createJsonLogger({ level: options.level, service: options.prefix });
	}
	return createConsoleLogger({ level: options.level, prefix: options.prefix });
}

/**
 * Derive a logger whose messages carry a fixed scope, e.g. `[db] Pool created`.
 */
export function scopeLogger(base: WardenLogger, scope: string): WardenLogger {
	return {
		debug: (message, data) => base.debug(`[${scope}] ${message}`, data),
		info: (message, data) => base.info(`[${scope}] ${message}`, data),
		warn: (message, data) => base.warn(`[${scope}] ${message}`, data),
		error: (message, data) => base.error(`[${scope}] ${message}`, data),
	};
}
