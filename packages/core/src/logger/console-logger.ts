// =============================================================================
// CONSOLE LOGGER — Human-readable WardenLogger backed by console.*
// =============================================================================

import type { LogLevel, WardenLogger } from "../types/config.js";
import { bold, cyan, dim, gray, red, yellow } from "./colors.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: gray,
	info: cyan,
	warn: yellow,
	error: red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"pgwarden"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys whose values are replaced with "[REDACTED]". Default: common credential/PII keys */
	redactKeys?: string[];
}

/**
 * Create a console-based logger.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@pgwarden/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug", prefix: "db" });
 * logger.info("Pool created", { min: 10, max: 50 });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): WardenLogger {
	const { level = "info", prefix = "pgwarden", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(dim(new Date().toISOString()));
		}
		parts.push(LEVEL_COLOR[lvl](bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";

		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
