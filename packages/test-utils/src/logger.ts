import type { LogLevel, WardenLogger } from "@pgwarden/core";

export interface LogEntry {
	level: LogLevel;
	message: string;
	data?: Record<string, unknown>;
}

export interface CapturingLogger extends WardenLogger {
	readonly entries: readonly LogEntry[];
	/** Entries at `level`, or all of them. */
	find(level?: LogLevel): LogEntry[];
	clear(): void;
}

/** Keeps every call in memory instead of writing it. */
export function createCapturingLogger(): CapturingLogger {
	const entries: LogEntry[] = [];
	const record = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		entries.push(data === undefined ? { level, message } : { level, message, data });
	};

	return {
		entries,
		debug: record("debug"),
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
		find: (level) => (level ? entries.filter((entry) => entry.level === level) : [...entries]),
		clear: () => {
			entries.length = 0;
		},
	};
}
