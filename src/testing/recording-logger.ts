/**
 * Logger that keeps every entry for assertions.
 */

import type { Logger, LogLevel } from "../types.js";

export interface LogEntry {
	level: LogLevel;
	message: string;
	args: unknown[];
}

export interface RecordingLogger extends Logger {
	readonly entries: LogEntry[];
	/** Entries of one level, in order. */
	at(level: LogLevel): LogEntry[];
}

export function createRecordingLogger(): RecordingLogger {
	const entries: LogEntry[] = [];
	const record =
		(level: LogLevel) =>
		(message: string, ...args: unknown[]): void => {
			entries.push({ level, message, args });
		};

	return {
		entries,
		at: (level) => entries.filter((entry) => entry.level === level),
		debug: record("debug"),
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
	};
}
