/**
 * Logger utilities for loopscope
 */

import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Console logger that prefixes every line with the owner's name
 * and drops messages below the configured level.
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly threshold: number;

	constructor(name: string, level: LogLevel = "info") {
		this.prefix = `[${name}]`;
		this.threshold = LEVELS[level];
	}

	isEnabled(level: LogLevel): boolean {
		return LEVELS[level] >= this.threshold;
	}

	/** Write through the console method named after the level. */
	log(level: LogLevel, message: string, ...args: unknown[]): void {
		if (!this.isEnabled(level)) return;
		console[level](`${this.prefix} ${message}`, ...args);
	}

	debug(message: string, ...args: unknown[]): void {
		this.log("debug", message, ...args);
	}

	info(message: string, ...args: unknown[]): void {
		this.log("info", message, ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.log("warn", message, ...args);
	}

	error(message: string, ...args: unknown[]): void {
		this.log("error", message, ...args);
	}
}

/**
 * Logger that discards everything.
 */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Pick the logger for a context, pool or scope.
 *
 * An explicit logger wins. Otherwise a ConsoleLogger at the given level,
 * "error" when none is given.
 */
export function createLogger(
	name: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	return new ConsoleLogger(name, level ?? "error");
}
