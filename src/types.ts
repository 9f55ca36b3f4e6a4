/**
 * Type definitions and interfaces for loopscope
 */

import type { Attributes, SpanOptions, SpanStatus } from "@opentelemetry/api";

/**
 * Lifecycle of a job. Transitions only move forward:
 * created -> running -> completed | failed | cancelled,
 * or created -> cancelled when cancelled before a worker picks it up.
 */
export const JobState = {
	Created: "created",
	Running: "running",
	Completed: "completed",
	Failed: "failed",
	Cancelled: "cancelled",
} as const;

export type JobState = (typeof JobState)[keyof typeof JobState];

export type TerminalJobState =
	| typeof JobState.Completed
	| typeof JobState.Failed
	| typeof JobState.Cancelled;

/**
 * How a job was created. `submit` jobs come straight from a pool,
 * `launch` and `async` jobs from a scope.
 */
export type JobKind = "submit" | "launch" | "async";

/**
 * A zero-argument unit of work posted to an execution context.
 * If it returns a promise or other thenable, a rejection is reported like a
 * throw; the loop does not wait for it before taking the next continuation.
 */
export type Continuation = () => unknown;

/**
 * Handed to every background closure. The closure polls it to honour
 * cooperative cancellation.
 */
export interface JobContext {
	readonly jobId: number;
	/** Aborts with the job's CancellationError when the job is cancelled. */
	readonly signal: AbortSignal;
	/** False once the job reached a terminal state. */
	readonly isActive: boolean;
	/** Throws the job's CancellationError if it was cancelled. */
	ensureActive(): void;
}

/**
 * Background work executed by a dispatcher pool.
 */
export type Closure<T> = (ctx: JobContext) => T | Promise<T>;

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface for structured logging.
 * Compatible with console, pino, winston and similar loggers.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/** Cancels a timer created by a Clock. Calling it twice is harmless. */
export type CancelTimer = () => void;

/**
 * Time source used for delayed posts and timeouts.
 */
export interface Clock {
	/** Monotonic milliseconds. */
	now(): number;
	setTimer(callback: () => void, delayMs: number): CancelTimer;
}

/**
 * The subset of an OpenTelemetry span used for job tracing.
 */
export interface JobSpan {
	setAttributes(attributes: Attributes): unknown;
	setStatus(status: SpanStatus): unknown;
	recordException(exception: Error): void;
	end(): void;
}

/**
 * The subset of an OpenTelemetry tracer used for job tracing.
 * A tracer from `trace.getTracer()` satisfies it.
 */
export interface JobTracer {
	startSpan(name: string, options?: SpanOptions): JobSpan;
}

/**
 * Snapshot of dispatcher pool counters.
 */
export interface PoolStats {
	readonly workers: number;
	/** Closures currently executing. */
	readonly active: number;
	/** Jobs waiting for a worker. */
	readonly queued: number;
	/** Closures that ran to an end, whatever the outcome. */
	readonly completed: number;
	/** Highest value `active` has reached. */
	readonly peakActive: number;
}
