/**
 * Built-in error classes for loopscope
 */

/**
 * ClosureError - wraps a non-Error value thrown by a background closure.
 *
 * Errors that already are `Error` instances are stored untouched, so custom
 * error classes survive the trip back to the awaiting context.
 */
export class ClosureError extends Error {
	readonly _tag = "ClosureError" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ClosureError";
	}
}

/**
 * CancellationError - the abort reason of a cancelled job.
 *
 * Thrown by `JobContext.ensureActive()` inside the closure and by
 * `DeferredJob.await()` for a job that ended cancelled.
 */
export class CancellationError extends Error {
	readonly _tag: "CancellationError" | "TimeoutError" = "CancellationError";

	constructor(message = "job cancelled", options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CancellationError";
	}
}

/**
 * TimeoutError - a job lost the race against its deadline.
 */
export class TimeoutError extends CancellationError {
	readonly _tag = "TimeoutError" as const;
	readonly timeoutMs: number;

	constructor(timeoutMs: number, jobName?: string) {
		super(
			jobName
				? `${jobName} timed out after ${timeoutMs}ms`
				: `timeout after ${timeoutMs}ms`,
		);
		this.name = "TimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

/**
 * RejectedSubmissionError - work was refused before it was queued.
 *
 * Raised when the pool is shut down or full, or the scope is cancelled
 * or closed.
 */
export class RejectedSubmissionError extends Error {
	readonly _tag = "RejectedSubmissionError" as const;

	constructor(message: string) {
		super(message);
		this.name = "RejectedSubmissionError";
	}
}

/**
 * Normalize a thrown value into an Error without losing custom classes.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value;
	return new ClosureError(
		typeof value === "string" ? value : "closure threw a non-Error value",
		{ cause: value },
	);
}
