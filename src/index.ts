/**
 * loopscope - Cooperative main-context loop with structured background work
 *
 * Provides an ExecutionContext (an ordered mailbox drained by a cooperative
 * loop), a bounded DispatcherPool for background closures, and Scopes that
 * tie jobs to a lifetime with cancellation and result delivery.
 */

export { systemClock } from "./clock.js";
export {
	type ContextErrorSink,
	ExecutionContext,
	type ExecutionContextOptions,
	type StopOptions,
} from "./context.js";
export {
	CancellationError,
	ClosureError,
	RejectedSubmissionError,
	TimeoutError,
	toError,
} from "./errors.js";
export { scope } from "./factory.js";
export {
	type CompletionHandler,
	DeferredJob,
	Job,
	type JobOptions,
} from "./job.js";
export { ConsoleLogger, createLogger, NoOpLogger } from "./logger.js";
export {
	type Delivery,
	DispatcherPool,
	type DispatcherPoolOptions,
	type SubmitOptions,
} from "./pool.js";
export {
	type AsyncOptions,
	type CloseOptions,
	type LaunchOptions,
	Scope,
	type ScopeErrorHandler,
	type ScopeHooks,
	type ScopeOptions,
} from "./scope.js";
export { TaskQueue } from "./task-queue.js";
export {
	type CancelTimer,
	type Clock,
	type Closure,
	type Continuation,
	type JobContext,
	type JobKind,
	type JobSpan,
	JobState,
	type JobTracer,
	type Logger,
	type LogLevel,
	type PoolStats,
	type TerminalJobState,
} from "./types.js";
