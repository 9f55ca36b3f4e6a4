/**
 * Scope class for loopscope - Structured concurrency
 */

import { SpanStatusCode } from "@opentelemetry/api";
import createDebug from "debug";
import { systemClock } from "./clock.js";
import type { ExecutionContext } from "./context.js";
import {
	CancellationError,
	RejectedSubmissionError,
	TimeoutError,
	toError,
} from "./errors.js";
import { DeferredJob, Job } from "./job.js";
import { createLogger } from "./logger.js";
import type { DispatcherPool } from "./pool.js";
import type {
	CancelTimer,
	Clock,
	Closure,
	JobSpan,
	JobTracer,
	Logger,
	LogLevel,
} from "./types.js";
import { JobState } from "./types.js";

const debugScope = createDebug("loopscope:scope");

let scopeIdCounter = 0;

/**
 * Receives failures of launched jobs that have no `onError` of their own,
 * and failed deferred jobs nobody awaited by the time the scope closes.
 */
export type ScopeErrorHandler = (error: unknown, job: Job<unknown>) => void;

/**
 * Lifecycle hooks for scope events.
 * An error thrown by a hook is logged through the scope's logger.
 */
export interface ScopeHooks {
	/** Called when a job is registered, before it is queued. */
	onLaunch?: (job: Job<unknown>) => void;
	/** Called when a job reaches a terminal state. */
	onSettled?: (job: Job<unknown>) => void;
	/** Called once when the scope is cancelled. */
	onCancel?: (reason: CancellationError) => void;
}

/**
 * Options for creating a Scope
 */
export interface ScopeOptions {
	/** Label used in logs and job names. Defaults to `scope-<id>`. */
	name?: string;
	/** Pool that runs the scope's closures. Inherited from the parent. */
	pool?: DispatcherPool;
	/**
	 * Default return context for `launch`. Inherited from the parent.
	 */
	context?: ExecutionContext;
	/** Parent scope. Cancelling the parent cancels this scope. */
	parent?: Scope;
	/**
	 * Keep a failed launched job from cancelling its siblings.
	 * Inherited from the parent. Default: false.
	 */
	supervisor?: boolean;
	/**
	 * Replaces the default failure handling (log, then cancel siblings).
	 * Inherited from the parent.
	 */
	onError?: ScopeErrorHandler;
	hooks?: ScopeHooks;
	/** Optional OpenTelemetry tracer; each job gets a `scope.job` span. */
	tracer?: JobTracer;
	/** Time source for timeouts without a return context. */
	clock?: Clock;
	logger?: Logger;
	logLevel?: LogLevel;
}

export interface LaunchOptions<T> {
	name?: string;
	/** Receives the value, on the return context when there is one. */
	onResult?: (value: T) => void;
	/**
	 * Receives the failure or timeout, on the return context when there
	 * is one. Without it, failures go to the scope's error handler.
	 */
	onError?: (error: unknown) => void;
	/** Cancel the job with a TimeoutError if it has not settled by then. */
	timeout?: number;
}

export interface AsyncOptions {
	name?: string;
	/** Cancel the job with a TimeoutError if it has not settled by then. */
	timeout?: number;
}

export interface CloseOptions {
	/**
	 * How long to wait for running jobs before cancelling them.
	 * Without it, remaining jobs are cancelled at once.
	 */
	timeout?: number;
}

function validateTimeout(timeoutMs: number | undefined): void {
	if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs < 0)) {
		throw new RangeError(
			`timeout must be a finite non-negative number, got ${timeoutMs}`,
		);
	}
}

/**
 * A structured-concurrency boundary owning a group of jobs.
 *
 * Jobs launched in a scope run on its dispatcher pool and report back to a
 * return context. Cancelling the scope cancels every job it owns and every
 * child scope; closing it waits for the jobs (optionally), cancels the rest
 * and reports failures nobody observed.
 *
 * Implements AsyncDisposable for use with `await using`.
 *
 * @example
 * ```typescript
 * const screen = scope({ name: "screen", pool, context: main })
 *
 * screen.launch(() => api.loadFeed(), main, {
 *   onResult: (feed) => view.render(feed),
 * })
 *
 * // when the screen goes away
 * await screen.close()
 * ```
 */
export class Scope implements AsyncDisposable {
	readonly id: number;
	readonly name: string;
	readonly parent: Scope | undefined;
	readonly pool: DispatcherPool;
	readonly context: ExecutionContext | undefined;
	private readonly supervisor: boolean;
	private readonly errorHandler: ScopeErrorHandler | undefined;
	private readonly hooks: ScopeHooks | undefined;
	private readonly tracer: JobTracer | undefined;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly jobs = new Map<number, Job<unknown>>();
	private readonly children = new Set<Scope>();
	private readonly unobservedFailures = new Set<DeferredJob<unknown>>();
	private quiescenceWaiters: Array<() => void> = [];
	private cancellation: CancellationError | undefined;
	private closing: Promise<boolean> | undefined;
	private closed = false;
	private jobCounter = 0;

	constructor(options?: ScopeOptions) {
		this.id = ++scopeIdCounter;
		this.name = options?.name ?? `scope-${this.id}`;

		// Inherit from parent scope if provided
		const parent = options?.parent;
		const pool = options?.pool ?? parent?.pool;
		if (!pool) {
			throw new TypeError(`Scope ${this.name} needs a dispatcher pool`);
		}
		if (parent?.closed) {
			throw new RejectedSubmissionError(
				`Cannot create scope ${this.name} under closed scope ${parent.name}`,
			);
		}
		this.parent = parent;
		this.pool = pool;
		this.context = options?.context ?? parent?.context;
		this.supervisor = options?.supervisor ?? parent?.supervisor ?? false;
		this.errorHandler = options?.onError ?? parent?.errorHandler;
		this.hooks = options?.hooks;
		this.tracer = options?.tracer ?? parent?.tracer;
		this.clock = options?.clock ?? parent?.clock ?? systemClock;
		this.logger =
			options?.logger || options?.logLevel
				? createLogger(this.name, options?.logger, options?.logLevel)
				: (parent?.logger ?? createLogger(this.name));

		if (debugScope.enabled) {
			debugScope(
				"[%s] creating scope (pool: %s, context: %s, parent: %s, supervisor: %s)",
				this.name,
				pool.name,
				this.context?.name ?? "none",
				parent?.name ?? "none",
				this.supervisor,
			);
		}

		if (parent) {
			parent.children.add(this);
			if (parent.cancellation) {
				this.cancel(parent.cancellation);
			}
		}
	}

	get isCancelled(): boolean {
		return this.cancellation !== undefined;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * True when every owned job, including those of child scopes,
	 * has reached a terminal state.
	 */
	get isQuiescent(): boolean {
		if (this.jobs.size > 0) return false;
		for (const child of this.children) {
			if (!child.isQuiescent) return false;
		}
		return true;
	}

	/** Jobs not yet terminal, oldest first. */
	get activeJobs(): Job<unknown>[] {
		return Array.from(this.jobs.values());
	}

	/**
	 * Create a nested scope that inherits pool, context, error handling,
	 * tracer and logger.
	 */
	child(options?: Omit<ScopeOptions, "parent">): Scope {
		return new Scope({ ...options, parent: this });
	}

	/**
	 * Run a closure on the pool and hand its result to `context`.
	 *
	 * A failure goes to `options.onError`, or else to the scope's error
	 * handler, which by default logs it and cancels the sibling jobs.
	 *
	 * @throws RejectedSubmissionError if the scope is cancelled or closed,
	 * or the pool refuses the job
	 */
	launch<T>(
		closure: Closure<T>,
		context: ExecutionContext | undefined = this.context,
		options?: LaunchOptions<T>,
	): Job<T> {
		this.ensureAccepting();
		validateTimeout(options?.timeout);
		const job = new Job<T>({
			name: this.jobName(options?.name),
			kind: "launch",
			scope: this,
			returnContext: context,
		});
		const onError = options?.onError;
		this.register(job, () =>
			this.pool.execute(job, closure, {
				context,
				onResult: (value) => options?.onResult?.(value),
				onError: (error) => {
					if (onError) {
						onError(error);
					} else {
						this.handleFailure(error, job);
					}
				},
			}),
		);
		if (options?.timeout !== undefined) {
			this.armTimeout(job, options.timeout, context, (error) => {
				if (onError) {
					onError(error);
				} else {
					this.logger.warn(error.message);
				}
			});
		}
		return job;
	}

	/**
	 * Run a closure on the pool and keep its outcome for `await()`.
	 *
	 * Failures are not reported until awaited; a failure never awaited is
	 * reported when the scope closes.
	 *
	 * @throws RejectedSubmissionError if the scope is cancelled or closed,
	 * or the pool refuses the job
	 */
	async<T>(closure: Closure<T>, options?: AsyncOptions): DeferredJob<T> {
		this.ensureAccepting();
		validateTimeout(options?.timeout);
		const job = new DeferredJob<T>({
			name: this.jobName(options?.name),
			kind: "async",
			scope: this,
		});
		this.register(job, () => this.pool.execute(job, closure));
		if (options?.timeout !== undefined) {
			this.armTimeout(job, options.timeout, this.context, () => {});
		}
		return job;
	}

	/**
	 * Cancel every owned job and every child scope. Later launches are
	 * rejected. Only the first call has an effect.
	 */
	cancel(reason?: CancellationError | string): void {
		if (this.cancellation) return;
		const error =
			reason instanceof CancellationError
				? reason
				: new CancellationError(reason ?? `scope ${this.name} cancelled`);
		this.cancellation = error;

		if (debugScope.enabled) {
			debugScope(
				"[%s] cancelling (jobs: %d, children: %d): %s",
				this.name,
				this.jobs.size,
				this.children.size,
				error.message,
			);
		}
		this.runHook("onCancel", (hooks) => hooks.onCancel?.(error));

		for (const job of Array.from(this.jobs.values())) {
			try {
				job.cancel(error);
			} catch (handlerError) {
				this.logger.error(`completion handler of ${job.name} threw`, handlerError);
			}
		}
		for (const child of Array.from(this.children)) {
			child.cancel(error);
		}
	}

	/**
	 * Wait until every owned job has reached a terminal state.
	 *
	 * @returns true when quiescent, false if `timeoutMs` elapsed first
	 */
	awaitQuiescence(timeoutMs?: number): Promise<boolean> {
		if (this.isQuiescent) return Promise.resolve(true);
		return new Promise((resolve) => {
			let cancelTimer: CancelTimer | undefined;
			const waiter = () => {
				cancelTimer?.();
				resolve(true);
			};
			this.quiescenceWaiters.push(waiter);
			if (timeoutMs !== undefined) {
				cancelTimer = this.clock.setTimer(() => {
					this.quiescenceWaiters = this.quiescenceWaiters.filter(
						(w) => w !== waiter,
					);
					resolve(false);
				}, timeoutMs);
			}
		});
	}

	/**
	 * Tear the scope down.
	 *
	 * Waits up to `options.timeout` for running jobs, cancels whatever is
	 * left, closes child scopes, reports failed deferred jobs that were never
	 * awaited and detaches from the parent.
	 *
	 * @returns true if every job finished without being force-cancelled
	 */
	close(options?: CloseOptions): Promise<boolean> {
		if (!this.closing) {
			this.closing = this.teardown(options);
		}
		return this.closing;
	}

	async [Symbol.asyncDispose](): Promise<void> {
		await this.close();
	}

	private async teardown(options?: CloseOptions): Promise<boolean> {
		if (debugScope.enabled) {
			debugScope(
				"[%s] closing (jobs: %d, children: %d, timeout: %s)",
				this.name,
				this.jobs.size,
				this.children.size,
				options?.timeout ?? "none",
			);
		}
		let quiescent = this.isQuiescent;
		if (!quiescent && options?.timeout !== undefined) {
			quiescent = await this.awaitQuiescence(options.timeout);
		}
		if (!quiescent) {
			this.cancel(`scope ${this.name} closed`);
		}

		const childResults = await Promise.all(
			Array.from(this.children).map((child) => child.close()),
		);

		for (const job of this.unobservedFailures) {
			if (!job.isObserved) {
				this.report(job.error, job);
			}
		}
		this.unobservedFailures.clear();
		this.jobs.clear();
		this.closed = true;
		this.parent?.children.delete(this);
		this.parent?.notifyIfQuiescent();

		if (debugScope.enabled) {
			debugScope("[%s] closed (forced: %s)", this.name, !quiescent);
		}
		return quiescent && childResults.every(Boolean);
	}

	private ensureAccepting(): void {
		if (this.closed || this.closing) {
			throw new RejectedSubmissionError(`Scope ${this.name} is closed`);
		}
		if (this.cancellation) {
			throw new RejectedSubmissionError(
				`Scope ${this.name} is cancelled: ${this.cancellation.message}`,
			);
		}
	}

	private jobName(name: string | undefined): string {
		this.jobCounter++;
		return name ?? `${this.name}/job-${this.jobCounter}`;
	}

	private register(job: Job<unknown>, enqueue: () => void): void {
		this.runHook("onLaunch", (hooks) => hooks.onLaunch?.(job));
		this.jobs.set(job.id, job);
		try {
			enqueue();
		} catch (error) {
			this.jobs.delete(job.id);
			throw error;
		}

		const span = this.startSpan(job);
		job.onCompletion(() => this.settled(job, span));

		if (debugScope.enabled) {
			debugScope(
				"[%s] launched %s (%s, active jobs: %d)",
				this.name,
				job.name,
				job.kind,
				this.jobs.size,
			);
		}
	}

	private settled(job: Job<unknown>, span: JobSpan | undefined): void {
		this.jobs.delete(job.id);
		if (
			job instanceof DeferredJob &&
			job.state === JobState.Failed &&
			!job.isObserved
		) {
			this.unobservedFailures.add(job);
		}
		this.endSpan(job, span);
		this.runHook("onSettled", (hooks) => hooks.onSettled?.(job));
		this.notifyIfQuiescent();
	}

	/**
	 * Hooks observe the scope; a throwing hook is logged and never
	 * interrupts registration, settlement or a cancel cascade.
	 */
	private runHook(
		name: keyof ScopeHooks,
		call: (hooks: ScopeHooks) => void,
	): void {
		if (!this.hooks) return;
		try {
			call(this.hooks);
		} catch (error) {
			this.logger.error(`${name} hook of ${this.name} threw`, error);
		}
	}

	private notifyIfQuiescent(): void {
		if (!this.isQuiescent) return;
		const waiters = this.quiescenceWaiters;
		this.quiescenceWaiters = [];
		for (const waiter of waiters) {
			waiter();
		}
		this.parent?.notifyIfQuiescent();
	}

	private armTimeout(
		job: Job<unknown>,
		timeoutMs: number,
		context: ExecutionContext | undefined,
		onTimeout: (error: TimeoutError) => void,
	): void {
		const fire = () => {
			const error = new TimeoutError(timeoutMs, job.name);
			if (job.cancel(error)) {
				onTimeout(error);
			}
		};
		if (context) {
			// Races the completion continuation on the same context
			context.postDelayed(timeoutMs, fire);
			job.onCompletion(() => context.remove(fire));
		} else {
			job.onCompletion(this.clock.setTimer(fire, timeoutMs));
		}
	}

	private handleFailure(error: unknown, job: Job<unknown>): void {
		if (this.errorHandler) {
			this.errorHandler(error, job);
			return;
		}
		this.logger.error(`${job.name} failed`, error);
		if (this.supervisor) return;

		const reason = new CancellationError(`sibling ${job.name} failed`, {
			cause: error,
		});
		for (const sibling of Array.from(this.jobs.values())) {
			if (sibling !== job) {
				sibling.cancel(reason);
			}
		}
	}

	private report(error: unknown, job: Job<unknown>): void {
		if (this.errorHandler) {
			this.errorHandler(error, job);
		} else {
			this.logger.error(`${job.name} failed and was never awaited`, error);
		}
	}

	private startSpan(job: Job<unknown>): JobSpan | undefined {
		return this.tracer?.startSpan("scope.job", {
			attributes: {
				"job.id": job.id,
				"job.name": job.name,
				"job.kind": job.kind,
				"scope.name": this.name,
			},
		});
	}

	private endSpan(job: Job<unknown>, span: JobSpan | undefined): void {
		if (!span) return;
		span.setAttributes({ "job.state": job.state });
		if (job.state === JobState.Failed) {
			span.recordException(toError(job.error));
			span.setStatus({ code: SpanStatusCode.ERROR, message: "job failed" });
		} else {
			span.setStatus({ code: SpanStatusCode.OK });
		}
		span.end();
	}
}
