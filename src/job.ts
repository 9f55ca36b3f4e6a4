/**
 * Job classes for loopscope
 */

import createDebug from "debug";
import { ExecutionContext } from "./context.js";
import { CancellationError } from "./errors.js";
import type { Scope } from "./scope.js";
import { type JobContext, type JobKind, JobState } from "./types.js";

const debugJob = createDebug("loopscope:job");

let jobIdCounter = 0;

type Outcome<T> =
	| { readonly state: typeof JobState.Completed; readonly value: T }
	| { readonly state: typeof JobState.Failed; readonly error: unknown }
	| {
			readonly state: typeof JobState.Cancelled;
			readonly error: CancellationError;
	  };

export type CompletionHandler<T> = (job: Job<T>) => void;

export interface JobOptions {
	name?: string;
	kind?: JobKind;
	/** Scope that owns the job. Back-reference only. */
	scope?: Scope;
	/** Context that receives the job's result. */
	returnContext?: ExecutionContext;
}

/**
 * Handle to one unit of background work.
 *
 * State moves forward only: created, running, then exactly one of
 * completed, failed or cancelled. The dispatcher pool drives the
 * running and completion transitions; `cancel()` may end the job from
 * any non-terminal state.
 *
 * @example
 * ```typescript
 * const job = pool.submit(({ ensureActive }) => {
 *   ensureActive()
 *   return compute()
 * })
 * job.cancel()
 * job.state // "cancelled"
 * ```
 */
export class Job<T = unknown> {
	readonly id: number;
	readonly name: string;
	readonly kind: JobKind;
	readonly scope: Scope | undefined;
	readonly returnContext: ExecutionContext | undefined;
	private currentState: JobState = JobState.Created;
	protected outcome: Outcome<T> | undefined;
	private readonly abortController = new AbortController();
	private handlers: Array<() => void> = [];
	private joined: Promise<void> | undefined;
	private jobContext: JobContext | undefined;

	constructor(options?: JobOptions) {
		this.id = ++jobIdCounter;
		this.name = options?.name ?? `job-${this.id}`;
		this.kind = options?.kind ?? "submit";
		this.scope = options?.scope;
		this.returnContext = options?.returnContext;
	}

	get state(): JobState {
		return this.currentState;
	}

	/** True until the job reaches a terminal state. */
	get isActive(): boolean {
		return this.outcome === undefined;
	}

	get isCancelled(): boolean {
		return this.currentState === JobState.Cancelled;
	}

	/** The result of a completed job. */
	get value(): T | undefined {
		return this.outcome?.state === JobState.Completed
			? this.outcome.value
			: undefined;
	}

	/** The error of a failed or cancelled job. */
	get error(): unknown {
		return this.outcome !== undefined &&
			this.outcome.state !== JobState.Completed
			? this.outcome.error
			: undefined;
	}

	/** Aborts with the CancellationError when the job is cancelled. */
	get signal(): AbortSignal {
		return this.abortController.signal;
	}

	/**
	 * The cooperative-cancellation view handed to the closure.
	 */
	get context(): JobContext {
		if (!this.jobContext) {
			const isActive = () => this.isActive;
			this.jobContext = {
				jobId: this.id,
				signal: this.signal,
				get isActive() {
					return isActive();
				},
				ensureActive: () => this.ensureActive(),
			};
		}
		return this.jobContext;
	}

	/**
	 * Throws the CancellationError if the job was cancelled.
	 */
	ensureActive(): void {
		if (this.outcome?.state === JobState.Cancelled) {
			throw this.outcome.error;
		}
	}

	/**
	 * Cancel the job. A queued job never runs; a running job keeps running
	 * until its closure returns, but its result is discarded.
	 *
	 * @returns false if the job had already reached a terminal state
	 */
	cancel(reason?: CancellationError | string): boolean {
		if (this.outcome) return false;
		const error =
			reason instanceof CancellationError
				? reason
				: new CancellationError(reason ?? `${this.name} cancelled`);
		if (debugJob.enabled) {
			debugJob("[%s] cancelled while %s: %s", this.name, this.currentState, error.message);
		}
		this.abortController.abort(error);
		this.settle({ state: JobState.Cancelled, error });
		return true;
	}

	/**
	 * Move from created to running.
	 * @internal Called by the dispatcher pool when a worker picks the job up.
	 */
	start(): boolean {
		if (this.currentState !== JobState.Created) return false;
		this.currentState = JobState.Running;
		return true;
	}

	/**
	 * @internal Called by the dispatcher pool when the closure returns.
	 * @returns false if the job was no longer running
	 */
	complete(value: T): boolean {
		if (this.currentState !== JobState.Running || this.outcome) return false;
		this.settle({ state: JobState.Completed, value });
		return true;
	}

	/**
	 * @internal Called by the dispatcher pool when the closure throws.
	 * @returns false if the job was no longer running
	 */
	fail(error: unknown): boolean {
		if (this.currentState !== JobState.Running || this.outcome) return false;
		this.settle({ state: JobState.Failed, error });
		return true;
	}

	/**
	 * Register a handler called once with this job when it reaches a
	 * terminal state. Runs immediately if it already has.
	 *
	 * @returns a function that unregisters the handler
	 */
	onCompletion(handler: CompletionHandler<T>): () => void {
		if (this.outcome) {
			handler(this);
			return () => {};
		}
		const entry = () => handler(this);
		this.handlers.push(entry);
		return () => {
			this.handlers = this.handlers.filter((h) => h !== entry);
		};
	}

	/**
	 * Resolves once the job reaches a terminal state, whatever it is.
	 */
	join(): Promise<void> {
		if (!this.joined) {
			this.joined = new Promise((resolve) => {
				this.onCompletion(() => resolve());
			});
		}
		return this.joined;
	}

	private settle(outcome: Outcome<T>): void {
		this.outcome = outcome;
		this.currentState = outcome.state;
		if (debugJob.enabled) {
			debugJob("[%s] settled: %s", this.name, outcome.state);
		}

		const handlers = this.handlers;
		this.handlers = [];
		const errors: unknown[] = [];
		for (const handler of handlers) {
			try {
				handler();
			} catch (error) {
				errors.push(error);
			}
		}
		if (errors.length === 1) throw errors[0];
		if (errors.length > 1) {
			throw new AggregateError(
				errors,
				`${errors.length} completion handlers of ${this.name} threw`,
			);
		}
	}
}

/**
 * A job whose result is read back with `await()`.
 *
 * Failures are kept until observed: `await()` throws the stored error on
 * every call and never re-runs the closure. The value is handed back on the
 * context that called `await()`, when there is one.
 *
 * @example
 * ```typescript
 * main.post(async () => {
 *   const user = await s.async(() => api.fetchUser(id)).await()
 *   view.show(user) // back on main
 * })
 * ```
 */
export class DeferredJob<T = unknown> extends Job<T> implements PromiseLike<T> {
	private observed = false;

	/** True once `await()` has been called. */
	get isObserved(): boolean {
		return this.observed;
	}

	/**
	 * Wait for a terminal state, then yield the value or throw the error.
	 *
	 * Called from a continuation, the result is posted back to that
	 * continuation's context and the rest of the continuation resumes there.
	 */
	await(): Promise<T> {
		this.observed = true;
		const caller = ExecutionContext.current();
		return new Promise<T>((resolve, reject) => {
			this.onCompletion(() => {
				const deliver = () => {
					if (this.state === JobState.Completed) {
						resolve(this.readValue());
					} else {
						reject(this.error);
					}
				};
				if (caller && !caller.isCurrent) {
					caller.post(deliver);
				} else {
					deliver();
				}
			});
		});
	}

	// biome-ignore lint/suspicious/noThenProperty: Intentionally implementing PromiseLike
	then<TResult1 = T, TResult2 = never>(
		onfulfilled?:
			| ((value: T) => TResult1 | PromiseLike<TResult1>)
			| null
			| undefined,
		onrejected?:
			| ((reason: unknown) => TResult2 | PromiseLike<TResult2>)
			| null
			| undefined,
	): Promise<TResult1 | TResult2> {
		return this.await().then(onfulfilled, onrejected);
	}

	private readValue(): T {
		if (this.outcome?.state !== JobState.Completed) {
			throw new Error(`${this.name} has no value`);
		}
		return this.outcome.value;
	}
}
