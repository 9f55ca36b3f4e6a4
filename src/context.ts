/**
 * ExecutionContext for loopscope - single-threaded cooperative loop
 */

import { AsyncLocalStorage } from "node:async_hooks";
import createDebug from "debug";
import { systemClock } from "./clock.js";
import { createLogger } from "./logger.js";
import { TaskQueue } from "./task-queue.js";
import type {
	CancelTimer,
	Clock,
	Continuation,
	Logger,
	LogLevel,
} from "./types.js";

const debugContext = createDebug("loopscope:context");

const activeContext = new AsyncLocalStorage<ExecutionContext>();

let contextIdCounter = 0;

/**
 * Receives errors thrown by continuations.
 */
export type ContextErrorSink = (error: unknown, context: ExecutionContext) => void;

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionContextOptions {
	/** Label used in logs. Defaults to `context-<id>`. */
	name?: string;
	/** Time source for delayed posts. Defaults to the system clock. */
	clock?: Clock;
	/**
	 * Called with every error a continuation throws or rejects with.
	 * Defaults to logging through the context's logger.
	 */
	onError?: ContextErrorSink;
	logger?: Logger;
	logLevel?: LogLevel;
}

export interface StopOptions {
	/**
	 * Run every continuation already due when `stop()` was called
	 * before `run()` returns. Default: false.
	 */
	drain?: boolean;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
	return (
		(typeof value === "object" || typeof value === "function") &&
		value !== null &&
		"then" in value &&
		typeof value.then === "function"
	);
}

const yieldToEventLoop = (): Promise<void> =>
	new Promise((resolve) => setImmediate(resolve));

/**
 * A logical single-threaded home for continuations.
 *
 * Continuations posted to one context run one at a time in the order they
 * were posted. A continuation posted while another runs is appended behind
 * everything already queued, never run inline.
 *
 * @example
 * ```typescript
 * const main = new ExecutionContext({ name: "main" })
 * const loop = main.run()
 *
 * main.post(() => render("loading"))
 * main.postDelayed(100, () => render("still loading"))
 *
 * main.stop()
 * await loop
 * ```
 */
export class ExecutionContext {
	readonly id: number;
	readonly name: string;
	readonly clock: Clock;
	private readonly queue = new TaskQueue<Continuation>();
	private readonly logger: Logger;
	private readonly onError: ContextErrorSink;
	private running = false;
	private stopRequested = false;
	private drainUntilSeq = 0;
	private wake: (() => void) | undefined;
	private executedCount = 0;

	constructor(options?: ExecutionContextOptions) {
		this.id = ++contextIdCounter;
		this.name = options?.name ?? `context-${this.id}`;
		this.clock = options?.clock ?? systemClock;
		this.logger = createLogger(this.name, options?.logger, options?.logLevel);
		this.onError =
			options?.onError ??
			((error) => this.logger.error("continuation failed", error));

		if (debugContext.enabled) {
			debugContext(
				"[%s] created (custom clock: %s)",
				this.name,
				options?.clock ? "yes" : "no",
			);
		}
	}

	/**
	 * The context whose continuation is executing, if any.
	 * Follows async continuations started from that continuation.
	 */
	static current(): ExecutionContext | undefined {
		return activeContext.getStore();
	}

	/**
	 * Run `fn` with no current context, so promise chains it starts do not
	 * count as running on the caller's context.
	 * @internal Used by the dispatcher pool for its worker loops
	 */
	static detached<R>(fn: () => R): R {
		return activeContext.exit(fn);
	}

	/** True while one of this context's continuations is executing. */
	get isCurrent(): boolean {
		return activeContext.getStore() === this;
	}

	get isRunning(): boolean {
		return this.running;
	}

	/** Number of queued continuations, due or not. */
	get pending(): number {
		return this.queue.size;
	}

	/** Number of continuations executed since creation. */
	get executed(): number {
		return this.executedCount;
	}

	/**
	 * Append a continuation to the mailbox. Never blocks, never runs it inline.
	 */
	post(continuation: Continuation): void {
		this.queue.enqueue(continuation, this.clock.now());
		this.wakeUp();
	}

	/**
	 * Queue a continuation that becomes due after `delayMs` on this
	 * context's clock.
	 */
	postDelayed(delayMs: number, continuation: Continuation): void {
		if (!Number.isFinite(delayMs) || delayMs < 0) {
			throw new RangeError(
				`delay must be a finite non-negative number, got ${delayMs}`,
			);
		}
		this.queue.enqueue(continuation, this.clock.now() + delayMs);
		this.wakeUp();
	}

	/**
	 * Drop every pending occurrence of `continuation`.
	 * @returns how many queued entries were removed
	 */
	remove(continuation: Continuation): number {
		const removed = this.queue.remove((item) => item === continuation);
		if (removed > 0 && debugContext.enabled) {
			debugContext("[%s] removed %d pending continuation(s)", this.name, removed);
		}
		return removed;
	}

	/**
	 * Run the loop until `stop()` is called.
	 *
	 * Takes the oldest due continuation, runs it to completion, yields to the
	 * event loop so promise callbacks it started can settle, and repeats.
	 * Waits without spinning while nothing is due.
	 */
	async run(): Promise<void> {
		if (this.running) {
			throw new Error(`Context ${this.name} is already running`);
		}
		this.running = true;
		this.stopRequested = false;
		if (debugContext.enabled) {
			debugContext("[%s] loop started (pending: %d)", this.name, this.pending);
		}

		try {
			for (;;) {
				const now = this.clock.now();
				if (this.stopRequested) {
					const continuation = this.queue.pollDue(now, this.drainUntilSeq);
					if (continuation === undefined) break;
					this.execute(continuation);
					await yieldToEventLoop();
					continue;
				}
				const continuation = this.queue.pollDue(now);
				if (continuation !== undefined) {
					this.execute(continuation);
					await yieldToEventLoop();
					continue;
				}
				await this.idle();
			}
		} finally {
			this.running = false;
			this.stopRequested = false;
			this.drainUntilSeq = 0;
			if (debugContext.enabled) {
				debugContext(
					"[%s] loop stopped (executed: %d, pending: %d)",
					this.name,
					this.executedCount,
					this.pending,
				);
			}
		}
	}

	/**
	 * Ask a running loop to return once the current continuation finishes.
	 * Queued continuations stay queued for a later `run()`.
	 */
	stop(options?: StopOptions): void {
		if (!this.running) return;
		this.stopRequested = true;
		this.drainUntilSeq = options?.drain ? this.queue.lastSeq : 0;
		if (debugContext.enabled) {
			debugContext("[%s] stop requested (drain: %s)", this.name, !!options?.drain);
		}
		this.wakeUp();
	}

	/**
	 * Execute every continuation due now, including ones they post, without
	 * starting the loop. Yields to the event loop between continuations.
	 *
	 * @returns how many continuations ran
	 */
	async runUntilIdle(): Promise<number> {
		if (this.running) {
			throw new Error(`Context ${this.name} is running its own loop`);
		}
		let count = 0;
		for (;;) {
			const continuation = this.queue.pollDue(this.clock.now());
			if (continuation === undefined) return count;
			this.execute(continuation);
			count++;
			await yieldToEventLoop();
		}
	}

	private execute(continuation: Continuation): void {
		this.executedCount++;
		activeContext.run(this, () => {
			try {
				const result = continuation();
				if (isThenable(result)) {
					void result.then(undefined, (error: unknown) => this.report(error));
				}
			} catch (error) {
				this.report(error);
			}
		});
	}

	private report(error: unknown): void {
		if (debugContext.enabled) {
			debugContext("[%s] continuation failed: %s", this.name, error);
		}
		try {
			this.onError(error, this);
		} catch (sinkError) {
			this.logger.error("error sink threw", sinkError, error);
		}
	}

	private idle(): Promise<void> {
		return new Promise((resolve) => {
			let cancelTimer: CancelTimer | undefined;
			const nextDueAt = this.queue.nextDueAt();
			if (nextDueAt !== undefined) {
				cancelTimer = this.clock.setTimer(
					() => this.wakeUp(),
					nextDueAt - this.clock.now(),
				);
			}
			this.wake = () => {
				this.wake = undefined;
				cancelTimer?.();
				resolve();
			};
		});
	}

	private wakeUp(): void {
		this.wake?.();
	}
}
