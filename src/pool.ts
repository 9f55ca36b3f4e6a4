/**
 * DispatcherPool for loopscope - bounded background workers
 */

import { availableParallelism } from "node:os";
import createDebug from "debug";
import { systemClock } from "./clock.js";
import { ExecutionContext } from "./context.js";
import {
	CancellationError,
	RejectedSubmissionError,
	toError,
} from "./errors.js";
import { Job } from "./job.js";
import { createLogger } from "./logger.js";
import type {
	Clock,
	Closure,
	Logger,
	LogLevel,
	PoolStats,
} from "./types.js";

const debugPool = createDebug("loopscope:pool");

let poolIdCounter = 0;

/**
 * Options for creating a DispatcherPool
 */
export interface DispatcherPoolOptions {
	/** Label used in logs. Defaults to `pool-<id>`. */
	name?: string;
	/**
	 * Number of persistent workers, i.e. the most closures in flight at once.
	 * Defaults to `os.availableParallelism()`.
	 */
	workers?: number;
	/**
	 * Most jobs allowed to wait for a worker. A submit beyond it throws
	 * RejectedSubmissionError. Default: unbounded.
	 */
	capacity?: number;
	/** Time source for `awaitTermination` timeouts. */
	clock?: Clock;
	logger?: Logger;
	logLevel?: LogLevel;
}

/**
 * Where and how a job's result is handed back.
 */
export interface Delivery<T> {
	/**
	 * Context that receives the result. Without one, the callbacks run on
	 * the worker as soon as the closure settles.
	 */
	context?: ExecutionContext;
	onResult?(value: T, job: Job<T>): void;
	onError?(error: unknown, job: Job<T>): void;
}

export interface SubmitOptions<T> extends Delivery<T> {
	name?: string;
}

interface Work<T> {
	readonly job: Job<T>;
	readonly closure: Closure<T>;
	readonly delivery: Delivery<T> | undefined;
}

/**
 * A fixed set of workers pulling background closures from one queue.
 *
 * Jobs start in submission order; they may finish in any order. Never more
 * than `workers` closures run at once, and queued work is deferred, never
 * dropped, until `shutdownNow()`.
 *
 * @example
 * ```typescript
 * const pool = new DispatcherPool({ workers: 4 })
 * const main = new ExecutionContext({ name: "main" })
 *
 * pool.submit(() => loadReport(), {
 *   context: main,
 *   onResult: (report) => view.show(report),
 * })
 * ```
 */
export class DispatcherPool {
	readonly id: number;
	readonly name: string;
	readonly workerCount: number;
	private readonly capacity: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private queue: Work<unknown>[] = [];
	private idleWorkers: Array<(work: Work<unknown> | undefined) => void> = [];
	private readonly workers: Promise<void>[];
	private shutdownRequested = false;
	private active = 0;
	private peakActive = 0;
	private completed = 0;

	constructor(options?: DispatcherPoolOptions) {
		this.id = ++poolIdCounter;
		this.name = options?.name ?? `pool-${this.id}`;
		const workers = options?.workers ?? availableParallelism();
		if (!Number.isInteger(workers) || workers < 1) {
			throw new RangeError(`workers must be a positive integer, got ${workers}`);
		}
		const capacity = options?.capacity ?? Number.POSITIVE_INFINITY;
		if (Number.isNaN(capacity) || capacity < 0) {
			throw new RangeError(`capacity must be non-negative, got ${capacity}`);
		}
		this.workerCount = workers;
		this.capacity = capacity;
		this.clock = options?.clock ?? systemClock;
		this.logger = createLogger(this.name, options?.logger, options?.logLevel);

		if (debugPool.enabled) {
			debugPool(
				"[%s] starting %d workers (capacity: %s)",
				this.name,
				workers,
				Number.isFinite(capacity) ? capacity : "unbounded",
			);
		}
		this.workers = Array.from({ length: workers }, (_, index) =>
			ExecutionContext.detached(() => this.workerLoop(index)),
		);
	}

	get isShutdown(): boolean {
		return this.shutdownRequested;
	}

	/** True once shut down with no queued or running work left. */
	get isTerminated(): boolean {
		return this.shutdownRequested && this.queue.length === 0 && this.active === 0;
	}

	get stats(): PoolStats {
		return {
			workers: this.workerCount,
			active: this.active,
			queued: this.queue.length,
			completed: this.completed,
			peakActive: this.peakActive,
		};
	}

	/**
	 * Schedule a closure and return its job handle immediately.
	 *
	 * @throws RejectedSubmissionError if the pool is shut down or full
	 */
	submit<T>(closure: Closure<T>, options?: SubmitOptions<T>): Job<T> {
		const job = new Job<T>({
			name: options?.name,
			kind: "submit",
			returnContext: options?.context,
		});
		this.execute(job, closure, options);
		return job;
	}

	/**
	 * Schedule a job created elsewhere, such as by a scope.
	 *
	 * @throws RejectedSubmissionError if the pool is shut down or full
	 */
	execute<T>(job: Job<T>, closure: Closure<T>, delivery?: Delivery<T>): void {
		if (this.shutdownRequested) {
			throw new RejectedSubmissionError(
				`${this.name} is shut down; rejected ${job.name}`,
			);
		}
		if (this.idleWorkers.length === 0 && this.queue.length >= this.capacity) {
			throw new RejectedSubmissionError(
				`${this.name} queue is full (${this.capacity}); rejected ${job.name}`,
			);
		}
		if (!job.isActive) {
			throw new RejectedSubmissionError(`${job.name} already ${job.state}`);
		}

		const work: Work<T> = { job, closure, delivery };
		job.onCompletion(() => this.dequeue(job));

		const worker = this.idleWorkers.shift();
		if (worker) {
			worker(work);
		} else {
			this.queue.push(work);
		}
		if (debugPool.enabled) {
			debugPool(
				"[%s] accepted %s (queued: %d, active: %d)",
				this.name,
				job.name,
				this.queue.length,
				this.active,
			);
		}
	}

	/**
	 * Stop accepting work. Queued and running closures still finish.
	 */
	shutdown(): void {
		if (this.shutdownRequested) return;
		this.shutdownRequested = true;
		if (debugPool.enabled) {
			debugPool(
				"[%s] shutdown (queued: %d, active: %d)",
				this.name,
				this.queue.length,
				this.active,
			);
		}
		const idle = this.idleWorkers;
		this.idleWorkers = [];
		for (const worker of idle) {
			worker(undefined);
		}
	}

	/**
	 * Stop accepting work and cancel every queued job.
	 * Running closures are left to finish.
	 *
	 * @returns the jobs that never started
	 */
	shutdownNow(): Job<unknown>[] {
		this.shutdown();
		const never = this.queue.map((work) => work.job);
		const reason = new CancellationError(`${this.name} shut down`);
		for (const job of never) {
			job.cancel(reason);
		}
		return never;
	}

	/**
	 * Wait for every worker to exit after a shutdown.
	 *
	 * @returns true once terminated, false if `timeoutMs` elapsed first
	 */
	awaitTermination(timeoutMs?: number): Promise<boolean> {
		const terminated = Promise.all(this.workers).then(() => true);
		if (timeoutMs === undefined) return terminated;
		return new Promise((resolve) => {
			const cancelTimer = this.clock.setTimer(() => resolve(false), timeoutMs);
			void terminated.then(() => {
				cancelTimer();
				resolve(true);
			});
		});
	}

	private take(): Promise<Work<unknown> | undefined> {
		const next = this.queue.shift();
		if (next) return Promise.resolve(next);
		if (this.shutdownRequested) return Promise.resolve(undefined);
		return new Promise((resolve) => {
			this.idleWorkers.push(resolve);
		});
	}

	private dequeue(job: Job<unknown>): void {
		const index = this.queue.findIndex((work) => work.job === job);
		if (index !== -1) {
			this.queue.splice(index, 1);
			if (debugPool.enabled) {
				debugPool("[%s] removed %s from queue", this.name, job.name);
			}
		}
	}

	private async workerLoop(index: number): Promise<void> {
		for (;;) {
			const work = await this.take();
			if (!work) break;
			await this.run(work, index);
		}
		if (debugPool.enabled) {
			debugPool("[%s] worker %d exited", this.name, index);
		}
	}

	private async run<T>(work: Work<T>, index: number): Promise<void> {
		const { job, closure } = work;
		if (!job.start()) return;

		this.active++;
		this.peakActive = Math.max(this.peakActive, this.active);
		if (debugPool.enabled) {
			debugPool("[%s] worker %d running %s", this.name, index, job.name);
		}
		try {
			const value = await closure(job.context);
			this.settle(work, { ok: true, value });
		} catch (error) {
			this.settle(work, { ok: false, error });
		} finally {
			this.active--;
			this.completed++;
		}
	}

	private settle<T>(
		work: Work<T>,
		result: { ok: true; value: T } | { ok: false; error: unknown },
	): void {
		const { job, delivery } = work;
		if (result.ok) {
			if (!this.transition(job, () => job.complete(result.value))) {
				this.discard(job);
				return;
			}
			if (delivery?.onResult) {
				this.deliver(delivery, job, () =>
					delivery.onResult?.(result.value, job),
				);
			}
			return;
		}

		if (result.error instanceof CancellationError && job.isActive) {
			const reason = result.error;
			this.transition(job, () => job.cancel(reason));
			return;
		}
		const error = toError(result.error);
		if (!this.transition(job, () => job.fail(error))) {
			this.discard(job);
			return;
		}
		if (delivery?.onError) {
			this.deliver(delivery, job, () => delivery.onError?.(error, job));
		}
	}

	/**
	 * Apply a state change; handler errors are logged since the job has
	 * already moved on.
	 */
	private transition(job: Job<unknown>, change: () => boolean): boolean {
		try {
			return change();
		} catch (error) {
			this.logger.error(`completion handler of ${job.name} threw`, error);
			return true;
		}
	}

	private deliver<T>(
		delivery: Delivery<T>,
		job: Job<T>,
		continuation: () => void,
	): void {
		if (delivery.context) {
			delivery.context.post(continuation);
			return;
		}
		try {
			continuation();
		} catch (error) {
			this.logger.error(`delivery of ${job.name} threw`, error);
		}
	}

	private discard(job: Job<unknown>): void {
		if (debugPool.enabled) {
			debugPool("[%s] discarded result of %s (%s)", this.name, job.name, job.state);
		}
	}
}
