import { describe, expect, test, vi } from "vitest";
import {
	CancellationError,
	ClosureError,
	DispatcherPool,
	ExecutionContext,
	Job,
	JobState,
	RejectedSubmissionError,
} from "../src/index.js";
import { createManualClock } from "../src/testing/index.js";
import { deferred, flush, sleep } from "./helpers.js";

describe("DispatcherPool", () => {
	describe("scheduling", () => {
		test("never runs more closures than it has workers", async () => {
			const pool = new DispatcherPool({ workers: 3 });
			let running = 0;
			let maxRunning = 0;

			const jobs = Array.from({ length: 30 }, () =>
				pool.submit(async () => {
					running++;
					maxRunning = Math.max(maxRunning, running);
					await sleep(1);
					running--;
				}),
			);
			await Promise.all(jobs.map((job) => job.join()));

			expect(maxRunning).toBe(3);
			expect(pool.stats).toEqual({
				workers: 3,
				active: 0,
				queued: 0,
				completed: 30,
				peakActive: 3,
			});
			pool.shutdown();
		});

		test("starts jobs in submission order", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const started: number[] = [];

			const jobs = Array.from({ length: 5 }, (_, i) =>
				pool.submit(async () => {
					started.push(i);
					await flush();
				}),
			);
			await Promise.all(jobs.map((job) => job.join()));

			expect(started).toEqual([0, 1, 2, 3, 4]);
			pool.shutdown();
		});

		test("hands a result back on the given context", async () => {
			const pool = new DispatcherPool({ workers: 2 });
			const main = new ExecutionContext({ name: "main" });
			const seen: Array<[number, ExecutionContext | undefined]> = [];

			const job = pool.submit(() => 42, {
				context: main,
				onResult: (value) => seen.push([value, ExecutionContext.current()]),
			});
			await job.join();

			expect(seen).toEqual([]);
			expect(main.pending).toBe(1);
			await main.runUntilIdle();
			expect(seen).toEqual([[42, main]]);
			expect(job.state).toBe(JobState.Completed);
			expect(job.value).toBe(42);
			pool.shutdown();
		});

		test("runs closures and callbacks off any context when none is given", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const main = new ExecutionContext();
			const done = deferred<void>();
			const seen: Array<ExecutionContext | undefined> = [];

			main.post(() => {
				pool.submit(
					() => {
						seen.push(ExecutionContext.current());
						return "value";
					},
					{
						onResult: () => {
							seen.push(ExecutionContext.current());
							done.resolve();
						},
					},
				);
			});
			await main.runUntilIdle();
			await done.promise;

			expect(seen).toEqual([undefined, undefined]);
			pool.shutdown();
		});

		test("uses the given name for the job", () => {
			const pool = new DispatcherPool({ workers: 1 });
			const job = pool.submit(() => 1, { name: "load-report" });

			expect(job.name).toBe("load-report");
			expect(job.kind).toBe("submit");
			pool.shutdown();
		});
	});

	describe("failures", () => {
		test("delivers a thrown error to onError on the context", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const main = new ExecutionContext();
			const failure = new Error("boom");
			const onError = vi.fn();

			const job = pool.submit(
				() => {
					throw failure;
				},
				{ context: main, onError },
			);
			await job.join();

			expect(onError).not.toHaveBeenCalled();
			await main.runUntilIdle();
			expect(onError).toHaveBeenCalledTimes(1);
			expect(onError).toHaveBeenCalledWith(failure, job);
			expect(job.state).toBe(JobState.Failed);
			expect(job.error).toBe(failure);
			pool.shutdown();
		});

		test("wraps thrown values that are not errors", async () => {
			const pool = new DispatcherPool({ workers: 1 });

			const fromString = pool.submit(() => {
				throw "plain text";
			});
			const fromNumber = pool.submit(() => {
				throw 42;
			});
			await Promise.all([fromString.join(), fromNumber.join()]);

			expect(fromString.error).toBeInstanceOf(ClosureError);
			expect(fromString.error).toMatchObject({
				message: "plain text",
				cause: "plain text",
			});
			expect(fromNumber.error).toMatchObject({
				message: "closure threw a non-Error value",
				cause: 42,
			});
			pool.shutdown();
		});

		test("treats a thrown CancellationError as cancellation", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const onError = vi.fn();
			const reason = new CancellationError("gave up");

			const job = pool.submit(
				() => {
					throw reason;
				},
				{ onError },
			);
			await job.join();

			expect(job.state).toBe(JobState.Cancelled);
			expect(job.error).toBe(reason);
			expect(onError).not.toHaveBeenCalled();
			pool.shutdown();
		});
	});

	describe("cancellation", () => {
		test("a job cancelled before it starts never runs", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const gate = deferred<void>();
			let ran = false;

			const blocker = pool.submit(() => gate.promise);
			const queued = pool.submit(() => {
				ran = true;
			});
			expect(pool.stats.queued).toBe(1);

			expect(queued.cancel()).toBe(true);
			expect(queued.state).toBe(JobState.Cancelled);
			expect(pool.stats.queued).toBe(0);

			gate.resolve();
			await blocker.join();
			await flush();
			expect(ran).toBe(false);
			expect(pool.stats.completed).toBe(1);
			pool.shutdown();
		});

		test("the result of a job cancelled while running is discarded", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const main = new ExecutionContext();
			const gate = deferred<void>();
			const onResult = vi.fn();

			const job = pool.submit(
				async () => {
					await gate.promise;
					return 7;
				},
				{ context: main, onResult },
			);
			await flush();
			expect(job.state).toBe(JobState.Running);

			expect(job.cancel()).toBe(true);
			gate.resolve();
			await flush();

			expect(await main.runUntilIdle()).toBe(0);
			expect(onResult).not.toHaveBeenCalled();
			expect(job.state).toBe(JobState.Cancelled);
			expect(job.value).toBeUndefined();
			expect(job.error).toBeInstanceOf(CancellationError);
			expect(job.error).toMatchObject({ message: `${job.name} cancelled` });
			expect(pool.stats.completed).toBe(1);
			pool.shutdown();
		});

		test("a closure can check for cancellation cooperatively", async () => {
			const pool = new DispatcherPool({ workers: 1 });
			const gate = deferred<void>();
			const steps: string[] = [];

			const job = pool.submit(async ({ ensureActive, signal }) => {
				steps.push("started");
				await gate.promise;
				steps.push(`aborted: ${signal.aborted}`);
				ensureActive();
				steps.push("unreachable");
			});
			await flush();

			job.cancel("stop now");
			gate.resolve();
			await flush();

			expect(steps).toEqual(["started", "aborted: true"]);
			expect(job.state).toBe(JobState.Cancelled);
			expect(job.error).toMatchObject({ message: "stop now" });
			expect(job.signal.reason).toBe(job.error);
			pool.shutdown();
		});

		test("refuses a job that is no longer active", () => {
			const pool = new DispatcherPool({ workers: 1 });
			const job = new Job<number>({ name: "stale" });
			job.cancel();

			expect(() => pool.execute(job, () => 1)).toThrow(
				"stale already cancelled",
			);
			pool.shutdown();
		});
	});

	describe("shutdown", () => {
		test("rejects new work but finishes what was queued", async () => {
			const pool = new DispatcherPool({ name: "io", workers: 1 });
			const gate = deferred<void>();

			const running = pool.submit(() => gate.promise);
			const queued = pool.submit(() => "queued");

			pool.shutdown();
			expect(pool.isShutdown).toBe(true);
			expect(pool.isTerminated).toBe(false);
			expect(() => pool.submit(() => 1, { name: "late" })).toThrow(
				new RejectedSubmissionError("io is shut down; rejected late"),
			);

			gate.resolve();
			expect(await pool.awaitTermination()).toBe(true);
			expect(running.state).toBe(JobState.Completed);
			expect(queued.value).toBe("queued");
			expect(pool.isTerminated).toBe(true);
		});

		test("shutdownNow cancels queued jobs and returns them", async () => {
			const pool = new DispatcherPool({ name: "io", workers: 1 });
			const gate = deferred<void>();

			const running = pool.submit(() => gate.promise);
			const second = pool.submit(() => 2);
			const third = pool.submit(() => 3);
			await flush();

			const never = pool.shutdownNow();
			expect(never).toEqual([second, third]);
			expect(second.state).toBe(JobState.Cancelled);
			expect(third.error).toMatchObject({ message: "io shut down" });
			expect(pool.stats.queued).toBe(0);
			expect(running.state).toBe(JobState.Running);

			gate.resolve();
			expect(await pool.awaitTermination()).toBe(true);
			expect(running.state).toBe(JobState.Completed);
		});

		test("awaitTermination gives up after the timeout", async () => {
			const clock = createManualClock();
			const pool = new DispatcherPool({ workers: 1, clock });
			const gate = deferred<void>();

			pool.submit(() => gate.promise);
			await flush();
			pool.shutdown();

			const waiting = pool.awaitTermination(100);
			clock.advance(100);
			expect(await waiting).toBe(false);

			gate.resolve();
			expect(await pool.awaitTermination(100)).toBe(true);
			expect(clock.pendingTimers).toBe(0);
		});

		test("shutdown twice is harmless", async () => {
			const pool = new DispatcherPool({ workers: 2 });

			pool.shutdown();
			pool.shutdown();
			expect(await pool.awaitTermination()).toBe(true);
		});
	});

	describe("limits", () => {
		test("rejects submissions beyond the queue capacity", () => {
			const pool = new DispatcherPool({ name: "io", workers: 1, capacity: 1 });
			const gate = deferred<void>();

			pool.submit(() => gate.promise);
			pool.submit(() => 2);

			expect(() => pool.submit(() => 3, { name: "third" })).toThrow(
				"io queue is full (1); rejected third",
			);
			expect(pool.stats.queued).toBe(1);
			gate.resolve();
			pool.shutdown();
		});

		test("a job taken by an idle worker does not count against capacity", async () => {
			const pool = new DispatcherPool({ name: "io", workers: 1, capacity: 0 });
			const gate = deferred<void>();

			const first = pool.submit(() => gate.promise);
			expect(pool.stats.queued).toBe(0);
			expect(() => pool.submit(() => 2, { name: "second" })).toThrow(
				"io queue is full (0); rejected second",
			);

			gate.resolve();
			await first.join();
			expect(first.state).toBe(JobState.Completed);
			pool.shutdown();
		});

		test("validates the worker count and capacity", () => {
			expect(() => new DispatcherPool({ workers: 0 })).toThrow(
				new RangeError("workers must be a positive integer, got 0"),
			);
			expect(() => new DispatcherPool({ workers: 1.5 })).toThrow(RangeError);
			expect(() => new DispatcherPool({ workers: 1, capacity: -1 })).toThrow(
				"capacity must be non-negative, got -1",
			);
		});
	});
});
