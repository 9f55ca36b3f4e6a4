/**
 * TaskQueue - ordered mailbox behind an execution context
 */

interface Entry<T> {
	readonly item: T;
	readonly dueAt: number;
	readonly seq: number;
}

/**
 * Pending items ordered by due time, then by insertion order.
 *
 * Items enqueued with non-decreasing due times (every plain post) come out
 * strictly FIFO. Delayed items slot in at their due time behind everything
 * already due at that instant.
 *
 * @example
 * ```typescript
 * const q = new TaskQueue<string>()
 * q.enqueue("later", 10)
 * q.enqueue("now", 0)
 * q.pollDue(5) // "now"
 * q.pollDue(5) // undefined, "later" is not due yet
 * ```
 */
export class TaskQueue<T> {
	private entries: Entry<T>[] = [];
	private head = 0; // Index of first live entry
	private seq = 0;

	get size(): number {
		return this.entries.length - this.head;
	}

	/** Sequence number of the most recently enqueued item, 0 if none. */
	get lastSeq(): number {
		return this.seq;
	}

	enqueue(item: T, dueAt: number): void {
		const entry: Entry<T> = { item, dueAt, seq: ++this.seq };
		const last = this.entries[this.entries.length - 1];
		if (this.size === 0 || (last !== undefined && last.dueAt <= dueAt)) {
			this.entries.push(entry);
			return;
		}
		// Upper bound: first entry due strictly later than this one
		let lo = this.head;
		let hi = this.entries.length;
		while (lo < hi) {
			const mid = (lo + hi) >>> 1;
			const candidate = this.entries[mid];
			if (candidate !== undefined && candidate.dueAt <= dueAt) {
				lo = mid + 1;
			} else {
				hi = mid;
			}
		}
		this.entries.splice(lo, 0, entry);
	}

	/** Due time of the oldest pending item. */
	nextDueAt(): number | undefined {
		return this.entries[this.head]?.dueAt;
	}

	hasDue(now: number, maxSeq = Number.POSITIVE_INFINITY): boolean {
		const first = this.entries[this.head];
		return first !== undefined && first.dueAt <= now && first.seq <= maxSeq;
	}

	/**
	 * Remove and return the oldest item due at `now`.
	 * Items enqueued after `maxSeq` are left in place.
	 */
	pollDue(now: number, maxSeq = Number.POSITIVE_INFINITY): T | undefined {
		if (!this.hasDue(now, maxSeq)) return undefined;
		const entry = this.entries[this.head++];
		this.compact();
		return entry?.item;
	}

	/**
	 * Remove every pending item matching the predicate.
	 * @returns how many were removed
	 */
	remove(predicate: (item: T) => boolean): number {
		const kept = this.entries
			.slice(this.head)
			.filter((entry) => !predicate(entry.item));
		const removed = this.size - kept.length;
		this.entries = kept;
		this.head = 0;
		return removed;
	}

	/** Remove everything and return the items in order. */
	clear(): T[] {
		const items = this.entries.slice(this.head).map((entry) => entry.item);
		this.entries = [];
		this.head = 0;
		return items;
	}

	private compact(): void {
		if (this.head === this.entries.length) {
			this.entries = [];
			this.head = 0;
		} else if (this.head > 100 && this.head > this.entries.length / 2) {
			this.entries = this.entries.slice(this.head);
			this.head = 0;
		}
	}
}
