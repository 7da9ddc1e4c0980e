import { WebSocketQueueFullError } from "./errors.js";

type Waiter = () => void;

/**
 * FIFO queue with a fixed capacity (0 = unbounded) and async put/get.
 *
 * `put` waits while the queue is full instead of dropping, which is how the
 * read loop pushes back on a slow consumer. Items may be any value except
 * `undefined`, which `shift()` uses for "empty".
 */
export class BoundedQueue<T extends {} | null> {
	readonly capacity: number;
	private readonly items: T[] = [];
	private readonly notEmpty: Waiter[] = [];
	private readonly notFull: Waiter[] = [];
	private dropped = 0;

	constructor(capacity: number) {
		this.capacity = Math.max(0, Math.floor(capacity));
	}

	get size(): number {
		return this.items.length;
	}

	get isEmpty(): boolean {
		return this.items.length === 0;
	}

	get isFull(): boolean {
		return this.capacity > 0 && this.items.length >= this.capacity;
	}

	/** Items refused by {@link tryPut}. */
	get droppedCount(): number {
		return this.dropped;
	}

	/** Adds an item, waiting for room. Resolves false when `signal` aborts first. */
	async put(item: T, signal?: AbortSignal): Promise<boolean> {
		while (this.isFull) {
			if (!(await this.wait(this.notFull, signal))) return false;
		}
		this.items.push(item);
		wakeOne(this.notEmpty);
		return true;
	}

	/**
	 * Adds an item without waiting; throws WebSocketQueueFullError when full.
	 * For callers feeding the queue directly. The manager's read loop uses
	 * `put` and never drops.
	 */
	tryPut(item: T): void {
		if (this.isFull) {
			this.dropped += 1;
			throw new WebSocketQueueFullError("Message queue is full", {
				queueSize: this.capacity,
				droppedCount: this.dropped,
			});
		}
		this.items.push(item);
		wakeOne(this.notEmpty);
	}

	/** Next item without waiting, or undefined when empty. */
	shift(): T | undefined {
		const item = this.items.shift();
		if (item !== undefined) wakeOne(this.notFull);
		return item;
	}

	/** Next item, waiting while empty. Resolves undefined when `signal` aborts first. */
	async get(signal?: AbortSignal): Promise<T | undefined> {
		while (true) {
			const item = this.shift();
			if (item !== undefined) return item;
			if (!(await this.wait(this.notEmpty, signal))) return undefined;
		}
	}

	/** Removes every item and releases blocked producers. */
	clear(): void {
		this.items.length = 0;
		for (const wake of this.notFull.splice(0)) wake();
	}

	private wait(waiters: Waiter[], signal: AbortSignal | undefined): Promise<boolean> {
		if (signal?.aborted) return Promise.resolve(false);
		return new Promise<boolean>((resolve) => {
			const onAbort = (): void => {
				const index = waiters.indexOf(wake);
				if (index !== -1) waiters.splice(index, 1);
				resolve(false);
			};
			const wake = (): void => {
				signal?.removeEventListener("abort", onAbort);
				resolve(true);
			};
			waiters.push(wake);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}

function wakeOne(waiters: Waiter[]): void {
	waiters.shift()?.();
}
