import { describe, expect, it } from "vitest";
import { WebSocketQueueFullError } from "./errors.js";
import { BoundedQueue } from "./queue.js";

describe("BoundedQueue", () => {
	it("returns items in FIFO order", async () => {
		const queue = new BoundedQueue<number>(10);
		await queue.put(1);
		await queue.put(2);
		await queue.put(3);

		expect(queue.size).toBe(3);
		expect([queue.shift(), queue.shift(), queue.shift(), queue.shift()]).toEqual([
			1,
			2,
			3,
			undefined,
		]);
	});

	it("blocks put while full and resumes after a get", async () => {
		const queue = new BoundedQueue<string>(1);
		await queue.put("a");

		let placed = false;
		const pending = queue.put("b").then((ok) => {
			placed = ok;
		});
		await Promise.resolve();
		expect(placed).toBe(false);
		expect(queue.size).toBe(1);

		expect(await queue.get()).toBe("a");
		await pending;
		expect(placed).toBe(true);
		expect(queue.shift()).toBe("b");
	});

	it("treats capacity 0 as unbounded", async () => {
		const queue = new BoundedQueue<number>(0);
		for (let i = 0; i < 5_000; i++) await queue.put(i);
		expect(queue.size).toBe(5_000);
		expect(queue.isFull).toBe(false);
	});

	it("get waits for the next put", async () => {
		const queue = new BoundedQueue<{ v: number }>(4);
		const pending = queue.get();
		await queue.put({ v: 7 });
		expect(await pending).toEqual({ v: 7 });
	});

	it("carries null items", async () => {
		const queue = new BoundedQueue<null>(2);
		await queue.put(null);
		expect(await queue.get()).toBeNull();
	});

	it("get resolves undefined when aborted", async () => {
		const queue = new BoundedQueue<number>(4);
		const controller = new AbortController();
		const pending = queue.get(controller.signal);
		controller.abort();
		expect(await pending).toBeUndefined();

		await queue.put(1);
		expect(queue.shift()).toBe(1);
	});

	it("put resolves false when aborted while full", async () => {
		const queue = new BoundedQueue<number>(1);
		await queue.put(1);
		const controller = new AbortController();
		const pending = queue.put(2, controller.signal);
		controller.abort();

		expect(await pending).toBe(false);
		expect(queue.size).toBe(1);
	});

	it("put returns false immediately for an aborted signal", async () => {
		const queue = new BoundedQueue<number>(1);
		await queue.put(1);
		expect(await queue.put(2, AbortSignal.abort())).toBe(false);
	});

	it("tryPut throws WebSocketQueueFullError and counts drops", () => {
		const queue = new BoundedQueue<number>(1);
		queue.tryPut(1);

		expect(() => queue.tryPut(2)).toThrow(WebSocketQueueFullError);
		try {
			queue.tryPut(3);
		} catch (error) {
			expect(error).toBeInstanceOf(WebSocketQueueFullError);
			if (error instanceof WebSocketQueueFullError) {
				expect(error.queueSize).toBe(1);
				expect(error.droppedCount).toBe(2);
			}
		}
		expect(queue.droppedCount).toBe(2);
	});

	it("clear empties the queue and releases blocked producers", async () => {
		const queue = new BoundedQueue<number>(1);
		await queue.put(1);
		const pending = queue.put(2);

		queue.clear();

		expect(await pending).toBe(true);
		expect(queue.shift()).toBe(2);
	});
});
