import { EventEmitter } from "eventemitter3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import { ShutdownError } from "../shared/errors.js";
import { GracefulShutdown } from "./shutdown.js";
import type { GracefulShutdownOptions } from "./shutdown.js";

const logger = createLogger({ level: "silent" });

function createShutdown(options: GracefulShutdownOptions = {}) {
	const source = new EventEmitter();
	const shutdown = new GracefulShutdown({ logger, signalSource: source, ...options });
	return { shutdown, source };
}

describe("GracefulShutdown", () => {
	describe("configuration", () => {
		it("has sensible defaults", () => {
			const { shutdown } = createShutdown();

			expect(shutdown.timeoutMs).toBe(30_000);
			expect(shutdown.signals).toEqual(["SIGINT", "SIGTERM"]);
			expect(shutdown.isShuttingDown).toBe(false);
			expect(shutdown.isInstalled).toBe(false);
		});

		it("clamps the budget to 5s..300s", () => {
			expect(createShutdown({ timeoutMs: 1_000 }).shutdown.timeoutMs).toBe(5_000);
			expect(createShutdown({ timeoutMs: 1_000_000 }).shutdown.timeoutMs).toBe(300_000);
		});
	});

	describe("register", () => {
		it("applies the default priority", () => {
			const { shutdown } = createShutdown();
			shutdown.register("db", () => undefined);
			shutdown.register("stream", () => undefined, { priority: 10, timeoutMs: 2_000 });

			expect(shutdown.registrations.map((r) => [r.name, r.priority, r.timeoutMs])).toEqual([
				["stream", 10, 2_000],
				["db", 100, null],
			]);
		});

		it("rejects a duplicate name", () => {
			const { shutdown } = createShutdown();
			shutdown.register("db", () => undefined);

			expect(() => shutdown.register("db", () => undefined)).toThrow(ShutdownError);
			expect(() => shutdown.register("db", () => undefined)).toThrow(/already registered/);
		});

		it("rejects registration once shutdown has started", async () => {
			const { shutdown } = createShutdown();
			await shutdown.trigger();

			expect(() => shutdown.register("late", () => undefined)).toThrow(/during shutdown/);
		});

		it("unregister reports whether the name existed", () => {
			const { shutdown } = createShutdown();
			shutdown.register("db", () => undefined);

			expect(shutdown.unregister("db")).toBe(true);
			expect(shutdown.unregister("db")).toBe(false);
			expect(shutdown.registrations).toEqual([]);
		});
	});

	describe("signal handlers", () => {
		it("install attaches to every signal", () => {
			const { shutdown, source } = createShutdown();
			shutdown.install();

			expect(shutdown.isInstalled).toBe(true);
			expect(source.listenerCount("SIGINT")).toBe(1);
			expect(source.listenerCount("SIGTERM")).toBe(1);
		});

		it("install twice throws", () => {
			const { shutdown } = createShutdown();
			shutdown.install();

			expect(() => shutdown.install()).toThrow(/already installed/);
		});

		it("uninstall detaches and tolerates repeats", () => {
			const { shutdown, source } = createShutdown();
			shutdown.install();
			shutdown.uninstall();
			shutdown.uninstall();

			expect(shutdown.isInstalled).toBe(false);
			expect(source.listenerCount("SIGTERM")).toBe(0);
		});

		it("a signal runs the callbacks and detaches", async () => {
			const { shutdown, source } = createShutdown();
			const cleanup = vi.fn();
			shutdown.register("cleanup", cleanup);
			shutdown.install();

			source.emit("SIGTERM", "SIGTERM");

			await expect(shutdown.wait(1_000)).resolves.toBe(true);
			expect(cleanup).toHaveBeenCalledTimes(1);
			expect(shutdown.isShuttingDown).toBe(true);
			expect(shutdown.isInstalled).toBe(false);
		});
	});

	describe("trigger", () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it("runs callbacks by priority, ties in registration order", async () => {
			const { shutdown } = createShutdown();
			const order: string[] = [];
			shutdown.register("third", () => void order.push("third"), { priority: 300 });
			shutdown.register("first", () => void order.push("first"));
			shutdown.register("first-too", () => void order.push("first-too"));
			shutdown.register("second", () => void order.push("second"), { priority: 200 });

			await shutdown.trigger();

			expect(order).toEqual(["first", "first-too", "second", "third"]);
		});

		it("runs each callback once", async () => {
			const { shutdown } = createShutdown();
			const cleanup = vi.fn();
			shutdown.register("cleanup", cleanup);

			await Promise.all([shutdown.trigger(), shutdown.trigger()]);
			await shutdown.trigger();

			expect(cleanup).toHaveBeenCalledTimes(1);
		});

		it("awaits async callbacks", async () => {
			const { shutdown } = createShutdown();
			const order: string[] = [];
			shutdown.register("flush", async () => {
				await new Promise<void>((resolve) => setTimeout(resolve, 100));
				order.push("flush");
			});
			shutdown.register("close", () => void order.push("close"), { priority: 200 });

			const run = shutdown.trigger();
			await vi.advanceTimersByTimeAsync(100);
			await run;

			expect(order).toEqual(["flush", "close"]);
		});

		it("continues past a failing callback", async () => {
			const { shutdown } = createShutdown();
			const order: string[] = [];
			shutdown.register(
				"fail",
				() => {
					throw new Error("cleanup broke");
				},
				{ priority: 1 },
			);
			shutdown.register("success", () => void order.push("success"), { priority: 2 });

			await shutdown.trigger();

			expect(order).toEqual(["success"]);
		});

		it("abandons a callback that exceeds its own timeout", async () => {
			const { shutdown } = createShutdown();
			const order: string[] = [];
			shutdown.register("slow", () => new Promise<void>(() => undefined), { timeoutMs: 50 });
			shutdown.register("fast", () => void order.push("fast"), { priority: 200 });

			const run = shutdown.trigger();
			await vi.advanceTimersByTimeAsync(49);
			expect(order).toEqual([]);
			await vi.advanceTimersByTimeAsync(1);
			await run;

			expect(order).toEqual(["fast"]);
		});

		it("skips what is left once the budget is spent", async () => {
			const { shutdown } = createShutdown({ timeoutMs: 5_000 });
			const fast = vi.fn();
			shutdown.register("hang", () => new Promise<void>(() => undefined));
			shutdown.register("fast", fast, { priority: 200 });

			const run = shutdown.trigger();
			await vi.advanceTimersByTimeAsync(5_000);
			await run;

			expect(fast).not.toHaveBeenCalled();
			await expect(shutdown.wait(0)).resolves.toBe(true);
		});

		it("wait is false when nothing triggers", async () => {
			const { shutdown } = createShutdown();

			const pending = shutdown.wait(1_000);
			await vi.advanceTimersByTimeAsync(1_000);

			await expect(pending).resolves.toBe(false);
		});
	});
});
