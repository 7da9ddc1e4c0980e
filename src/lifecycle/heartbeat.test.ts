import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import { Duration, FakeClock } from "../shared/time.js";
import { Heartbeat } from "./heartbeat.js";
import type { HeartbeatOptions } from "./heartbeat.js";
import { HealthStatus } from "./types.js";
import type { SupervisedTarget } from "./types.js";

const logger = createLogger({ level: "silent" });

function createHeartbeat(options: HeartbeatOptions = {}): Heartbeat {
	return new Heartbeat({ intervalMs: 1_000, logger, ...options });
}

describe("Heartbeat", () => {
	describe("configuration", () => {
		it("defaults to a 10s interval", () => {
			expect(new Heartbeat({ logger }).intervalMs).toBe(Duration.seconds(10));
		});

		it("clamps the interval to 1s..300s", () => {
			expect(createHeartbeat({ intervalMs: 100 }).intervalMs).toBe(1_000);
			expect(createHeartbeat({ intervalMs: 1_000_000 }).intervalMs).toBe(300_000);
		});

		it("derives thresholds from the interval", () => {
			expect(createHeartbeat().thresholds).toEqual({ warningMs: 2_000, criticalMs: 5_000 });
		});
	});

	describe("status", () => {
		function withClock() {
			const clock = new FakeClock(1_000);
			const hb = createHeartbeat({ clock });
			return { hb, clock };
		}

		it("starts healthy", () => {
			const { hb } = withClock();
			expect(hb.status()).toBe(HealthStatus.Healthy);
		});

		it("degrades after the warning threshold", () => {
			const { hb, clock } = withClock();
			clock.advance(1_999);
			expect(hb.status()).toBe(HealthStatus.Healthy);
			clock.advance(1);
			expect(hb.status()).toBe(HealthStatus.Degraded);
		});

		it("turns critical after the critical threshold", () => {
			const { hb, clock } = withClock();
			clock.advance(5_000);
			expect(hb.status()).toBe(HealthStatus.Critical);
		});

		it("recovers on a beat", async () => {
			const { hb, clock } = withClock();
			clock.advance(6_000);
			await hb.beat();
			expect(hb.status()).toBe(HealthStatus.Healthy);
			expect(hb.silenceMs()).toBe(0);
		});
	});

	describe("loop", () => {
		beforeEach(() => {
			vi.useFakeTimers();
		});

		afterEach(() => {
			vi.useRealTimers();
		});

		it("beats at once and then every interval", async () => {
			const onBeat = vi.fn();
			const hb = createHeartbeat({ onBeat });

			hb.start();
			await vi.advanceTimersByTimeAsync(0);
			expect(hb.beats).toBe(1);
			expect(hb.isRunning).toBe(true);

			await vi.advanceTimersByTimeAsync(2_000);
			expect(hb.beats).toBe(3);
			expect(onBeat).toHaveBeenCalledTimes(3);

			await hb.stop();
		});

		it("start is idempotent", async () => {
			const hb = createHeartbeat();
			hb.start();
			hb.start();
			await vi.advanceTimersByTimeAsync(0);

			expect(hb.beats).toBe(1);
			await hb.stop();
		});

		it("stop halts the loop and can be repeated", async () => {
			const hb = createHeartbeat();
			hb.start();
			await vi.advanceTimersByTimeAsync(0);

			await hb.stop();
			await hb.stop();
			await vi.advanceTimersByTimeAsync(5_000);

			expect(hb.isRunning).toBe(false);
			expect(hb.beats).toBe(1);
		});

		it("shutdown stops for good", async () => {
			const hb = createHeartbeat();
			hb.start();
			await vi.advanceTimersByTimeAsync(0);

			await hb.shutdown();
			hb.start();
			await vi.advanceTimersByTimeAsync(5_000);

			expect(hb.isShutdown).toBe(true);
			expect(hb.isRunning).toBe(false);
			expect(hb.beats).toBe(1);
		});

		it("keeps beating when onBeat throws", async () => {
			const hb = createHeartbeat({
				onBeat: () => {
					throw new Error("beat hook broke");
				},
			});
			hb.start();
			await vi.advanceTimersByTimeAsync(1_000);

			expect(hb.beats).toBe(2);
			await hb.stop();
		});
	});

	describe("supervised target", () => {
		it("reports a dead target", async () => {
			const onTargetDead = vi.fn();
			const onAlert = vi.fn();
			const hb = createHeartbeat({ target: { isDead: true }, onTargetDead, onAlert });

			await hb.beat();

			expect(onTargetDead).toHaveBeenCalledTimes(1);
			expect(onAlert).toHaveBeenCalledWith("heartbeat", "Supervised target is dead", { beat: 1 });
		});

		it("ignores a live target", async () => {
			const onTargetDead = vi.fn();
			const hb = createHeartbeat({ target: { isDead: false }, onTargetDead });

			await hb.beat();

			expect(onTargetDead).not.toHaveBeenCalled();
		});

		it("ignores a target that was shut down", async () => {
			const onTargetDead = vi.fn();
			const onAlert = vi.fn();
			const hb = createHeartbeat({
				target: { isDead: true, isShutdown: true },
				onTargetDead,
				onAlert,
			});

			await hb.beat();

			expect(onTargetDead).not.toHaveBeenCalled();
			expect(onAlert).not.toHaveBeenCalled();
		});

		it("watches the replacement handed over by onTargetDead", async () => {
			const replacement: SupervisedTarget = { isDead: false };
			const hb: Heartbeat = createHeartbeat({
				target: { isDead: true },
				onTargetDead: () => hb.setTarget(replacement),
			});
			const spy = vi.spyOn(hb, "setTarget");

			await hb.beat();
			await hb.beat();

			expect(spy).toHaveBeenCalledTimes(1);
			expect(hb.target).toBe(replacement);
		});

		it("still alerts when onTargetDead throws", async () => {
			const onAlert = vi.fn();
			const hb = createHeartbeat({
				target: { isDead: true },
				onTargetDead: () => {
					throw new Error("rebuild failed");
				},
				onAlert,
			});

			await hb.beat();

			expect(onAlert).toHaveBeenCalledTimes(1);
			expect(hb.beats).toBe(1);
		});

		it("has no target by default", () => {
			expect(createHeartbeat().target).toBeNull();
		});
	});
});
