/**
 * Heartbeat — periodic liveness beat with an optional supervised target.
 *
 * Each beat records the time, checks the target and calls `onBeat`. A target
 * that is dead without having been shut down triggers `onTargetDead` (usually:
 * build a fresh manager and hand it over with `setTarget`) and an alert on the
 * "heartbeat" channel.
 *
 * Graduated status from silence since the last beat:
 * - Healthy: silence < warningMs
 * - Degraded: silence >= warningMs
 * - Critical: silence >= criticalMs
 */

import { toError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock, sleep } from "../shared/time.js";
import { rootLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { clamp } from "../websocket/limits.js";
import { HealthStatus } from "./types.js";
import type { AlertHook, HealthThresholds, SupervisedTarget } from "./types.js";

export const HEARTBEAT_INTERVAL = {
	defaultMs: Duration.seconds(10),
	minMs: Duration.seconds(1),
	maxMs: Duration.seconds(300),
} as const;

export interface HeartbeatOptions {
	/** Beat period, clamped to 1s..300s. Default 10s. */
	readonly intervalMs?: number | undefined;
	/** Defaults to 2 and 5 intervals. */
	readonly thresholds?: HealthThresholds | undefined;
	readonly target?: SupervisedTarget | undefined;
	readonly onTargetDead?: (() => void | Promise<void>) | undefined;
	readonly onAlert?: AlertHook | undefined;
	readonly onBeat?: (() => void | Promise<void>) | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

export class Heartbeat {
	readonly intervalMs: number;
	readonly thresholds: HealthThresholds;
	private readonly options: HeartbeatOptions;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private supervised: SupervisedTarget | null;
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	private lastBeatAt: number;
	private beatCount = 0;
	private shutdownRequested = false;

	constructor(options: HeartbeatOptions = {}) {
		this.options = options;
		this.intervalMs = clamp(
			options.intervalMs ?? HEARTBEAT_INTERVAL.defaultMs,
			HEARTBEAT_INTERVAL.minMs,
			HEARTBEAT_INTERVAL.maxMs,
		);
		this.thresholds = options.thresholds ?? {
			warningMs: this.intervalMs * 2,
			criticalMs: this.intervalMs * 5,
		};
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? rootLogger).child({ component: "heartbeat" });
		this.supervised = options.target ?? null;
		this.lastBeatAt = this.clock.now();
	}

	get target(): SupervisedTarget | null {
		return this.supervised;
	}

	/** Swaps the supervised target, e.g. after rebuilding a dead manager. */
	setTarget(target: SupervisedTarget | null): void {
		this.supervised = target;
	}

	get isRunning(): boolean {
		return this.controller !== null;
	}

	get isShutdown(): boolean {
		return this.shutdownRequested;
	}

	get beats(): number {
		return this.beatCount;
	}

	/** Starts beating now and every interval after. Idempotent. */
	start(): void {
		if (this.controller !== null || this.shutdownRequested) return;
		const controller = new AbortController();
		this.controller = controller;
		this.logger.info({ intervalMs: this.intervalMs }, "heartbeat started");
		this.loop = this.run(controller.signal).catch((error: unknown) => {
			this.logger.error({ error: toError(error).message }, "heartbeat loop failed");
		});
	}

	/** Stops the loop and waits for an in-flight beat. Idempotent. */
	async stop(): Promise<void> {
		const controller = this.controller;
		if (controller === null) return;
		this.controller = null;
		controller.abort();
		await this.loop;
		this.loop = null;
		this.logger.info({ beats: this.beatCount }, "heartbeat stopped");
	}

	/** Stops for good; `start()` is ignored afterwards. */
	async shutdown(): Promise<void> {
		this.shutdownRequested = true;
		await this.stop();
	}

	/** One beat: record, check the target, notify. */
	async beat(): Promise<void> {
		this.lastBeatAt = this.clock.now();
		this.beatCount += 1;

		const target = this.supervised;
		if (target !== null && target.isDead && target.isShutdown !== true) {
			this.logger.warn({ beat: this.beatCount }, "supervised target is dead");
			await this.callHook("onTargetDead", () => this.options.onTargetDead?.());
			await this.callHook("onAlert", () =>
				this.options.onAlert?.("heartbeat", "Supervised target is dead", {
					beat: this.beatCount,
				}),
			);
		}
		await this.callHook("onBeat", () => this.options.onBeat?.());
	}

	silenceMs(): number {
		return this.clock.now() - this.lastBeatAt;
	}

	status(): HealthStatus {
		const silence = this.silenceMs();
		if (silence >= this.thresholds.criticalMs) return HealthStatus.Critical;
		if (silence >= this.thresholds.warningMs) return HealthStatus.Degraded;
		return HealthStatus.Healthy;
	}

	private async run(signal: AbortSignal): Promise<void> {
		do {
			await this.beat();
		} while (!signal.aborted && (await sleep(this.intervalMs, signal)));
	}

	private async callHook(name: string, call: () => void | Promise<void>): Promise<void> {
		try {
			await call();
		} catch (error) {
			this.logger.error({ hook: name, error: toError(error).message }, "hook failed");
		}
	}
}
