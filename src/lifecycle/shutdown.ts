/**
 * GracefulShutdown — ordered cleanup on SIGINT/SIGTERM.
 *
 * Callbacks run once, lowest priority first (ties in registration order).
 * A failing or slow callback is logged and skipped; the rest still run. The
 * whole run is bounded by `timeoutMs`.
 */

import { ShutdownError } from "../shared/errors.js";
import { tryCatchAsync } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock, TIMED_OUT, raceTimeout } from "../shared/time.js";
import { rootLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { clamp } from "../websocket/limits.js";
import { Signal } from "../websocket/signal.js";

export const DEFAULT_SHUTDOWN_PRIORITY = 100;

export const SHUTDOWN_TIMEOUT = {
	defaultMs: Duration.seconds(30),
	minMs: Duration.seconds(5),
	maxMs: Duration.seconds(300),
} as const;

export type ShutdownCallback = () => void | Promise<void>;

export interface ShutdownRegistration {
	readonly name: string;
	readonly callback: ShutdownCallback;
	readonly priority: number;
	readonly timeoutMs: number | null;
}

/** Where signal handlers attach. `process` by default. */
export interface SignalSource {
	on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
	off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface GracefulShutdownOptions {
	/** Budget for the whole run, clamped to 5s..300s. Default 30s. */
	readonly timeoutMs?: number | undefined;
	readonly signals?: readonly NodeJS.Signals[] | undefined;
	readonly signalSource?: SignalSource | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

export class GracefulShutdown {
	readonly timeoutMs: number;
	readonly signals: readonly NodeJS.Signals[];
	private readonly source: SignalSource;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly callbacks = new Map<string, ShutdownRegistration>();
	private readonly completed = new Signal();
	private readonly onSignal = (signal: NodeJS.Signals): void => {
		this.logger.info({ signal }, "termination signal received");
		void this.trigger();
	};
	private running: Promise<void> | null = null;
	private installed = false;

	constructor(options: GracefulShutdownOptions = {}) {
		this.timeoutMs = clamp(
			options.timeoutMs ?? SHUTDOWN_TIMEOUT.defaultMs,
			SHUTDOWN_TIMEOUT.minMs,
			SHUTDOWN_TIMEOUT.maxMs,
		);
		this.signals = options.signals ?? ["SIGINT", "SIGTERM"];
		this.source = options.signalSource ?? process;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? rootLogger).child({ component: "shutdown" });
	}

	get isShuttingDown(): boolean {
		return this.running !== null;
	}

	get isInstalled(): boolean {
		return this.installed;
	}

	get registrations(): readonly ShutdownRegistration[] {
		return this.ordered();
	}

	/**
	 * @throws ShutdownError when the name is taken or shutdown has started
	 */
	register(
		name: string,
		callback: ShutdownCallback,
		options: { readonly priority?: number | undefined; readonly timeoutMs?: number | undefined } = {},
	): void {
		if (this.running !== null) {
			throw new ShutdownError(`Cannot register "${name}" during shutdown`, { name });
		}
		if (this.callbacks.has(name)) {
			throw new ShutdownError(`Callback "${name}" is already registered`, { name });
		}
		this.callbacks.set(name, {
			name,
			callback,
			priority: options.priority ?? DEFAULT_SHUTDOWN_PRIORITY,
			timeoutMs: options.timeoutMs ?? null,
		});
	}

	unregister(name: string): boolean {
		return this.callbacks.delete(name);
	}

	/** @throws ShutdownError when already installed */
	install(): void {
		if (this.installed) {
			throw new ShutdownError("Signal handlers are already installed");
		}
		for (const signal of this.signals) this.source.on(signal, this.onSignal);
		this.installed = true;
		this.logger.debug({ signals: this.signals }, "signal handlers installed");
	}

	uninstall(): void {
		if (!this.installed) return;
		for (const signal of this.signals) this.source.off(signal, this.onSignal);
		this.installed = false;
	}

	/** Runs every callback once. Later calls return the same run. */
	trigger(): Promise<void> {
		if (this.running === null) {
			this.running = this.runCallbacks();
		}
		return this.running;
	}

	/** True once a run has completed, false when `timeoutMs` passes first. */
	wait(timeoutMs: number): Promise<boolean> {
		return this.completed.wait(timeoutMs);
	}

	private ordered(): ShutdownRegistration[] {
		// Map iteration is insertion order and sort is stable.
		return [...this.callbacks.values()].sort((a, b) => a.priority - b.priority);
	}

	private async runCallbacks(): Promise<void> {
		const deadline = this.clock.now() + this.timeoutMs;
		const queue = this.ordered();
		this.logger.info({ callbacks: queue.length }, "graceful shutdown started");

		for (const registration of queue) {
			const remaining = deadline - this.clock.now();
			if (remaining <= 0) {
				this.logger.error({ callback: registration.name }, "shutdown budget exhausted, skipping");
				continue;
			}
			const limit = Math.min(registration.timeoutMs ?? remaining, remaining);
			const outcome = await raceTimeout(
				tryCatchAsync(async () => registration.callback()),
				limit,
			);
			if (outcome === TIMED_OUT) {
				this.logger.error(
					{ callback: registration.name, timeoutMs: limit },
					"shutdown callback timed out",
				);
			} else if (!outcome.ok) {
				this.logger.error(
					{ callback: registration.name, error: outcome.error.message },
					"shutdown callback failed",
				);
			}
		}

		this.uninstall();
		this.completed.set();
		this.logger.info("graceful shutdown complete");
	}
}
