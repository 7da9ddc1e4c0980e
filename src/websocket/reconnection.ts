import { ReconnectStrategy } from "./types.js";

export interface ReconnectionConfig {
	readonly strategy: ReconnectStrategy;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** Consecutive failed attempts allowed before giving up. 0 gives up immediately. */
	readonly maxAttempts: number;
	readonly jitterFactor: number;
}

/**
 * Delay before reconnect attempt number `attempt` (0-based).
 *
 * EXPONENTIAL_BACKOFF doubles from `baseDelayMs`, caps at `maxDelayMs` and
 * jitters by ±`jitterFactor` of the capped value. FIXED_DELAY is always
 * `baseDelayMs`; IMMEDIATE is always 0.
 */
export function computeDelay(
	config: ReconnectionConfig,
	attempt: number,
	random: () => number = Math.random,
): number {
	switch (config.strategy) {
		case ReconnectStrategy.Immediate:
			return 0;
		case ReconnectStrategy.FixedDelay:
			return Math.max(0, config.baseDelayMs);
		case ReconnectStrategy.ExponentialBackoff: {
			const raw = config.baseDelayMs * 2 ** attempt;
			const capped = Math.min(raw, config.maxDelayMs);
			if (config.jitterFactor === 0) return capped;
			const jitter = capped * config.jitterFactor * (random() * 2 - 1);
			return Math.max(0, Math.round(capped + jitter));
		}
	}
}

/**
 * Attempt counter over {@link computeDelay}. The manager calls `nextDelay()`
 * before each attempt and `reset()` after a successful connect.
 */
export class ReconnectionPolicy {
	private readonly config: ReconnectionConfig;
	private attempts = 0;

	constructor(config: ReconnectionConfig) {
		this.config = config;
	}

	get attemptCount(): number {
		return this.attempts;
	}

	get maxAttempts(): number {
		return this.config.maxAttempts;
	}

	nextDelay(): number {
		const delay = computeDelay(this.config, this.attempts);
		this.attempts += 1;
		return delay;
	}

	reset(): void {
		this.attempts = 0;
	}

	shouldRetry(): boolean {
		return this.attempts < this.config.maxAttempts;
	}
}
