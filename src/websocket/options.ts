import type { ConfigMapping } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import type { Logger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import type { TransportConnector } from "../lib/websocket/types.js";
import { getConnectionLimits } from "./limits.js";
import { ReconnectStrategy } from "./types.js";
import type { ConnectionHooks, OutboundMessage, SubscriptionMessageBuilder } from "./types.js";

export const DEFAULT_JITTER_FACTOR = 0.1;

/**
 * Constructor options. Explicit values win over `config`, which wins over the
 * built-in defaults. Durations are in milliseconds.
 */
export interface WebSocketManagerOptions extends ConnectionHooks {
	readonly pingIntervalMs?: number | undefined;
	readonly pingTimeoutMs?: number | undefined;
	readonly connectionTimeoutMs?: number | undefined;
	readonly reconnectStrategy?: ReconnectStrategy | undefined;
	readonly reconnectDelayMs?: number | undefined;
	readonly maxReconnectDelayMs?: number | undefined;
	readonly maxReconnectAttempts?: number | undefined;
	/** Re-enter the reconnect loop after reactive failures and triggerReconnect(). Default true. */
	readonly autoReconnect?: boolean | undefined;
	/** Inbound queue capacity; 0 is unbounded. */
	readonly queueSize?: number | undefined;
	/** Poll period of waitForReconnectWindow(). */
	readonly reconnectCheckIntervalMs?: number | undefined;
	/** How long before `maxConnectionAgeMs` the keepalive loop rotates the connection. */
	readonly disconnectMarginMs?: number | undefined;
	/** Server-imposed connection lifetime. Unset disables age-based rotation. */
	readonly maxConnectionAgeMs?: number | undefined;
	readonly jitterFactor?: number | undefined;
	/** Nested mapping with a `websocket` section, durations in seconds. */
	readonly config?: ConfigMapping | undefined;
	readonly headers?: Readonly<Record<string, string>> | undefined;
	readonly subscriptionMessage?: SubscriptionMessageBuilder | undefined;
	readonly connector?: TransportConnector | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

export interface ResolvedWebSocketOptions {
	readonly pingIntervalMs: number;
	readonly pingTimeoutMs: number;
	readonly connectionTimeoutMs: number;
	readonly reconnectStrategy: ReconnectStrategy;
	readonly reconnectDelayMs: number;
	readonly maxReconnectDelayMs: number;
	readonly maxReconnectAttempts: number;
	readonly autoReconnect: boolean;
	readonly queueSize: number;
	readonly reconnectCheckIntervalMs: number;
	readonly disconnectMarginMs: number;
	readonly maxConnectionAgeMs: number | null;
	readonly jitterFactor: number;
	readonly headers: Readonly<Record<string, string>>;
	readonly subscriptionMessage: SubscriptionMessageBuilder;
}

/** `{"method": "SUBSCRIBE", "params": [channel], "id": n}` and the UNSUBSCRIBE twin. */
export const defaultSubscriptionMessage: SubscriptionMessageBuilder = (
	action,
	channel,
	id,
): OutboundMessage => ({
	method: action === "subscribe" ? "SUBSCRIBE" : "UNSUBSCRIBE",
	params: [channel],
	id,
});

const duration = z.number().finite().nonnegative().optional();
const count = z.number().int().nonnegative().optional();

const explicitSchema = z.object({
	pingIntervalMs: z.number().finite().positive().optional(),
	pingTimeoutMs: z.number().finite().positive().optional(),
	connectionTimeoutMs: z.number().finite().positive().optional(),
	reconnectDelayMs: duration,
	maxReconnectDelayMs: duration,
	maxReconnectAttempts: count,
	queueSize: count,
	reconnectCheckIntervalMs: z.number().finite().positive().optional(),
	disconnectMarginMs: duration,
	maxConnectionAgeMs: z.number().finite().positive().optional(),
	jitterFactor: z.number().min(0).max(1).optional(),
	reconnectStrategy: z.nativeEnum(ReconnectStrategy).optional(),
});

/**
 * Merges explicit options, the config mapping and defaults.
 * @throws ConfigError when an explicit option is out of its domain
 */
export function resolveWebSocketOptions(
	options: WebSocketManagerOptions = {},
	logger?: Logger,
): ResolvedWebSocketOptions {
	const checked = validate(explicitSchema, {
		pingIntervalMs: options.pingIntervalMs,
		pingTimeoutMs: options.pingTimeoutMs,
		connectionTimeoutMs: options.connectionTimeoutMs,
		reconnectDelayMs: options.reconnectDelayMs,
		maxReconnectDelayMs: options.maxReconnectDelayMs,
		maxReconnectAttempts: options.maxReconnectAttempts,
		queueSize: options.queueSize,
		reconnectCheckIntervalMs: options.reconnectCheckIntervalMs,
		disconnectMarginMs: options.disconnectMarginMs,
		maxConnectionAgeMs: options.maxConnectionAgeMs,
		jitterFactor: options.jitterFactor,
		reconnectStrategy: options.reconnectStrategy,
	});
	if (!checked.ok) {
		throw new ConfigError("Invalid WebSocketManager options", {
			issues: checked.error.context["issues"],
			cause: checked.error,
		});
	}

	const limits = getConnectionLimits(options.config, logger);
	return {
		pingIntervalMs: options.pingIntervalMs ?? limits.pingInterval,
		pingTimeoutMs: options.pingTimeoutMs ?? limits.pingTimeout,
		connectionTimeoutMs: options.connectionTimeoutMs ?? limits.connectionTimeout,
		reconnectStrategy: options.reconnectStrategy ?? ReconnectStrategy.ExponentialBackoff,
		reconnectDelayMs: options.reconnectDelayMs ?? limits.reconnectDelay,
		maxReconnectDelayMs: options.maxReconnectDelayMs ?? limits.maxReconnectDelay,
		maxReconnectAttempts: options.maxReconnectAttempts ?? limits.maxReconnectAttempts,
		autoReconnect: options.autoReconnect ?? true,
		queueSize: options.queueSize ?? limits.queueSize,
		reconnectCheckIntervalMs: options.reconnectCheckIntervalMs ?? limits.reconnectCheckInterval,
		disconnectMarginMs: options.disconnectMarginMs ?? limits.disconnectMargin,
		maxConnectionAgeMs: options.maxConnectionAgeMs ?? null,
		jitterFactor: options.jitterFactor ?? DEFAULT_JITTER_FACTOR,
		headers: options.headers ?? {},
		subscriptionMessage: options.subscriptionMessage ?? defaultSubscriptionMessage,
	};
}
