/**
 * Connection manager types — states, disconnect reasons, hooks and messages.
 *
 * Five states model a connection from first dial to terminal close.
 * CLOSED is terminal: a new manager is needed to stream again.
 */

// ── Connection States ────────────────────────────────────────────────

export const ConnectionState = {
	/** No live connection; connect() or the reconnect loop may dial again */
	Disconnected: "disconnected",
	/** Opening handshake in progress */
	Connecting: "connecting",
	/** Live connection with read and keepalive loops running */
	Connected: "connected",
	/** Backing off or dialing after losing a connection */
	Reconnecting: "reconnecting",
	/** Terminal, reached through shutdown() or forceClose() only */
	Closed: "closed",
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

/** Whether a connection attempt may start from `state`. False only for CLOSED. */
export function canConnect(state: ConnectionState): boolean {
	return state !== ConnectionState.Closed;
}

export function isTerminal(state: ConnectionState): boolean {
	return state === ConnectionState.Closed;
}

/** Outbound messages are accepted in CONNECTED only. */
export function canSend(state: ConnectionState): boolean {
	return state === ConnectionState.Connected;
}

// ── Disconnect Reasons ───────────────────────────────────────────────

export const DisconnectReason = {
	/** Local close via forceClose() */
	NormalClose: "normal_close",
	/** Remote peer sent a close frame */
	ServerClose: "server_close",
	/** Transport failed or dropped without a close frame */
	NetworkError: "network_error",
	/** No pong within the keepalive window */
	PingTimeout: "ping_timeout",
	/** Caller forced the connection down with kill() */
	Killed: "killed",
	/** Caller or shouldDisconnect() asked for a planned reconnect */
	ProactiveReconnect: "proactive_reconnect",
	/** shutdown() */
	Shutdown: "shutdown",
} as const;

export type DisconnectReason = (typeof DisconnectReason)[keyof typeof DisconnectReason];

const PROACTIVE_REASONS: ReadonlySet<DisconnectReason> = new Set([
	DisconnectReason.ProactiveReconnect,
	DisconnectReason.Shutdown,
	DisconnectReason.NormalClose,
]);

/** Planned, locally initiated disconnects. Everything else is reactive. */
export function isProactive(reason: DisconnectReason): boolean {
	return PROACTIVE_REASONS.has(reason);
}

export function isReactive(reason: DisconnectReason): boolean {
	return !isProactive(reason);
}

// ── Reconnect Strategy ───────────────────────────────────────────────

export const ReconnectStrategy = {
	FixedDelay: "fixed_delay",
	ExponentialBackoff: "exponential_backoff",
	Immediate: "immediate",
} as const;

export type ReconnectStrategy = (typeof ReconnectStrategy)[keyof typeof ReconnectStrategy];

// ── Messages ─────────────────────────────────────────────────────────

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| readonly JsonValue[]
	| { readonly [key: string]: JsonValue };

/**
 * A decoded inbound frame: parsed JSON when the payload is JSON, otherwise
 * the raw text, or the raw bytes for binary frames that are not JSON.
 */
export type InboundMessage = JsonValue | Uint8Array;

/** Objects and arrays are JSON-encoded; strings and bytes are sent as-is. */
export type OutboundMessage =
	| string
	| Uint8Array
	| readonly unknown[]
	| { readonly [key: string]: unknown };

export type SubscriptionAction = "subscribe" | "unsubscribe";

/** Builds the wire payload for a subscription change. `id` increases per request. */
export type SubscriptionMessageBuilder = (
	action: SubscriptionAction,
	channel: string,
	id: number,
) => OutboundMessage;

// ── Hooks ────────────────────────────────────────────────────────────

type MaybePromise<T> = T | Promise<T>;

/**
 * Optional callbacks, each independently nullable. Sync or async; a hook
 * that throws or rejects is logged and otherwise ignored.
 */
export interface ConnectionHooks {
	/** Polled every ping interval while connected; true triggers a proactive reconnect. */
	readonly shouldDisconnect?: (() => MaybePromise<boolean>) | undefined;
	/**
	 * Consulted before each reconnect attempt. False stops retrying; a number
	 * defers the decision by that many milliseconds.
	 */
	readonly shouldReconnect?: (() => MaybePromise<boolean | number>) | undefined;
	readonly onConnect?: (() => MaybePromise<void>) | undefined;
	readonly onDisconnect?: ((reason: DisconnectReason) => MaybePromise<void>) | undefined;
	readonly onMessage?: ((message: InboundMessage) => MaybePromise<void>) | undefined;
	/** Operational alerts, e.g. reconnect attempts exhausted. */
	readonly onAlert?:
		| ((channel: string, message: string, context: Record<string, unknown>) => MaybePromise<void>)
		| undefined;
}
