export {
	ConnectionState,
	DisconnectReason,
	ReconnectStrategy,
	canConnect,
	canSend,
	isProactive,
	isReactive,
	isTerminal,
} from "./types.js";
export type {
	ConnectionHooks,
	InboundMessage,
	JsonValue,
	OutboundMessage,
	SubscriptionAction,
	SubscriptionMessageBuilder,
} from "./types.js";
export {
	WebSocketError,
	WebSocketConnectionError,
	WebSocketClosedError,
	WebSocketTimeoutError,
	WebSocketReconnectError,
	WebSocketProtocolError,
	WebSocketQueueFullError,
} from "./errors.js";
export { LIMITS, clamp, getConnectionLimits, readLimit } from "./limits.js";
export type { ConnectionLimits, LimitName, LimitSpec } from "./limits.js";
export { ReconnectionPolicy, computeDelay } from "./reconnection.js";
export type { ReconnectionConfig } from "./reconnection.js";
export { ConnectionStats } from "./stats.js";
export type { ConnectionStatsView } from "./stats.js";
export { BoundedQueue } from "./queue.js";
export { Signal } from "./signal.js";
export { canonicalJson, decodeFrame, encodeMessage, frameByteLength } from "./codec.js";
export {
	DEFAULT_JITTER_FACTOR,
	defaultSubscriptionMessage,
	resolveWebSocketOptions,
} from "./options.js";
export type { ResolvedWebSocketOptions, WebSocketManagerOptions } from "./options.js";
export { WebSocketManager } from "./ws-manager.js";
export type {
	ReconnectWindowOptions,
	RequestDisconnectOptions,
	WebSocketManagerEvents,
} from "./ws-manager.js";
