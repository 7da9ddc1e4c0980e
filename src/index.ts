// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	tryCatch,
	tryCatchAsync,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	raceTimeout,
	TIMED_OUT,
	type ConfigMapping,
	ENV_PREFIX,
	websocketConfigFromEnv,
	mergeConfig,
	getPath,
	ErrorCategory,
	InfraError,
	NetworkError,
	TimeoutError,
	HandshakeRejectedError,
	ConfigError,
	SystemError,
	ShutdownError,
	classifyError,
	isNetworkError,
	isTimeoutError,
	isConfigError,
	isSystemError,
	isShutdownError,
	isRetryable,
} from "./shared/index.js";

// ── WebSocket ───────────────────────────────────────────────────────
export {
	ConnectionState,
	DisconnectReason,
	ReconnectStrategy,
	canConnect,
	canSend,
	isProactive,
	isReactive,
	isTerminal,
	type ConnectionHooks,
	type InboundMessage,
	type JsonValue,
	type OutboundMessage,
	type SubscriptionAction,
	type SubscriptionMessageBuilder,
	WebSocketError,
	WebSocketConnectionError,
	WebSocketClosedError,
	WebSocketTimeoutError,
	WebSocketReconnectError,
	WebSocketProtocolError,
	WebSocketQueueFullError,
	LIMITS,
	getConnectionLimits,
	type ConnectionLimits,
	ReconnectionPolicy,
	computeDelay,
	type ReconnectionConfig,
	ConnectionStats,
	type ConnectionStatsView,
	BoundedQueue,
	canonicalJson,
	decodeFrame,
	encodeMessage,
	defaultSubscriptionMessage,
	resolveWebSocketOptions,
	type ResolvedWebSocketOptions,
	type WebSocketManagerOptions,
	WebSocketManager,
	type ReconnectWindowOptions,
	type RequestDisconnectOptions,
	type WebSocketManagerEvents,
} from "./websocket/index.js";

// ── Lifecycle ────────────────────────────────────────────────────────
export {
	AlertLevel,
	HealthStatus,
	type Alert,
	type AlertHook,
	type AlertSink,
	type HealthThresholds,
	type SupervisedTarget,
	Heartbeat,
	type HeartbeatOptions,
	GracefulShutdown,
	type GracefulShutdownOptions,
	type ShutdownCallback,
	type SignalSource,
	connectionAlertHooks,
	type ConnectionAlertHooks,
	type ConnectionAlertOptions,
} from "./lifecycle/index.js";

// ── Lib: WebSocket transport ────────────────────────────────────────
export { WsTransport, createWsConnector, wsConnector } from "./lib/websocket/index.js";
export type {
	CloseInfo,
	ConnectOptions,
	Frame,
	TransportConnection,
	TransportConnector,
	WsTransportOptions,
} from "./lib/websocket/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, rootLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, validateOr, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";
