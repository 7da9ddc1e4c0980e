export {
	AlertLevel,
	HealthStatus,
	type Alert,
	type AlertHook,
	type AlertSink,
	type HealthThresholds,
	type SupervisedTarget,
} from "./types.js";

export { HEARTBEAT_INTERVAL, Heartbeat, type HeartbeatOptions } from "./heartbeat.js";

export {
	DEFAULT_SHUTDOWN_PRIORITY,
	GracefulShutdown,
	SHUTDOWN_TIMEOUT,
	type GracefulShutdownOptions,
	type ShutdownCallback,
	type ShutdownRegistration,
	type SignalSource,
} from "./shutdown.js";

export {
	connectionAlertHooks,
	type ConnectionAlertHooks,
	type ConnectionAlertOptions,
} from "./alerts.js";
