export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	type InfraErrorOptions,
	InfraError,
	NetworkError,
	TimeoutError,
	HandshakeRejectedError,
	ConfigError,
	SystemError,
	ShutdownError,
	classifyError,
	toError,
	isNetworkError,
	isTimeoutError,
	isConfigError,
	isSystemError,
	isShutdownError,
	isRetryable,
} from "./errors.js";

export {
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	sleep,
	raceTimeout,
	TIMED_OUT,
} from "./time.js";

export {
	type ConfigMapping,
	ENV_PREFIX,
	websocketConfigFromEnv,
	mergeConfig,
	getPath,
	isConfigMapping,
} from "./config.js";
