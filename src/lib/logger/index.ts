/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Auto-redacts opaque objects (anything with `__opaque: true`, e.g. auth
 * headers handed to a transport) and supports path-based redaction for
 * sensitive fields such as `url` query tokens.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
	readonly bindings?: Record<string, unknown> | undefined;
}

/** Structured logger interface with auto-redaction of opaque values. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Opaque serializer ───────────────────────────────────────────────

function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true
	);
}

function redactOpaque(obj: Record<string, unknown>): Record<string, unknown> {
	if (isOpaque(obj)) return { value: "[REDACTED]" };
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaque(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Emit = (obj: Record<string, unknown> | string, msg?: string) => void;

function level(pinoLogger: pino.Logger, name: "info" | "warn" | "error" | "debug"): Emit {
	return (msgOrObj, msg) => {
		if (typeof msgOrObj === "string") {
			pinoLogger[name](msgOrObj);
		} else {
			pinoLogger[name](redactOpaque(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: level(pinoLogger, "info"),
		warn: level(pinoLogger, "warn"),
		error: level(pinoLogger, "error"),
		debug: level(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ url: "wss://stream.example.com" }, "connected");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const target = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				target.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	const logger = wrapPino(pinoLogger);
	return config.bindings ? logger.child(config.bindings) : logger;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((l) => l === value);
}

/** Reads RESILIENT_WS_LOG_LEVEL, falling back to `info` for unset or unknown values. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const raw = env["RESILIENT_WS_LOG_LEVEL"]?.trim().toLowerCase();
	return raw !== undefined && isLogLevel(raw) ? raw : "info";
}

/** Process-wide default logger. Components derive children from it unless given their own. */
export const rootLogger: Logger = createLogger({
	level: levelFromEnv(),
	bindings: { lib: "resilient-ws" },
});
