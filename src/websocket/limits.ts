/**
 * Connection limits — defaults and hard bounds for values read from config.
 *
 * Config files express durations in seconds; the resolved limits are in
 * milliseconds. Out-of-range values are clamped, malformed ones fall back
 * to the default with a warning.
 */

import { getPath } from "../shared/config.js";
import type { ConfigMapping } from "../shared/config.js";
import { Duration } from "../shared/time.js";
import type { Logger } from "../lib/logger/index.js";
import { validateOr, z } from "../lib/validation/index.js";

export interface LimitSpec {
	/** Path below the config root, e.g. ["websocket", "ping", "interval"]. */
	readonly path: readonly string[];
	readonly defaultValue: number;
	readonly min: number;
	readonly max: number;
	/** "seconds" values are converted to milliseconds; "count" values are whole numbers. */
	readonly unit: "seconds" | "count";
}

export const LIMITS = {
	pingInterval: {
		path: ["websocket", "ping", "interval"],
		defaultValue: 20,
		min: 5,
		max: 60,
		unit: "seconds",
	},
	pingTimeout: {
		path: ["websocket", "ping", "timeout"],
		defaultValue: 10,
		min: 5,
		max: 30,
		unit: "seconds",
	},
	connectionTimeout: {
		path: ["websocket", "connection", "timeout"],
		defaultValue: 30,
		min: 5,
		max: 120,
		unit: "seconds",
	},
	reconnectDelay: {
		path: ["websocket", "reconnect", "delay"],
		defaultValue: 1,
		min: 0,
		max: 300,
		unit: "seconds",
	},
	maxReconnectDelay: {
		path: ["websocket", "reconnect", "max_delay"],
		defaultValue: 60,
		min: 1,
		max: 600,
		unit: "seconds",
	},
	maxReconnectAttempts: {
		path: ["websocket", "reconnect", "max_attempts"],
		defaultValue: 10,
		min: 0,
		max: 100,
		unit: "count",
	},
	queueSize: {
		path: ["websocket", "queue", "size"],
		defaultValue: 1000,
		min: 0,
		max: 10_000,
		unit: "count",
	},
	reconnectCheckInterval: {
		path: ["websocket", "proactive", "reconnect_check_interval"],
		defaultValue: 5,
		min: 0.5,
		max: 60,
		unit: "seconds",
	},
	disconnectMargin: {
		path: ["websocket", "proactive", "disconnect_margin"],
		defaultValue: 300,
		min: 60,
		max: 3_600,
		unit: "seconds",
	},
} as const satisfies Record<string, LimitSpec>;

export type LimitName = keyof typeof LIMITS;

/** Resolved limits in milliseconds (durations) or plain counts. */
export type ConnectionLimits = { readonly [K in LimitName]: number };

const secondsSchema = z.number().finite();
const countSchema = z.number().int();

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

/** Value of one limit from `config`, clamped; the default when absent or malformed. */
export function readLimit(
	spec: LimitSpec,
	config: ConfigMapping | undefined,
	logger?: Logger,
): number {
	const raw = config === undefined ? undefined : getPath(config, spec.path);
	const schema = spec.unit === "count" ? countSchema : secondsSchema;
	const value = validateOr(schema, raw, spec.defaultValue, (error) => {
		logger?.warn(
			{ path: spec.path.join("."), value: String(raw), issues: error.context["issues"] },
			"invalid config value, using default",
		);
	});
	const bounded = clamp(value, spec.min, spec.max);
	return spec.unit === "seconds" ? Duration.seconds(bounded) : bounded;
}

/** Reads every limit from the `websocket` section of a config mapping. */
export function getConnectionLimits(config?: ConfigMapping, logger?: Logger): ConnectionLimits {
	return {
		pingInterval: readLimit(LIMITS.pingInterval, config, logger),
		pingTimeout: readLimit(LIMITS.pingTimeout, config, logger),
		connectionTimeout: readLimit(LIMITS.connectionTimeout, config, logger),
		reconnectDelay: readLimit(LIMITS.reconnectDelay, config, logger),
		maxReconnectDelay: readLimit(LIMITS.maxReconnectDelay, config, logger),
		maxReconnectAttempts: readLimit(LIMITS.maxReconnectAttempts, config, logger),
		queueSize: readLimit(LIMITS.queueSize, config, logger),
		reconnectCheckInterval: readLimit(LIMITS.reconnectCheckInterval, config, logger),
		disconnectMargin: readLimit(LIMITS.disconnectMargin, config, logger),
	};
}
