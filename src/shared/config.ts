/**
 * Configuration mapping helpers.
 *
 * Components take a nested, loosely typed mapping (as loaded from a YAML or
 * JSON file) and resolve their own section from it. This module builds such
 * mappings from environment variables and merges layers of them.
 */

import { ConfigError } from "./errors.js";

/** Nested configuration tree; leaves are whatever the loader produced. */
export interface ConfigMapping {
	readonly [key: string]: unknown;
}

/** Environment prefix for every variable this library reads. */
export const ENV_PREFIX = "RESILIENT_WS_";

interface EnvBinding {
	readonly env: string;
	readonly path: readonly string[];
	readonly integer: boolean;
}

const WEBSOCKET_ENV: readonly EnvBinding[] = [
	{ env: "PING_INTERVAL", path: ["websocket", "ping", "interval"], integer: false },
	{ env: "PING_TIMEOUT", path: ["websocket", "ping", "timeout"], integer: false },
	{ env: "CONNECTION_TIMEOUT", path: ["websocket", "connection", "timeout"], integer: false },
	{ env: "RECONNECT_DELAY", path: ["websocket", "reconnect", "delay"], integer: false },
	{ env: "RECONNECT_MAX_DELAY", path: ["websocket", "reconnect", "max_delay"], integer: false },
	{
		env: "RECONNECT_MAX_ATTEMPTS",
		path: ["websocket", "reconnect", "max_attempts"],
		integer: true,
	},
	{ env: "QUEUE_SIZE", path: ["websocket", "queue", "size"], integer: true },
];

/**
 * Reads websocket settings from environment variables into a nested mapping.
 * Durations are in seconds, as in a config file. Supported:
 * RESILIENT_WS_PING_INTERVAL, RESILIENT_WS_PING_TIMEOUT, RESILIENT_WS_CONNECTION_TIMEOUT,
 * RESILIENT_WS_RECONNECT_DELAY, RESILIENT_WS_RECONNECT_MAX_DELAY,
 * RESILIENT_WS_RECONNECT_MAX_ATTEMPTS, RESILIENT_WS_QUEUE_SIZE.
 * @throws ConfigError if a variable holds a malformed or negative number
 */
export function websocketConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigMapping {
	let mapping: ConfigMapping = {};
	for (const binding of WEBSOCKET_ENV) {
		const key = `${ENV_PREFIX}${binding.env}`;
		const raw = env[key];
		if (raw === undefined || raw.trim() === "") continue;
		const parsed = binding.integer ? strictParseInt(raw) : strictParseNumber(raw);
		if (Number.isNaN(parsed) || parsed < 0) {
			const kind = binding.integer ? "a non-negative integer" : "a non-negative number";
			throw new ConfigError(`Invalid ${key}: "${raw}" must be ${kind}`, { key });
		}
		mapping = mergeConfig(mapping, nest(binding.path, parsed));
	}
	return mapping;
}

/**
 * Deep-merges mappings left to right; later layers win. Nested mappings merge
 * key by key, any other value (arrays included) replaces the earlier one.
 */
export function mergeConfig(...layers: readonly ConfigMapping[]): ConfigMapping {
	const out: Record<string, unknown> = {};
	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			const existing = out[key];
			out[key] =
				isConfigMapping(existing) && isConfigMapping(value) ? mergeConfig(existing, value) : value;
		}
	}
	return out;
}

/** Walks `path` through nested mappings; undefined when any segment is missing. */
export function getPath(mapping: ConfigMapping, path: readonly string[]): unknown {
	let node: unknown = mapping;
	for (const segment of path) {
		if (!isConfigMapping(node)) return undefined;
		node = node[segment];
	}
	return node;
}

export function isConfigMapping(value: unknown): value is ConfigMapping {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nest(path: readonly string[], value: unknown): ConfigMapping {
	let node: unknown = value;
	for (let i = path.length - 1; i >= 0; i--) {
		const segment = path[i];
		if (segment === undefined) continue;
		node = { [segment]: node };
	}
	return isConfigMapping(node) ? node : {};
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function strictParseNumber(raw: string): number {
	const trimmed = raw.trim();
	if (!/^\d+(\.\d+)?$/.test(trimmed)) return Number.NaN;
	return Number(trimmed);
}
