/**
 * InfraError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). The reconnect
 * loop keeps retrying retryable failures and gives up on the rest.
 */

/** Error severity categories that drive reconnect behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Optional cause chain accepted by every subclass. */
export interface InfraErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for infrastructure operations, with category-based retry semantics. */
export class InfraError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "InfraError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Retryable error for network connectivity failures. */
export class NetworkError extends InfraError {
	constructor(message: string, context: Record<string, unknown> & InfraErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, rest);
		this.name = "NetworkError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error for operations that did not finish in time. */
export class TimeoutError extends InfraError {
	constructor(message: string, context: Record<string, unknown> & InfraErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TimeoutError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable error when the server refuses the upgrade with a 4xx status. */
export class HandshakeRejectedError extends InfraError {
	readonly status: number;
	constructor(
		message: string,
		status: number,
		context: Record<string, unknown> & InfraErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(
			message,
			"HANDSHAKE_REJECTED",
			ErrorCategory.NonRetryable,
			{ ...rest, status },
			"check the endpoint URL and credentials",
		);
		this.name = "HandshakeRejectedError";
		this.status = status;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends InfraError {
	constructor(message: string, context: Record<string, unknown> & InfraErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends InfraError {
	constructor(message: string, context: Record<string, unknown> & InfraErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Misuse of the graceful-shutdown coordinator, e.g. a duplicate callback name. */
export class ShutdownError extends InfraError {
	constructor(message: string, context: Record<string, unknown> & InfraErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SHUTDOWN_ERROR", ErrorCategory.NonRetryable, rest);
		this.name = "ShutdownError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

const HANDSHAKE_STATUS = /unexpected server response: (\d{3})/;

const NETWORK_CODES: ReadonlySet<string> = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EPIPE",
	"EHOSTUNREACH",
	"ENETUNREACH",
]);

function errnoCode(error: Error): string | undefined {
	if (!("code" in error)) return undefined;
	const code: unknown = error.code;
	return typeof code === "string" ? code : undefined;
}

/** Classify an unknown error into the appropriate InfraError subtype by inspecting its code and message. */
export function classifyError(error: unknown): InfraError {
	if (error instanceof InfraError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = errnoCode(error);

		const handshake = HANDSHAKE_STATUS.exec(msg);
		if (handshake?.[1] !== undefined) {
			const status = Number.parseInt(handshake[1], 10);
			if (status >= 400 && status < 500 && status !== 408 && status !== 429) {
				return new HandshakeRejectedError(error.message, status, { cause: error });
			}
			return new NetworkError(error.message, { status, cause: error });
		}

		if (code === "ETIMEDOUT") {
			return new TimeoutError(error.message, { cause: error });
		}
		if (code !== undefined && NETWORK_CODES.has(code)) {
			return new NetworkError(error.message, { code, cause: error });
		}

		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("econnrefused") || msg.includes("socket hang up")) {
			return new NetworkError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

/** Normalizes a thrown value into an Error without losing the original. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for NetworkError. */
export function isNetworkError(e: unknown): e is NetworkError {
	return e instanceof NetworkError;
}

/** Type guard for TimeoutError. */
export function isTimeoutError(e: unknown): e is TimeoutError {
	return e instanceof TimeoutError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}

/** Type guard for ShutdownError. */
export function isShutdownError(e: unknown): e is ShutdownError {
	return e instanceof ShutdownError;
}

export function isRetryable(e: unknown): boolean {
	return classifyError(e).isRetryable;
}
