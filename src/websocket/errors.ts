/**
 * WebSocket error taxonomy.
 *
 * Every error extends WebSocketError, which extends InfraError, so callers
 * can catch the whole family or branch on category and code.
 */

import { ErrorCategory, InfraError } from "../shared/errors.js";
import type { InfraErrorOptions } from "../shared/errors.js";
import { ABNORMAL_CLOSURE } from "../lib/websocket/types.js";

type Context = Record<string, unknown> & InfraErrorOptions;

export interface ConnectionErrorDetails {
	readonly url?: string | undefined;
	readonly attempts?: number | undefined;
	readonly lastError?: Error | null | undefined;
}

export interface ClosedErrorDetails {
	readonly code?: number | undefined;
	readonly reason?: string | undefined;
	readonly cause?: unknown;
}

export interface TimeoutErrorDetails {
	readonly operation?: string | undefined;
	readonly timeoutMs?: number | undefined;
}

export interface QueueFullErrorDetails {
	readonly queueSize?: number | undefined;
	readonly droppedCount?: number | undefined;
}

/** Base class for the connection manager's errors. */
export class WebSocketError extends InfraError {
	constructor(message: string, code: string, category: ErrorCategory, context: Context = {}) {
		const { cause, ...rest } = context;
		super(message, code, category, rest);
		this.name = "WebSocketError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Could not establish a connection. */
export class WebSocketConnectionError extends WebSocketError {
	readonly url: string;
	readonly attempts: number;
	readonly lastError: Error | null;

	constructor(message: string, details: ConnectionErrorDetails = {}) {
		const lastError = details.lastError ?? null;
		super(message, "WS_CONNECTION_FAILED", ErrorCategory.Retryable, {
			url: details.url ?? "",
			attempts: details.attempts ?? 0,
			...(lastError !== null && { cause: lastError }),
		});
		this.name = "WebSocketConnectionError";
		this.url = details.url ?? "";
		this.attempts = details.attempts ?? 0;
		this.lastError = lastError;
	}
}

/** The operation needs a live connection and there is none. */
export class WebSocketClosedError extends WebSocketError {
	readonly closeCode: number;
	readonly reason: string;

	constructor(message: string, details: ClosedErrorDetails = {}) {
		const closeCode = details.code ?? ABNORMAL_CLOSURE;
		const reason = details.reason ?? "";
		super(message, "WS_CLOSED", ErrorCategory.Retryable, {
			closeCode,
			reason,
			...(details.cause !== undefined && { cause: details.cause }),
		});
		this.name = "WebSocketClosedError";
		this.closeCode = closeCode;
		this.reason = reason;
	}
}

/** An operation did not complete within its deadline. */
export class WebSocketTimeoutError extends WebSocketError {
	readonly operation: string;
	readonly timeoutMs: number;

	constructor(message: string, details: TimeoutErrorDetails = {}) {
		super(message, "WS_TIMEOUT", ErrorCategory.Retryable, {
			operation: details.operation ?? "",
			timeoutMs: details.timeoutMs ?? 0,
		});
		this.name = "WebSocketTimeoutError";
		this.operation = details.operation ?? "";
		this.timeoutMs = details.timeoutMs ?? 0;
	}
}

/** Reconnect attempts were exhausted. */
export class WebSocketReconnectError extends WebSocketError {
	readonly attempts: number;
	readonly lastError: Error | null;

	constructor(message: string, details: Omit<ConnectionErrorDetails, "url"> = {}) {
		const lastError = details.lastError ?? null;
		super(message, "WS_RECONNECT_EXHAUSTED", ErrorCategory.NonRetryable, {
			attempts: details.attempts ?? 0,
			...(lastError !== null && { cause: lastError }),
		});
		this.name = "WebSocketReconnectError";
		this.attempts = details.attempts ?? 0;
		this.lastError = lastError;
	}
}

/** The peer violated the protocol or sent an unusable frame. */
export class WebSocketProtocolError extends WebSocketError {
	readonly protocolError: string;

	constructor(message: string, details: { readonly protocolError?: string | undefined } = {}) {
		super(message, "WS_PROTOCOL_ERROR", ErrorCategory.NonRetryable, {
			protocolError: details.protocolError ?? "",
		});
		this.name = "WebSocketProtocolError";
		this.protocolError = details.protocolError ?? "";
	}
}

/** A bounded queue refused an item. The manager's own queue blocks instead. */
export class WebSocketQueueFullError extends WebSocketError {
	readonly queueSize: number;
	readonly droppedCount: number;

	constructor(message: string, details: QueueFullErrorDetails = {}) {
		super(message, "WS_QUEUE_FULL", ErrorCategory.Retryable, {
			queueSize: details.queueSize ?? 0,
			droppedCount: details.droppedCount ?? 0,
		});
		this.name = "WebSocketQueueFullError";
		this.queueSize = details.queueSize ?? 0;
		this.droppedCount = details.droppedCount ?? 0;
	}
}
