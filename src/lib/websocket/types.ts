/**
 * Transport boundary between the connection manager and a WebSocket implementation.
 *
 * The manager only ever talks to these interfaces, so tests can script a
 * connection without a socket and the `ws` package stays in one module.
 */

/** One inbound or outbound frame: text as a string, binary as bytes. */
export type Frame = string | Uint8Array;

/** How an established connection ended. */
export interface CloseInfo {
	/** WebSocket close code; 1006 when the connection dropped without a close frame. */
	readonly code: number;
	readonly reason: string;
	/** Transport error that ended the stream, if any. */
	readonly error?: Error | undefined;
}

export interface ConnectOptions {
	/** Upper bound for the opening handshake. */
	readonly timeoutMs: number;
	/** Aborting cancels a pending handshake. */
	readonly signal?: AbortSignal | undefined;
	readonly headers?: Readonly<Record<string, string>> | undefined;
}

/** An open, exclusively owned connection. */
export interface TransportConnection {
	send(data: Frame): Promise<void>;
	/** Sends a ping; resolves when the matching pong arrives. */
	ping(): Promise<void>;
	/** Starts the closing handshake; resolves once the socket is closed. */
	close(code?: number, reason?: string): Promise<void>;
	/** Inbound frames in arrival order; ends when the connection closes. */
	frames(): AsyncIterable<Frame>;
	/** Set once the connection has closed, null while it is open. */
	closeInfo(): CloseInfo | null;
}

/** Opens a connection to `url`; rejects when the handshake fails or times out. */
export type TransportConnector = (
	url: string,
	options: ConnectOptions,
) => Promise<TransportConnection>;

/** Close code for a connection lost without a close frame. */
export const ABNORMAL_CLOSURE = 1006;
export const NORMAL_CLOSURE = 1000;
