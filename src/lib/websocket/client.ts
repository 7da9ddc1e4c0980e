import WebSocket from "ws";
import { NetworkError, classifyError } from "../../shared/errors.js";
import { NORMAL_CLOSURE } from "./types.js";
import type {
	CloseInfo,
	ConnectOptions,
	Frame,
	TransportConnection,
	TransportConnector,
} from "./types.js";

export interface WsTransportOptions {
	/** Frames buffered locally before the socket stops reading. */
	readonly highWaterMark?: number | undefined;
	/** How long close() waits for the closing handshake before terminating. */
	readonly closeTimeoutMs?: number | undefined;
}

const DEFAULT_HIGH_WATER_MARK = 64;
const DEFAULT_CLOSE_TIMEOUT_MS = 1_000;

interface PongWaiter {
	readonly resolve: () => void;
	readonly reject: (error: Error) => void;
}

/**
 * TransportConnection over the `ws` package.
 *
 * Inbound frames are buffered until the consumer pulls them through
 * `frames()`. Past `highWaterMark` buffered frames the socket is paused, so a
 * slow consumer pushes back on the TCP connection instead of growing memory.
 */
export class WsTransport implements TransportConnection {
	private readonly socket: WebSocket;
	private readonly highWaterMark: number;
	private readonly closeTimeoutMs: number;
	private readonly buffer: Frame[] = [];
	private readonly pongWaiters: PongWaiter[] = [];
	private readonly closeWaiters: Array<() => void> = [];
	private wake: (() => void) | null = null;
	private lastError: Error | undefined;
	private info: CloseInfo | null = null;

	private constructor(socket: WebSocket, options: WsTransportOptions) {
		this.socket = socket;
		this.highWaterMark = Math.max(1, options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK);
		this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;

		socket.on("message", (data, isBinary) => {
			const bytes = rawToBuffer(data);
			this.push(
				isBinary
					? new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength)
					: bytes.toString("utf8"),
			);
		});
		socket.on("pong", () => {
			for (const waiter of this.pongWaiters.splice(0)) waiter.resolve();
		});
		socket.on("error", (error) => {
			this.lastError = error;
		});
		socket.on("close", (code, reason) => this.handleClose(code, reason.toString()));
	}

	/**
	 * Opens a socket and resolves once the handshake completes.
	 * Rejects with a classified InfraError (NetworkError, TimeoutError,
	 * HandshakeRejectedError) when it does not.
	 */
	static connect(
		url: string,
		options: ConnectOptions,
		transportOptions: WsTransportOptions = {},
	): Promise<WsTransport> {
		return new Promise<WsTransport>((resolve, reject) => {
			if (options.signal?.aborted) {
				reject(new NetworkError("WebSocket connect aborted", { url }));
				return;
			}
			const socket = new WebSocket(url, {
				handshakeTimeout: options.timeoutMs,
				...(options.headers !== undefined && { headers: { ...options.headers } }),
			});
			let settled = false;

			const onAbort = (): void => {
				fail(new NetworkError("WebSocket connect aborted", { url }));
			};
			// Stays attached after a failure: ws may still emit errors while tearing down.
			const fail = (error: Error): void => {
				if (settled) return;
				settled = true;
				options.signal?.removeEventListener("abort", onAbort);
				socket.terminate();
				reject(classifyError(error));
			};

			const onHandshakeClose = (code: number): void => {
				fail(new NetworkError(`WebSocket closed during handshake (code ${code})`, { url }));
			};

			socket.on("error", fail);
			socket.once("close", onHandshakeClose);
			socket.once("open", () => {
				if (settled) return;
				settled = true;
				options.signal?.removeEventListener("abort", onAbort);
				const transport = new WsTransport(socket, transportOptions);
				socket.off("error", fail);
				socket.off("close", onHandshakeClose);
				resolve(transport);
			});
			options.signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	send(data: Frame): Promise<void> {
		if (this.socket.readyState !== WebSocket.OPEN) {
			return Promise.reject(new NetworkError("WebSocket is not open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.socket.send(data, (error) => {
				if (error) {
					reject(new NetworkError("WebSocket send failed", { cause: error }));
				} else {
					resolve();
				}
			});
		});
	}

	ping(): Promise<void> {
		if (this.socket.readyState !== WebSocket.OPEN) {
			return Promise.reject(new NetworkError("WebSocket is not open"));
		}
		return new Promise<void>((resolve, reject) => {
			const waiter: PongWaiter = { resolve, reject };
			this.pongWaiters.push(waiter);
			this.socket.ping(undefined, undefined, (error) => {
				if (!error) return;
				const index = this.pongWaiters.indexOf(waiter);
				if (index !== -1) this.pongWaiters.splice(index, 1);
				reject(new NetworkError("WebSocket ping failed", { cause: error }));
			});
		});
	}

	close(code: number = NORMAL_CLOSURE, reason = ""): Promise<void> {
		if (this.info !== null) return Promise.resolve();
		return new Promise<void>((resolve) => {
			const timer = setTimeout(() => this.socket.terminate(), this.closeTimeoutMs);
			this.closeWaiters.push(() => {
				clearTimeout(timer);
				resolve();
			});
			// The peer's close frame is only read while the socket is flowing.
			if (this.socket.isPaused) this.socket.resume();
			if (this.socket.readyState === WebSocket.OPEN) {
				this.socket.close(code, reason);
			} else if (this.socket.readyState !== WebSocket.CLOSING) {
				this.socket.terminate();
			}
		});
	}

	async *frames(): AsyncGenerator<Frame, void, undefined> {
		while (true) {
			const frame = this.buffer.shift();
			if (frame !== undefined) {
				if (this.socket.isPaused && this.buffer.length <= this.highWaterMark / 2) {
					this.socket.resume();
				}
				yield frame;
				continue;
			}
			if (this.info !== null) return;
			await new Promise<void>((resolve) => {
				this.wake = resolve;
			});
		}
	}

	closeInfo(): CloseInfo | null {
		return this.info;
	}

	/** Number of frames received but not yet pulled by the consumer. */
	get buffered(): number {
		return this.buffer.length;
	}

	private push(frame: Frame): void {
		this.buffer.push(frame);
		if (this.buffer.length >= this.highWaterMark && !this.socket.isPaused) {
			this.socket.pause();
		}
		this.notify();
	}

	private handleClose(code: number, reason: string): void {
		this.info = { code, reason, error: this.lastError };
		const closed = new NetworkError("WebSocket closed before pong", { code });
		for (const waiter of this.pongWaiters.splice(0)) waiter.reject(closed);
		for (const done of this.closeWaiters.splice(0)) done();
		this.notify();
	}

	private notify(): void {
		const wake = this.wake;
		this.wake = null;
		wake?.();
	}
}

function rawToBuffer(data: WebSocket.RawData): Buffer {
	if (Buffer.isBuffer(data)) return data;
	if (Array.isArray(data)) return Buffer.concat(data);
	return Buffer.from(data);
}

/** Builds a connector that opens WsTransport connections with the given options. */
export function createWsConnector(transportOptions: WsTransportOptions = {}): TransportConnector {
	return (url, options) => WsTransport.connect(url, options, transportOptions);
}

/** Default connector used by the connection manager. */
export const wsConnector: TransportConnector = createWsConnector();
