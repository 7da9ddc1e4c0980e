import { vi } from "vitest";
import { NetworkError } from "../shared/errors.js";
import { createLogger } from "../lib/logger/index.js";
import type {
	CloseInfo,
	ConnectOptions,
	Frame,
	TransportConnection,
	TransportConnector,
} from "../lib/websocket/types.js";
import type { WebSocketManagerOptions } from "./options.js";
import { WebSocketManager } from "./ws-manager.js";

export const TEST_URL = "ws://stream.test/ws";

export const silentLogger = createLogger({ level: "silent" });

/** Scripted connection: tests push inbound frames and end the stream by hand. */
export class FakeTransport implements TransportConnection {
	readonly sent: Frame[] = [];
	pings = 0;
	answerPings = true;
	failSends = false;
	closedWith: { readonly code: number; readonly reason: string } | null = null;
	private readonly inbound: Frame[] = [];
	private info: CloseInfo | null = null;
	private wake: (() => void) | null = null;

	push(...frames: Frame[]): void {
		this.inbound.push(...frames);
		this.notify();
	}

	/** Ends the inbound stream as if the peer closed or the link dropped. */
	end(code: number, reason = "", error?: Error): void {
		if (this.info !== null) return;
		this.info = { code, reason, error };
		this.notify();
	}

	get sentText(): string[] {
		return this.sent.filter((frame): frame is string => typeof frame === "string");
	}

	async send(data: Frame): Promise<void> {
		if (this.failSends || this.info !== null) throw new NetworkError("write failed");
		this.sent.push(data);
	}

	ping(): Promise<void> {
		this.pings += 1;
		return this.answerPings ? Promise.resolve() : new Promise<void>(() => undefined);
	}

	async close(code = 1000, reason = ""): Promise<void> {
		this.closedWith = { code, reason };
		this.end(code, reason);
	}

	async *frames(): AsyncGenerator<Frame, void, undefined> {
		while (true) {
			const frame = this.inbound.shift();
			if (frame !== undefined) {
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

	private notify(): void {
		const wake = this.wake;
		this.wake = null;
		wake?.();
	}
}

/** Connector handing out FakeTransports, optionally failing the next calls. */
export function fakeConnector() {
	const transports: FakeTransport[] = [];
	const failures: Error[] = [];
	let failAll: Error | null = null;

	const connector = vi.fn(async (_url: string, _options: ConnectOptions) => {
		const failure = failures.shift() ?? failAll;
		if (failure !== null) throw failure;
		const transport = new FakeTransport();
		transports.push(transport);
		return transport;
	});

	return {
		connector,
		transports,
		/** The transport of the n-th successful connect. */
		transport(index: number): FakeTransport {
			const transport = transports[index];
			if (transport === undefined) throw new Error(`no transport #${index}`);
			return transport;
		},
		failNext(...errors: Error[]): void {
			failures.push(...errors);
		},
		failAlways(error: Error | null): void {
			failAll = error;
		},
	};
}

/** Connector whose handshake never completes. */
export function hangingConnector() {
	return vi.fn(
		(_url: string, _options: ConnectOptions) => new Promise<TransportConnection>(() => undefined),
	);
}

export function createManager(
	connector: TransportConnector,
	options: WebSocketManagerOptions = {},
): WebSocketManager {
	return new WebSocketManager(TEST_URL, {
		pingIntervalMs: 60_000,
		logger: silentLogger,
		connector,
		...options,
	});
}

/** Lets pending timers at the current instant and every queued microtask run. */
export async function flush(): Promise<void> {
	await vi.advanceTimersByTimeAsync(0);
}
