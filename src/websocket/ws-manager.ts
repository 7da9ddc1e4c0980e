import { InfraError, TimeoutError, classifyError, toError } from "../shared/errors.js";
import { tryCatchAsync } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { SystemClock, TIMED_OUT, raceTimeout, sleep } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import { TypedEmitter } from "../lib/events/index.js";
import { rootLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { wsConnector } from "../lib/websocket/client.js";
import { ABNORMAL_CLOSURE, NORMAL_CLOSURE } from "../lib/websocket/types.js";
import type { TransportConnection, TransportConnector } from "../lib/websocket/types.js";
import { decodeFrame, encodeMessage, frameByteLength } from "./codec.js";
import {
	WebSocketClosedError,
	WebSocketConnectionError,
	WebSocketProtocolError,
	WebSocketReconnectError,
	WebSocketTimeoutError,
} from "./errors.js";
import { resolveWebSocketOptions } from "./options.js";
import type { ResolvedWebSocketOptions, WebSocketManagerOptions } from "./options.js";
import { BoundedQueue } from "./queue.js";
import { ReconnectionPolicy } from "./reconnection.js";
import { Signal } from "./signal.js";
import { ConnectionStats } from "./stats.js";
import type { ConnectionStatsView } from "./stats.js";
import {
	ConnectionState,
	DisconnectReason,
	canConnect,
	canSend,
	isProactive,
} from "./types.js";
import type {
	ConnectionHooks,
	InboundMessage,
	OutboundMessage,
	SubscriptionAction,
} from "./types.js";

/** Events emitted by the manager. */
export type WebSocketManagerEvents = {
	stateChange: (from: ConnectionState, to: ConnectionState) => void;
};

export interface RequestDisconnectOptions {
	/** Recorded and reported to onDisconnect. Default PROACTIVE_RECONNECT. */
	readonly reason?: DisconnectReason | undefined;
	/** Reconnect once after this delay. Unset leaves the manager disconnected. */
	readonly reconnectAfterMs?: number | undefined;
}

export interface ReconnectWindowOptions {
	/** Overrides the shouldReconnect hook for this wait. */
	readonly shouldReconnect?: (() => boolean | number | Promise<boolean | number>) | undefined;
	readonly timeoutMs: number;
}

/** Close codes that mean the peer rejected our frames. */
const PROTOCOL_CLOSE_CODES: ReadonlySet<number> = new Set([1002, 1003, 1007, 1009]);

const CANCELLED: unique symbol = Symbol("cancelled");

function attemptCancelled(): WebSocketClosedError {
	return new WebSocketClosedError("Connection attempt cancelled", { code: NORMAL_CLOSURE });
}

/**
 * Resilient client-side WebSocket connection.
 *
 * Keeps one connection alive through network failures and planned
 * rotations, delivers inbound messages through a bounded queue that blocks
 * instead of dropping, and reports why each connection ended through the
 * onDisconnect hook. Transient failures are retried up to
 * `maxReconnectAttempts`; after that the manager stays DISCONNECTED and
 * `isDead` tells a supervisor to rebuild it.
 *
 * Every state change goes through `transition()`. CLOSED is terminal.
 *
 * @example
 * ```ts
 * const ws = new WebSocketManager("wss://stream.example.com/ws", {
 *   onDisconnect: (reason) => log.warn({ reason }, "stream dropped"),
 * });
 * await ws.connect();
 * await ws.subscribe("ticker.btc");
 * for await (const message of ws.stream()) handle(message);
 * ```
 */
export class WebSocketManager {
	readonly url: string;
	readonly options: ResolvedWebSocketOptions;
	readonly events: TypedEmitter<WebSocketManagerEvents>;

	private readonly hooks: ConnectionHooks;
	private readonly connector: TransportConnector;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly policy: ReconnectionPolicy;
	private readonly queue: BoundedQueue<InboundMessage>;
	private readonly counters: ConnectionStats;
	private readonly subscriptionSet = new Set<string>();
	private readonly connectedSignal = new Signal();
	private readonly disconnectedSignal = new Signal(true);
	private readonly lifetime = new AbortController();

	private current: ConnectionState = ConnectionState.Disconnected;
	private shutdownRequested = false;
	private autoReconnect: boolean;
	private transport: TransportConnection | null = null;
	private connection: AbortController | null = null;
	private generation = 0;
	private connectedAt = 0;
	private requestId = 0;
	private attempt: AbortController | null = null;
	private reconnecting: AbortController | null = null;

	constructor(url: string, options: WebSocketManagerOptions = {}) {
		this.url = url;
		this.logger = (options.logger ?? rootLogger).child({ component: "websocket", url });
		this.options = resolveWebSocketOptions(options, this.logger);
		this.hooks = options;
		this.connector = options.connector ?? wsConnector;
		this.clock = options.clock ?? SystemClock;
		this.autoReconnect = this.options.autoReconnect;
		this.counters = new ConnectionStats(this.clock);
		this.queue = new BoundedQueue<InboundMessage>(this.options.queueSize);
		this.policy = new ReconnectionPolicy({
			strategy: this.options.reconnectStrategy,
			baseDelayMs: this.options.reconnectDelayMs,
			maxDelayMs: this.options.maxReconnectDelayMs,
			maxAttempts: this.options.maxReconnectAttempts,
			jitterFactor: this.options.jitterFactor,
		});
		this.events = new TypedEmitter<WebSocketManagerEvents>((event, error) => {
			this.logger.error({ event, error: toError(error).message }, "event listener failed");
		});
	}

	// ── Introspection ────────────────────────────────────────────────

	get state(): ConnectionState {
		return this.current;
	}

	get isConnected(): boolean {
		return this.current === ConnectionState.Connected;
	}

	/** No live connection and no reconnect in progress. */
	get isDead(): boolean {
		return (
			this.current === ConnectionState.Disconnected || this.current === ConnectionState.Closed
		);
	}

	get isShutdown(): boolean {
		return this.shutdownRequested;
	}

	get subscriptions(): ReadonlySet<string> {
		return new Set(this.subscriptionSet);
	}

	/** Time since the last successful connect; 0 when not connected. */
	get connectionDurationMs(): number {
		return this.isConnected ? this.clock.now() - this.connectedAt : 0;
	}

	get stats(): ConnectionStatsView {
		return this.counters;
	}

	/** @internal Inbound queue, exposed for tests that feed it directly. */
	get messageQueue(): BoundedQueue<InboundMessage> {
		return this.queue;
	}

	waitConnected(timeoutMs: number): Promise<boolean> {
		return this.connectedSignal.wait(timeoutMs);
	}

	waitDisconnected(timeoutMs: number): Promise<boolean> {
		return this.disconnectedSignal.wait(timeoutMs);
	}

	// ── Lifecycle ────────────────────────────────────────────────────

	/**
	 * Opens the connection and replays subscriptions.
	 * No-op while CONNECTING, CONNECTED or RECONNECTING, and once CLOSED.
	 * Resolves without connecting when kill(), shutdown() or forceClose()
	 * cancels the handshake.
	 * @throws WebSocketTimeoutError when the handshake exceeds connectionTimeoutMs
	 * @throws WebSocketConnectionError when the handshake fails
	 */
	async connect(): Promise<void> {
		if (!canConnect(this.current)) {
			this.logger.warn("connect() ignored: manager is closed");
			return;
		}
		if (this.current !== ConnectionState.Disconnected) {
			this.logger.debug({ state: this.current }, "connect() ignored: already active");
			return;
		}
		this.transition(ConnectionState.Connecting);
		try {
			await this.establish();
		} catch (error) {
			if (this.state !== ConnectionState.Connecting) {
				this.logger.debug({ state: this.current }, "connect() cancelled");
				return;
			}
			this.transition(ConnectionState.Disconnected);
			throw error;
		}
	}

	/**
	 * Forces a reactive KILLED disconnect. Drops the live connection, or
	 * cancels a pending handshake and any reconnect in progress. Does not
	 * start the reconnect loop: recovery is left to the supervisor.
	 */
	async kill(): Promise<void> {
		if (this.current === ConnectionState.Closed) {
			this.logger.warn("kill() ignored: manager is closed");
			return;
		}
		if (this.current === ConnectionState.Connected) {
			await this.handleDisconnect(this.generation, DisconnectReason.Killed, false);
			return;
		}
		const active = this.current !== ConnectionState.Disconnected || this.reconnecting !== null;
		this.cancelPending();
		if (!active) {
			this.logger.info("kill() ignored: no live connection");
			return;
		}
		this.transition(ConnectionState.Disconnected);
		this.counters.recordDisconnect(false);
		this.connectedSignal.clear();
		this.disconnectedSignal.set();
		this.logger.info({ reason: DisconnectReason.Killed }, "websocket disconnected");
		await this.callHook("onDisconnect", () => this.hooks.onDisconnect?.(DisconnectReason.Killed));
	}

	/** Planned reconnect: closes the live connection and re-enters the reconnect loop. */
	async triggerReconnect(): Promise<void> {
		if (this.current !== ConnectionState.Connected) {
			this.logger.debug({ state: this.current }, "triggerReconnect() ignored: not connected");
			return;
		}
		await this.handleDisconnect(
			this.generation,
			DisconnectReason.ProactiveReconnect,
			this.autoReconnect,
		);
	}

	/**
	 * Planned disconnect outside the keepalive loop, e.g. ahead of a known
	 * server maintenance window. Reconnects after `reconnectAfterMs` if given.
	 */
	async requestDisconnect(options: RequestDisconnectOptions = {}): Promise<void> {
		if (this.current !== ConnectionState.Connected) {
			this.logger.debug({ state: this.current }, "requestDisconnect() ignored: not connected");
			return;
		}
		const reason = options.reason ?? DisconnectReason.ProactiveReconnect;
		await this.handleDisconnect(this.generation, reason, false);
		if (options.reconnectAfterMs !== undefined) {
			this.track(this.scheduleReconnect(options.reconnectAfterMs));
		}
	}

	/**
	 * Reconnects once after `delayMs`, in RECONNECTING meanwhile. Ignored
	 * unless DISCONNECTED. A failed attempt hands over to the reconnect loop
	 * when autoReconnect is on.
	 */
	async scheduleReconnect(delayMs: number): Promise<void> {
		if (this.current !== ConnectionState.Disconnected) {
			this.logger.debug({ state: this.current }, "scheduleReconnect() ignored");
			return;
		}
		this.transition(ConnectionState.Reconnecting);
		this.logger.info({ delayMs }, "reconnect scheduled");
		if (!(await sleep(delayMs, this.lifetime.signal))) return;
		if (this.state !== ConnectionState.Reconnecting) return;

		const result = await tryCatchAsync(() => this.establish());
		if (result.ok) return;
		if (this.state !== ConnectionState.Reconnecting) return;
		this.logger.warn({ error: result.error.message }, "scheduled reconnect failed");
		if (this.autoReconnect) {
			this.startReconnectLoop();
		} else if (this.state === ConnectionState.Reconnecting) {
			this.transition(ConnectionState.Disconnected);
		}
	}

	/**
	 * Polls `shouldReconnect` every reconnectCheckIntervalMs until it returns
	 * true. A numeric answer waits that many milliseconds before asking again.
	 * False when no predicate is available, on timeout, or once closed.
	 */
	async waitForReconnectWindow(options: ReconnectWindowOptions): Promise<boolean> {
		const predicate = options.shouldReconnect ?? this.hooks.shouldReconnect;
		if (predicate === undefined) return false;
		const deadline = this.clock.now() + options.timeoutMs;

		while (!this.lifetime.signal.aborted) {
			const decision = await this.callHook("shouldReconnect", predicate);
			if (decision === true) return true;
			const remaining = deadline - this.clock.now();
			if (remaining <= 0) return false;
			const pause = typeof decision === "number" ? decision : this.options.reconnectCheckIntervalMs;
			if (!(await sleep(Math.min(pause, remaining), this.lifetime.signal))) return false;
		}
		return false;
	}

	/** Terminal close flagged as shutdown. Idempotent. */
	async shutdown(): Promise<void> {
		this.shutdownRequested = true;
		await this.closeWith(DisconnectReason.Shutdown);
	}

	/** Terminal close without the shutdown flag. Idempotent. */
	async forceClose(): Promise<void> {
		await this.closeWith(DisconnectReason.NormalClose);
	}

	close(): Promise<void> {
		return this.forceClose();
	}

	/** Connects, runs `fn`, and always closes afterwards. */
	async use<T>(fn: (manager: this) => T | Promise<T>): Promise<T> {
		try {
			await this.connect();
			return await fn(this);
		} finally {
			await this.forceClose();
		}
	}

	// ── Messaging ────────────────────────────────────────────────────

	/**
	 * Sends a message. Objects and arrays go out as canonical JSON.
	 * @throws WebSocketClosedError when not connected or when the write fails
	 */
	async send(message: OutboundMessage): Promise<void> {
		const transport = this.transport;
		if (!canSend(this.current) || transport === null) {
			throw new WebSocketClosedError(`Cannot send while ${this.current}`, {
				reason: this.current,
			});
		}
		const frame = encodeMessage(message);
		const generation = this.generation;
		const result = await tryCatchAsync(() => transport.send(frame));
		if (!result.ok) {
			this.logger.warn({ error: result.error.message }, "send failed");
			await this.handleDisconnect(generation, DisconnectReason.NetworkError);
			throw new WebSocketClosedError("Connection lost while sending", {
				reason: result.error.message,
				cause: result.error,
			});
		}
		this.counters.recordMessageSent(frameByteLength(frame));
	}

	/**
	 * Next inbound message.
	 * @throws WebSocketTimeoutError when nothing arrives within `timeoutMs`
	 * @throws WebSocketClosedError when the manager is closed and drained
	 */
	async receive(timeoutMs: number): Promise<InboundMessage> {
		const ready = this.queue.shift();
		if (ready !== undefined) return ready;
		if (this.current === ConnectionState.Closed) {
			throw new WebSocketClosedError("Manager is closed", { code: NORMAL_CLOSURE });
		}

		const deadline = new AbortController();
		const timer = setTimeout(() => deadline.abort(), Math.max(0, timeoutMs));
		try {
			const message = await this.queue.get(deadline.signal);
			if (message !== undefined) return message;
		} finally {
			clearTimeout(timer);
		}
		throw new WebSocketTimeoutError(`No message received within ${timeoutMs}ms`, {
			operation: "receive",
			timeoutMs,
		});
	}

	/**
	 * Inbound messages in arrival order. Waits across reconnects and ends
	 * once the manager is CLOSED and the queue is drained.
	 */
	async *stream(): AsyncGenerator<InboundMessage, void, undefined> {
		while (true) {
			const message = await this.queue.get(this.lifetime.signal);
			if (message !== undefined) {
				yield message;
				continue;
			}
			if (this.current === ConnectionState.Closed) return;
		}
	}

	// ── Subscriptions ────────────────────────────────────────────────

	/** Adds channels to the persistent set; sends the new ones now when connected. */
	async subscribe(...channels: string[]): Promise<void> {
		const added = channels.filter((channel) => !this.subscriptionSet.has(channel));
		for (const channel of added) this.subscriptionSet.add(channel);
		if (!this.isConnected) return;
		for (const channel of added) {
			await this.sendSubscription("subscribe", channel);
		}
	}

	/** Removes channels; absent ones are ignored. */
	async unsubscribe(...channels: string[]): Promise<void> {
		const removed = channels.filter((channel) => this.subscriptionSet.delete(channel));
		if (!this.isConnected) return;
		for (const channel of removed) {
			await this.sendSubscription("unsubscribe", channel);
		}
	}

	private sendSubscription(action: SubscriptionAction, channel: string): Promise<void> {
		this.requestId += 1;
		return this.send(this.options.subscriptionMessage(action, channel, this.requestId));
	}

	// ── Internals ────────────────────────────────────────────────────

	private transition(to: ConnectionState): boolean {
		const from = this.current;
		if (from === to) return true;
		if (from === ConnectionState.Closed) {
			this.logger.debug({ to }, "transition refused: manager is closed");
			return false;
		}
		this.current = to;
		this.logger.debug({ from, to }, "state transition");
		this.events.emit("stateChange", from, to);
		return true;
	}

	/**
	 * Opens a transport, replays subscriptions and goes CONNECTED. Called in
	 * CONNECTING or RECONNECTING; leaves the state alone on failure.
	 */
	private async establish(): Promise<void> {
		const controller = new AbortController();
		const abort = (): void => controller.abort();
		this.lifetime.signal.addEventListener("abort", abort, { once: true });
		this.attempt = controller;
		const cancelled = new Promise<typeof CANCELLED>((resolve) => {
			controller.signal.addEventListener("abort", () => resolve(CANCELLED), { once: true });
		});

		const timeoutMs = this.options.connectionTimeoutMs;
		const pending = this.connector(this.url, {
			timeoutMs,
			signal: controller.signal,
			headers: this.options.headers,
		});
		const opened = await raceTimeout(
			Promise.race([tryCatchAsync(() => pending), cancelled]),
			timeoutMs,
		);
		this.lifetime.signal.removeEventListener("abort", abort);
		if (this.attempt === controller) this.attempt = null;

		if (opened === CANCELLED) {
			this.track(this.discardLate(pending));
			throw attemptCancelled();
		}
		if (opened === TIMED_OUT) {
			controller.abort();
			this.track(this.discardLate(pending));
			throw new WebSocketTimeoutError(`Connection to ${this.url} timed out`, {
				operation: "connect",
				timeoutMs,
			});
		}
		if (!opened.ok) {
			const cause = classifyError(opened.error);
			if (cause instanceof TimeoutError) {
				throw new WebSocketTimeoutError(`Connection to ${this.url} timed out`, {
					operation: "connect",
					timeoutMs,
				});
			}
			throw new WebSocketConnectionError(`Failed to connect to ${this.url}`, {
				url: this.url,
				attempts: this.policy.attemptCount,
				lastError: cause,
			});
		}

		const transport = opened.value;
		if (controller.signal.aborted) {
			await this.closeTransport(transport, DisconnectReason.NormalClose);
			throw attemptCancelled();
		}
		this.attempt = controller;

		const replayed = await this.replaySubscriptions(transport);
		if (!replayed.ok && !controller.signal.aborted) {
			this.attempt = null;
			await this.closeTransport(transport, DisconnectReason.NetworkError);
			throw new WebSocketConnectionError(`Subscription replay to ${this.url} failed`, {
				url: this.url,
				attempts: this.policy.attemptCount,
				lastError: replayed.error,
			});
		}
		if (this.attempt === controller) this.attempt = null;
		if (controller.signal.aborted) {
			await this.closeTransport(transport, DisconnectReason.NormalClose);
			throw attemptCancelled();
		}

		this.generation += 1;
		const generation = this.generation;
		this.transport = transport;
		this.connection = controller;
		this.transition(ConnectionState.Connected);
		this.connectedAt = this.clock.now();
		this.counters.recordConnect();
		this.policy.reset();
		this.logger.info(
			{ generation, subscriptions: this.subscriptionSet.size },
			"websocket connected",
		);

		this.track(this.readLoop(generation, transport, controller.signal));
		this.track(this.keepaliveLoop(generation, transport, controller.signal));
		await this.callHook("onConnect", () => this.hooks.onConnect?.());
		if (this.generation === generation) {
			this.disconnectedSignal.clear();
			this.connectedSignal.set();
		}
	}

	/** Sends every subscription before the read loop exists, so replay precedes delivery. */
	private replaySubscriptions(transport: TransportConnection): Promise<Result<void, Error>> {
		return tryCatchAsync(async () => {
			for (const channel of this.subscriptionSet) {
				this.requestId += 1;
				const frame = encodeMessage(
					this.options.subscriptionMessage("subscribe", channel, this.requestId),
				);
				await transport.send(frame);
				this.counters.recordMessageSent(frameByteLength(frame));
			}
		});
	}

	/** Closes a transport that finished its handshake after we stopped waiting for it. */
	private async discardLate(pending: Promise<TransportConnection>): Promise<void> {
		const late = await tryCatchAsync(() => pending);
		if (late.ok) await this.closeTransport(late.value, DisconnectReason.NetworkError);
	}

	private async readLoop(
		generation: number,
		transport: TransportConnection,
		signal: AbortSignal,
	): Promise<void> {
		const consumed = await tryCatchAsync(async () => {
			for await (const frame of transport.frames()) {
				if (generation !== this.generation) return;
				const message = decodeFrame(frame);
				if (!(await this.queue.put(message, signal))) return;
				this.counters.recordMessageReceived(frameByteLength(frame));
				await this.callHook("onMessage", () => this.hooks.onMessage?.(message));
			}
		});
		if (generation !== this.generation) return;

		const info = transport.closeInfo();
		const failed = !consumed.ok || info === null || info.error !== undefined;
		const code = info?.code ?? ABNORMAL_CLOSURE;
		if (PROTOCOL_CLOSE_CODES.has(code)) {
			const error = new WebSocketProtocolError("Peer closed the connection over a protocol error", {
				protocolError: info?.reason ?? "",
			});
			this.logger.warn({ code, error: error.toJSON() }, "protocol error");
		}
		const reason =
			failed || code === ABNORMAL_CLOSURE
				? DisconnectReason.NetworkError
				: DisconnectReason.ServerClose;
		this.logger.info(
			{
				code,
				closeReason: info?.reason ?? "",
				...(consumed.ok ? {} : { error: consumed.error.message }),
				...(info?.error !== undefined && { error: info.error.message }),
			},
			"connection ended",
		);
		await this.handleDisconnect(generation, reason);
	}

	private async keepaliveLoop(
		generation: number,
		transport: TransportConnection,
		signal: AbortSignal,
	): Promise<void> {
		while (await sleep(this.options.pingIntervalMs, signal)) {
			if (generation !== this.generation) return;

			const planned = await this.callHook<boolean>("shouldDisconnect", () =>
				this.hooks.shouldDisconnect?.(),
			);
			if (generation !== this.generation) return;
			if (planned === true) {
				this.logger.info("shouldDisconnect requested a reconnect");
				await this.triggerReconnect();
				return;
			}
			if (this.connectionExpiring()) {
				this.logger.info(
					{ ageMs: this.connectionDurationMs, maxAgeMs: this.options.maxConnectionAgeMs },
					"connection nearing its maximum age",
				);
				await this.triggerReconnect();
				return;
			}

			const pong = await raceTimeout(
				tryCatchAsync(() => transport.ping()),
				this.options.pingTimeoutMs,
			);
			if (generation !== this.generation) return;
			if (pong === TIMED_OUT) {
				this.logger.warn({ timeoutMs: this.options.pingTimeoutMs }, "no pong received");
				await this.handleDisconnect(generation, DisconnectReason.PingTimeout);
				return;
			}
			if (!pong.ok) {
				this.logger.warn({ error: pong.error.message }, "ping failed");
				await this.handleDisconnect(generation, DisconnectReason.NetworkError);
				return;
			}
		}
	}

	private connectionExpiring(): boolean {
		const maxAge = this.options.maxConnectionAgeMs;
		if (maxAge === null) return false;
		return this.connectionDurationMs >= Math.max(0, maxAge - this.options.disconnectMarginMs);
	}

	/**
	 * Tears down connection `generation` if it is still the live one: go
	 * DISCONNECTED, count it, close the transport, tell onDisconnect, and
	 * maybe start reconnecting. Stale generations are ignored.
	 */
	private async handleDisconnect(
		generation: number,
		reason: DisconnectReason,
		reconnect = true,
	): Promise<void> {
		if (generation !== this.generation || this.current !== ConnectionState.Connected) return;
		const transport = this.detach();
		this.transition(ConnectionState.Disconnected);
		this.counters.recordDisconnect(isProactive(reason));
		this.connectedSignal.clear();
		this.disconnectedSignal.set();
		this.logger.info({ reason }, "websocket disconnected");

		if (transport !== null) await this.closeTransport(transport, reason);
		await this.callHook("onDisconnect", () => this.hooks.onDisconnect?.(reason));
		if (reconnect && this.autoReconnect) this.startReconnectLoop();
	}

	private detach(): TransportConnection | null {
		const transport = this.transport;
		this.transport = null;
		this.generation += 1;
		this.connection?.abort();
		this.connection = null;
		return transport;
	}

	private async closeTransport(
		transport: TransportConnection,
		reason: DisconnectReason,
	): Promise<void> {
		const closed = await tryCatchAsync(() => transport.close(NORMAL_CLOSURE, reason));
		if (!closed.ok) {
			this.logger.debug({ error: closed.error.message }, "transport close failed");
		}
	}

	private async closeWith(reason: DisconnectReason): Promise<void> {
		this.autoReconnect = false;
		if (this.current === ConnectionState.Closed) return;

		const wasConnected = this.current === ConnectionState.Connected;
		const transport = this.detach();
		this.transition(ConnectionState.Closed);
		this.lifetime.abort();
		if (wasConnected) this.counters.recordDisconnect(isProactive(reason));
		this.connectedSignal.clear();
		this.disconnectedSignal.set();
		this.logger.info({ reason, shutdown: this.shutdownRequested }, "websocket closed");

		if (transport !== null) await this.closeTransport(transport, reason);
		if (wasConnected) {
			await this.callHook("onDisconnect", () => this.hooks.onDisconnect?.(reason));
		}
	}

	private startReconnectLoop(): void {
		if (this.reconnecting !== null) return;
		const loop = new AbortController();
		const stop = (): void => loop.abort();
		this.lifetime.signal.addEventListener("abort", stop, { once: true });
		this.reconnecting = loop;
		this.track(
			this.reconnectLoop(loop.signal).finally(() => {
				this.lifetime.signal.removeEventListener("abort", stop);
				if (this.reconnecting === loop) this.reconnecting = null;
			}),
		);
	}

	/** Stops the reconnect loop and any handshake still in flight. */
	private cancelPending(): void {
		this.reconnecting?.abort();
		this.reconnecting = null;
		this.attempt?.abort();
		this.attempt = null;
	}

	private async reconnectLoop(signal: AbortSignal): Promise<void> {
		let lastError: Error | null = null;

		while (!signal.aborted && this.autoReconnect) {
			if (this.current === ConnectionState.Connected || this.current === ConnectionState.Closed) {
				return;
			}

			const decision = await this.callHook<boolean | number>("shouldReconnect", () =>
				this.hooks.shouldReconnect?.(),
			);
			if (signal.aborted) return;
			if (decision === false) {
				this.logger.info("shouldReconnect declined, staying disconnected");
				this.transition(ConnectionState.Disconnected);
				return;
			}
			if (typeof decision === "number") {
				this.transition(ConnectionState.Reconnecting);
				this.logger.debug({ delayMs: decision }, "shouldReconnect deferred");
				if (!(await sleep(decision, signal))) return;
				continue;
			}

			if (!this.policy.shouldRetry()) {
				await this.giveUp(lastError);
				return;
			}

			this.transition(ConnectionState.Reconnecting);
			const attempt = this.policy.attemptCount + 1;
			const delayMs = this.policy.nextDelay();
			this.counters.recordReconnectAttempt();
			this.logger.info(
				{ attempt, maxAttempts: this.policy.maxAttempts, delayMs },
				"reconnecting",
			);
			if (!(await sleep(delayMs, signal))) return;
			if (this.current !== ConnectionState.Reconnecting) return;

			const result = await tryCatchAsync(() => this.establish());
			if (result.ok || signal.aborted) return;

			const failure = result.error;
			lastError =
				failure instanceof WebSocketConnectionError ? (failure.lastError ?? failure) : failure;
			this.logger.warn({ attempt, error: failure.message }, "reconnect attempt failed");
			if (lastError instanceof InfraError && !lastError.isRetryable) {
				await this.giveUp(lastError);
				return;
			}
		}
	}

	private async giveUp(lastError: Error | null): Promise<void> {
		this.transition(ConnectionState.Disconnected);
		const error = new WebSocketReconnectError(
			`Gave up reconnecting to ${this.url} after ${this.policy.attemptCount} attempts`,
			{ attempts: this.policy.attemptCount, lastError },
		);
		this.logger.error({ error: error.toJSON() }, "reconnect attempts exhausted");
		await this.callHook("onAlert", () =>
			this.hooks.onAlert?.("websocket", error.message, {
				url: this.url,
				attempts: error.attempts,
				lastError: lastError?.message ?? null,
			}),
		);
	}

	/** Runs a user hook; a throw or rejection is logged and yields undefined. */
	private async callHook<R>(
		name: keyof ConnectionHooks,
		call: () => R | Promise<R> | undefined,
	): Promise<R | undefined> {
		try {
			return await call();
		} catch (error) {
			this.logger.error({ hook: name, error: toError(error).message }, "hook failed");
			return undefined;
		}
	}

	/** Runs a background activity whose rejection is logged, never unhandled. */
	private track(task: Promise<void>): void {
		void task.catch((error: unknown) => {
			this.logger.error({ error: toError(error).message }, "background task failed");
		});
	}
}
