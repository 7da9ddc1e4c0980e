import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocketServer } from "ws";
import type { WebSocket as ServerSocket } from "ws";
import { createLogger } from "../lib/logger/index.js";
import { connectionAlertHooks } from "../lifecycle/alerts.js";
import { Heartbeat } from "../lifecycle/heartbeat.js";
import { GracefulShutdown } from "../lifecycle/shutdown.js";
import type { Alert } from "../lifecycle/types.js";
import { BoundedQueue } from "../websocket/queue.js";
import { ConnectionState, ReconnectStrategy } from "../websocket/types.js";
import { WebSocketManager } from "../websocket/ws-manager.js";
import type { WebSocketManagerOptions } from "../websocket/options.js";

const logger = createLogger({ level: "silent" });
const WAIT_MS = 2_000;

describe("WebSocketManager against a live server", () => {
	let wss: WebSocketServer;
	let port: number;
	let serverSockets: ServerSocket[];
	let inbox: BoundedQueue<string>;
	let closeCodes: BoundedQueue<number>;
	const managers: WebSocketManager[] = [];

	beforeEach(async () => {
		serverSockets = [];
		inbox = new BoundedQueue<string>(0);
		closeCodes = new BoundedQueue<number>(0);
		wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
		await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
		const addr = wss.address();
		port = addr !== null && typeof addr === "object" ? addr.port : 0;
		wss.on("connection", (ws) => {
			serverSockets.push(ws);
			ws.on("message", (data) => void inbox.put(data.toString()));
			ws.on("close", (code) => void closeCodes.put(code));
		});
	});

	afterEach(async () => {
		for (const manager of managers.splice(0)) await manager.forceClose();
		for (const ws of serverSockets) ws.terminate();
		await new Promise<void>((resolve) => wss.close(() => resolve()));
	});

	function createManager(options: WebSocketManagerOptions = {}): WebSocketManager {
		const manager = new WebSocketManager(`ws://127.0.0.1:${port}`, {
			logger,
			reconnectStrategy: ReconnectStrategy.FixedDelay,
			reconnectDelayMs: 50,
			...options,
		});
		managers.push(manager);
		return manager;
	}

	function serverSocket(index: number): ServerSocket {
		const socket = serverSockets[index];
		if (socket === undefined) throw new Error(`no server connection #${index}`);
		return socket;
	}

	function nextServerMessage(): Promise<string | undefined> {
		return inbox.get(AbortSignal.timeout(WAIT_MS));
	}

	it("replays subscriptions and keeps streaming across a dropped connection", async () => {
		const alerts: Alert[] = [];
		const hooks = connectionAlertHooks({ send: (alert) => void alerts.push(alert) });
		const manager = createManager(hooks);
		await manager.subscribe("ticker.a");
		await manager.connect();

		expect(await nextServerMessage()).toBe(
			'{"method": "SUBSCRIBE", "params": ["ticker.a"], "id": 1}',
		);
		serverSocket(0).send('{"price": 101.5}');
		await expect(manager.receive(WAIT_MS)).resolves.toEqual({ price: 101.5 });

		serverSocket(0).terminate();

		expect(await nextServerMessage()).toBe(
			'{"method": "SUBSCRIBE", "params": ["ticker.a"], "id": 2}',
		);
		await expect(manager.waitConnected(WAIT_MS)).resolves.toBe(true);
		serverSocket(1).send('{"price": 102}');
		await expect(manager.receive(WAIT_MS)).resolves.toEqual({ price: 102 });

		expect(manager.stats.connects).toBe(2);
		expect(manager.stats.reactiveDisconnects).toBe(1);
		expect(alerts.map((a) => [a.level, a.message])).toEqual([
			["warning", "websocket disconnected: network_error"],
			["info", "websocket reconnected after network_error"],
		]);
	});

	it("lets a heartbeat rebuild a dead manager", async () => {
		const first = createManager({ autoReconnect: false });
		await first.connect();
		await first.kill();

		const heartbeat: Heartbeat = new Heartbeat({
			logger,
			target: first,
			onTargetDead: async () => {
				await first.forceClose();
				const replacement = createManager();
				await replacement.connect();
				heartbeat.setTarget(replacement);
			},
		});
		await heartbeat.beat();

		const current = heartbeat.target;
		expect(current).not.toBe(first);
		expect(current?.isDead).toBe(false);
		expect(first.state).toBe(ConnectionState.Closed);
		expect(first.isShutdown).toBe(false);
	});

	it("closes the stream cleanly on graceful shutdown", async () => {
		const manager = createManager();
		await manager.connect();
		const shutdown = new GracefulShutdown({
			logger,
			signalSource: { on: () => undefined, off: () => undefined },
		});
		shutdown.register("stream", () => manager.shutdown());

		await shutdown.trigger();

		expect(manager.state).toBe(ConnectionState.Closed);
		expect(manager.isShutdown).toBe(true);
		expect(await closeCodes.get(AbortSignal.timeout(WAIT_MS))).toBe(1000);
	});
});
