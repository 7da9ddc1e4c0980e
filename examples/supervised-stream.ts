/**
 * Supervised Stream — a long-running consumer that survives drops and rebuilds.
 *
 * A heartbeat watches the manager and replaces it once reconnects are
 * exhausted; SIGINT/SIGTERM shut everything down in order. Alerts go to the
 * log instead of Slack.
 * Run: STREAM_URL=wss://stream.example.com/ws npx tsx examples/supervised-stream.ts
 */

import {
	type AlertSink,
	GracefulShutdown,
	Heartbeat,
	WebSocketManager,
	connectionAlertHooks,
	rootLogger,
	websocketConfigFromEnv,
} from "../src/index.js";

const url = process.env["STREAM_URL"] ?? "wss://stream.example.com/ws";
const channels = ["ticker.btc", "ticker.eth"];
const log = rootLogger.child({ example: "supervised-stream" });

const logSink: AlertSink = {
	send: (alert) => {
		const fields = { channel: alert.channel, ...alert.context };
		if (alert.level === "critical") log.error(fields, alert.message);
		else if (alert.level === "warning") log.warn(fields, alert.message);
		else log.info(fields, alert.message);
	},
};

let received = 0;

function buildManager(): WebSocketManager {
	return new WebSocketManager(url, {
		...connectionAlertHooks(logSink, { name: "ticker" }),
		config: websocketConfigFromEnv(),
		onMessage: () => {
			received += 1;
		},
	});
}

async function consume(manager: WebSocketManager): Promise<void> {
	for await (const message of manager.stream()) {
		if (received % 100 === 0) log.info({ received, message }, "sample");
	}
}

let manager = buildManager();
await manager.subscribe(...channels);
await manager.connect();
let consumer = consume(manager);

const heartbeat = new Heartbeat({
	intervalMs: 10_000,
	target: manager,
	onTargetDead: async () => {
		log.warn("stream is dead, rebuilding");
		await manager.forceClose();
		await consumer;
		manager = buildManager();
		await manager.subscribe(...channels);
		await manager.connect();
		consumer = consume(manager);
		heartbeat.setTarget(manager);
	},
	onAlert: (channel, message, context) => logSink.send({
		level: "critical",
		channel,
		title: "heartbeat",
		message,
		context,
	}),
});
heartbeat.start();

const shutdown = new GracefulShutdown({ timeoutMs: 10_000 });
shutdown.register("heartbeat", () => heartbeat.shutdown(), { priority: 10 });
shutdown.register("stream", () => manager.shutdown(), { priority: 20 });
shutdown.register("report", () => log.info({ received, stats: manager.stats }, "done"), {
	priority: 30,
});
shutdown.install();

while (!(await shutdown.wait(60_000))) {
	log.info({ received, stats: manager.stats }, "alive");
}
await consumer;
