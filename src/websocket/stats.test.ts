import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { ConnectionStats } from "./stats.js";

describe("ConnectionStats", () => {
	it("starts at zero", () => {
		const stats = new ConnectionStats(new FakeClock(1_000));
		expect(stats.connects).toBe(0);
		expect(stats.lastConnectAt).toBe(0);
		expect(stats.connectionTimeMs).toBe(0);
		expect(stats.uptimeMs).toBe(0);
	});

	it("recordConnect counts and stamps the connect time", () => {
		const clock = new FakeClock(5_000);
		const stats = new ConnectionStats(clock);

		stats.recordConnect();
		clock.advance(250);

		expect(stats.connects).toBe(1);
		expect(stats.lastConnectAt).toBe(5_000);
		expect(stats.connectionTimeMs).toBe(250);
	});

	it("splits disconnects into proactive and reactive", () => {
		const clock = new FakeClock(10);
		const stats = new ConnectionStats(clock);

		stats.recordDisconnect(true);
		clock.advance(5);
		stats.recordDisconnect(false);
		stats.recordDisconnect(false);

		expect(stats.disconnects).toBe(3);
		expect(stats.proactiveDisconnects).toBe(1);
		expect(stats.reactiveDisconnects).toBe(2);
		expect(stats.lastDisconnectAt).toBe(15);
	});

	it("accumulates message and byte counters in both directions", () => {
		const clock = new FakeClock(0);
		const stats = new ConnectionStats(clock);

		stats.recordMessageReceived(100);
		stats.recordMessageReceived(50);
		clock.advance(7);
		stats.recordMessageSent(200);

		expect(stats.messagesReceived).toBe(2);
		expect(stats.bytesReceived).toBe(150);
		expect(stats.messagesSent).toBe(1);
		expect(stats.bytesSent).toBe(200);
		expect(stats.lastMessageAt).toBe(7);
	});

	it("uptime grows with the clock", () => {
		const clock = new FakeClock(0);
		const stats = new ConnectionStats(clock);
		clock.advance(3_000);
		expect(stats.uptimeMs).toBe(3_000);
	});

	it("reset clears every counter and restarts uptime", () => {
		const clock = new FakeClock(0);
		const stats = new ConnectionStats(clock);
		stats.recordConnect();
		stats.recordDisconnect(true);
		stats.recordReconnectAttempt();
		stats.recordMessageReceived(100);
		stats.recordMessageSent(50);
		clock.advance(900);

		stats.reset();

		expect(stats.toJSON()).toEqual({
			connects: 0,
			disconnects: 0,
			proactiveDisconnects: 0,
			reactiveDisconnects: 0,
			reconnectAttempts: 0,
			messagesReceived: 0,
			bytesReceived: 0,
			messagesSent: 0,
			bytesSent: 0,
			lastConnectAt: 0,
			lastDisconnectAt: 0,
			lastMessageAt: 0,
			uptimeMs: 0,
			connectionTimeMs: 0,
		});
	});
});
