import { describe, expect, it } from "vitest";
import {
	ConnectionState,
	DisconnectReason,
	canConnect,
	canSend,
	isProactive,
	isReactive,
	isTerminal,
} from "./types.js";

describe("ConnectionState", () => {
	it("allows connecting from every state but CLOSED", () => {
		expect(canConnect(ConnectionState.Disconnected)).toBe(true);
		expect(canConnect(ConnectionState.Connecting)).toBe(true);
		expect(canConnect(ConnectionState.Connected)).toBe(true);
		expect(canConnect(ConnectionState.Reconnecting)).toBe(true);
		expect(canConnect(ConnectionState.Closed)).toBe(false);
	});

	it("treats CLOSED as the only terminal state", () => {
		const terminal = Object.values(ConnectionState).filter(isTerminal);
		expect(terminal).toEqual([ConnectionState.Closed]);
	});

	it("sends only while connected", () => {
		const sendable = Object.values(ConnectionState).filter(canSend);
		expect(sendable).toEqual([ConnectionState.Connected]);
	});
});

describe("DisconnectReason", () => {
	it("splits reasons into proactive and reactive", () => {
		const reasons = Object.values(DisconnectReason);

		expect(reasons.filter(isProactive)).toEqual(["normal_close", "proactive_reconnect", "shutdown"]);
		expect(reasons.filter(isReactive)).toEqual([
			"server_close",
			"network_error",
			"ping_timeout",
			"killed",
		]);
	});
});
