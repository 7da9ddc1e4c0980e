import { describe, expect, it } from "vitest";
import { createLogger, isLogLevel, levelFromEnv } from "./index.js";

function capture(): { lines: string[]; write(msg: string): void } {
	const lines: string[] = [];
	return {
		lines,
		write(msg: string) {
			lines.push(msg);
		},
	};
}

function parseLine(line: string | undefined): Record<string, unknown> {
	const parsed: unknown = JSON.parse(line ?? "{}");
	return typeof parsed === "object" && parsed !== null ? { ...parsed } : {};
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("writes structured JSON with the message and fields", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out });

			logger.info({ url: "ws://127.0.0.1:1" }, "connected");

			const line = parseLine(out.lines[0]);
			expect(line["msg"]).toBe("connected");
			expect(line["url"]).toBe("ws://127.0.0.1:1");
		});

		it("child loggers carry their bindings", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out });

			logger.child({ component: "ws-manager" }).warn("slow consumer");

			const line = parseLine(out.lines[0]);
			expect(line["component"]).toBe("ws-manager");
			expect(line["msg"]).toBe("slow consumer");
		});

		it("applies constructor bindings to every line", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out, bindings: { lib: "x" } });

			logger.info("one");
			logger.error("two");

			expect(out.lines.map((l) => parseLine(l)["lib"])).toEqual(["x", "x"]);
		});
	});

	describe("opaque redaction", () => {
		it("redacts values flagged __opaque", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out });
			const header = { __opaque: true, toJSON: () => "[REDACTED]" };

			logger.info({ authorization: header, channel: "trades" }, "subscribing");

			const line = parseLine(out.lines[0]);
			expect(line["authorization"]).toBe("[REDACTED]");
			expect(line["channel"]).toBe("trades");
		});
	});

	describe("redact paths", () => {
		it("censors configured paths in log output", () => {
			const out = capture();
			const logger = createLogger({ level: "info", redactPaths: ["token"], destination: out });

			logger.info({ token: "test-secret", safe: "visible" }, "test");

			const line = parseLine(out.lines[0]);
			expect(line["token"]).toBe("[REDACTED]");
			expect(line["safe"]).toBe("visible");
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const out = capture();
			const logger = createLogger({ level: "warn", destination: out });

			logger.debug("hidden");
			logger.info("hidden too");
			logger.warn("shown");

			expect(out.lines).toHaveLength(1);
			expect(parseLine(out.lines[0])["msg"]).toBe("shown");
		});

		it("silent suppresses everything", () => {
			const out = capture();
			const logger = createLogger({ level: "silent", destination: out });

			logger.error("nothing");

			expect(out.lines).toHaveLength(0);
		});

		it("isLogLevel accepts known names only", () => {
			expect(isLogLevel("debug")).toBe(true);
			expect(isLogLevel("verbose")).toBe(false);
		});

		it("levelFromEnv normalizes and falls back to info", () => {
			expect(levelFromEnv({ RESILIENT_WS_LOG_LEVEL: " DEBUG " })).toBe("debug");
			expect(levelFromEnv({ RESILIENT_WS_LOG_LEVEL: "loud" })).toBe("info");
			expect(levelFromEnv({})).toBe("info");
		});
	});
});
