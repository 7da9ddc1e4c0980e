import { describe, expect, it } from "vitest";
import { canonicalJson, decodeFrame, encodeMessage, frameByteLength } from "./codec.js";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("decodeFrame", () => {
	it("parses JSON text", () => {
		expect(decodeFrame('{"a": 1}')).toEqual({ a: 1 });
		expect(decodeFrame("[1,2]")).toEqual([1, 2]);
		expect(decodeFrame("42")).toBe(42);
	});

	it("keeps JSON null as null", () => {
		expect(decodeFrame("null")).toBeNull();
	});

	it("falls back to the raw text", () => {
		expect(decodeFrame("hello")).toBe("hello");
		expect(decodeFrame("{broken")).toBe("{broken");
	});

	it("parses binary frames holding UTF-8 JSON", () => {
		expect(decodeFrame(bytes('{"v":2}'))).toEqual({ v: 2 });
	});

	it("keeps binary frames that are not JSON as bytes", () => {
		const invalidUtf8 = new Uint8Array([0xff, 0xfe, 0x00]);
		expect(decodeFrame(invalidUtf8)).toBe(invalidUtf8);

		const plain = bytes("plain");
		expect(decodeFrame(plain)).toBe(plain);
	});
});

describe("canonicalJson", () => {
	it("separates keys and items with a space", () => {
		expect(canonicalJson({ a: 1 })).toBe('{"a": 1}');
		expect(canonicalJson({ a: "x", b: [1, 2], c: {} })).toBe('{"a": "x", "b": [1, 2], "c": {}}');
	});

	it("handles nesting and empty containers", () => {
		expect(canonicalJson({ m: { k: [] } })).toBe('{"m": {"k": []}}');
		expect(canonicalJson([])).toBe("[]");
	});

	it("leaves string contents untouched", () => {
		expect(canonicalJson({ t: "a\nb, c" })).toBe('{"t": "a\\nb, c"}');
	});

	it("round-trips through decodeFrame", () => {
		const message = { method: "SUBSCRIBE", params: ["btc"], id: 1 };
		const encoded = canonicalJson(message);
		expect(encoded).toBe('{"method": "SUBSCRIBE", "params": ["btc"], "id": 1}');
		expect(decodeFrame(encoded)).toEqual(message);
	});
});

describe("encodeMessage", () => {
	it("passes strings and bytes through", () => {
		const payload = new Uint8Array([1, 2, 3]);
		expect(encodeMessage("raw")).toBe("raw");
		expect(encodeMessage(payload)).toBe(payload);
	});

	it("encodes arrays and objects", () => {
		expect(encodeMessage(["x", 1])).toBe('["x", 1]');
		expect(encodeMessage({ a: 1 })).toBe('{"a": 1}');
	});
});

describe("frameByteLength", () => {
	it("counts UTF-8 bytes for text", () => {
		expect(frameByteLength("hello")).toBe(5);
		expect(frameByteLength("héllo")).toBe(6);
	});

	it("counts raw bytes for binary", () => {
		expect(frameByteLength(new Uint8Array(3))).toBe(3);
	});
});
