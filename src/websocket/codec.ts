import type { Frame } from "../lib/websocket/types.js";
import { tryCatch, unwrapOr } from "../shared/result.js";
import type { InboundMessage, JsonValue, OutboundMessage } from "./types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });
const encoder = new TextEncoder();

function decodeText(text: string): JsonValue {
	return unwrapOr(tryCatch((): JsonValue => JSON.parse(text)), text);
}

/**
 * Decodes an inbound frame: JSON when it parses, otherwise the raw text.
 * Binary frames are tried as UTF-8 JSON and kept as bytes when they are not.
 */
export function decodeFrame(frame: Frame): InboundMessage {
	if (typeof frame === "string") return decodeText(frame);
	const text = tryCatch(() => utf8.decode(frame));
	if (!text.ok) return frame;
	const parsed = tryCatch((): JsonValue => JSON.parse(text.value));
	return parsed.ok ? parsed.value : frame;
}

/**
 * Compact JSON with a space after `:` and `,`, e.g. `{"a": 1, "b": [1, 2]}`.
 *
 * String contents never hold a raw newline once stringified, so collapsing
 * the indented form cannot touch payload text.
 */
export function canonicalJson(value: unknown): string {
	const indented = JSON.stringify(value, null, 1);
	return indented.replace(/,\n */g, ", ").replace(/\n */g, "");
}

/** Strings and bytes pass through; objects and arrays become canonical JSON. */
export function encodeMessage(message: OutboundMessage): Frame {
	if (typeof message === "string" || message instanceof Uint8Array) return message;
	return canonicalJson(message);
}

/** Wire size of a frame in bytes. */
export function frameByteLength(frame: Frame): number {
	return typeof frame === "string" ? encoder.encode(frame).byteLength : frame.byteLength;
}
