import { bench, describe } from "vitest";
import { canonicalJson, decodeFrame, frameByteLength } from "../src/websocket/codec.js";
import { BoundedQueue } from "../src/websocket/queue.js";
import type { InboundMessage } from "../src/websocket/types.js";

function bookUpdate(levels: number): Record<string, unknown> {
	const bids: [string, string][] = [];
	const asks: [string, string][] = [];
	for (let i = 0; i < levels; i++) {
		bids.push([(100 - i * 0.5).toFixed(2), (Math.random() * 10).toFixed(4)]);
		asks.push([(100.5 + i * 0.5).toFixed(2), (Math.random() * 10).toFixed(4)]);
	}
	return { stream: "book.x", seq: 42, bids, asks };
}

const small = JSON.stringify(bookUpdate(5));
const large = JSON.stringify(bookUpdate(200));
const binary = new TextEncoder().encode(large);

describe("decodeFrame", () => {
	bench("text frame, 5 levels", () => {
		decodeFrame(small);
	});

	bench("text frame, 200 levels", () => {
		decodeFrame(large);
	});

	bench("binary JSON frame, 200 levels", () => {
		decodeFrame(binary);
	});

	bench("non-JSON text frame", () => {
		decodeFrame("pong");
	});
});

describe("encode", () => {
	const message = bookUpdate(20);

	bench("canonicalJson, 20 levels", () => {
		canonicalJson(message);
	});

	bench("frameByteLength, 200 levels", () => {
		frameByteLength(large);
	});
});

describe("BoundedQueue", () => {
	bench("tryPut + shift x1000", () => {
		const queue = new BoundedQueue<InboundMessage>(1_000);
		for (let i = 0; i < 1_000; i++) queue.tryPut(i);
		let item = queue.shift();
		while (item !== undefined) item = queue.shift();
	});
});
