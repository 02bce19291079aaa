import { describe, it, expect, vi } from "vitest";
import { EventEmitter } from "node:events";
import { Duplex } from "node:stream";
import { createConfig } from "@setu/core";
import { Opcode } from "../src/frame.js";
import type { WebSocketFrame } from "../src/frame.js";
import { encodeFrame, maskedFrame } from "../src/frame-codec.js";
import type { FrameChannel } from "../src/frame-channel.js";
import { UpgraderRegistry, pathUpgrader } from "../src/registry.js";
import { UpgradeServer, requestHeadFromIncoming } from "../src/upgrade-server.js";
import type { UpgradeRequest, UpgradeServerOptions } from "../src/upgrade-server.js";

const CLIENT_KEY = "AQIDBAUGBwgJCgsMDQ4PEC==";
const MASK = Buffer.from([0x0a, 0x0b, 0x0c, 0x0d]);

const SWITCHING_RESPONSE =
	"HTTP/1.1 101 Switching Protocols\r\n" +
	"Upgrade: websocket\r\n" +
	"Connection: upgrade\r\n" +
	"Sec-WebSocket-Accept: OfS0wDaT5NoxF2gqm7Zj2YtetzM=\r\n" +
	"\r\n";

/** Socket stand-in that records everything written to it. */
class FakeSocket extends Duplex {
	written: Buffer[] = [];

	override _read(): void {}

	override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
		this.written.push(Buffer.from(chunk));
		callback();
	}

	text(): string {
		return Buffer.concat(this.written).toString("latin1");
	}
}

function request(url: string, version = "13"): UpgradeRequest {
	return {
		method: "GET",
		url,
		httpVersionMajor: 1,
		httpVersionMinor: 1,
		rawHeaders: [
			"Host", "example.com",
			"Connection", "Upgrade",
			"Upgrade", "websocket",
			"Sec-WebSocket-Version", version,
			"Sec-WebSocket-Key", CLIENT_KEY,
		],
	};
}

function chatServer(options: UpgradeServerOptions = {}) {
	const frames: WebSocketFrame[] = [];
	const channels: FrameChannel[] = [];
	const registry = new UpgraderRegistry().register(pathUpgrader("/chat", (channel) => {
		channels.push(channel);
		channel.onFrame((frame) => frames.push(frame));
	}));
	const server = new UpgradeServer(registry, { closeTimeoutMs: 0, ...options });
	return { registry, server, frames, channels };
}

function rejection(status: string, body: string): string {
	return [
		`HTTP/1.1 ${status}`,
		"Content-Type: application/json",
		`Content-Length: ${Buffer.byteLength(body)}`,
		"Connection: close",
		"",
		body,
	].join("\r\n");
}

describe("requestHeadFromIncoming", () => {
	it("should carry method, URI, version and raw headers over", () => {
		const head = requestHeadFromIncoming(request("/chat?x=1"));
		expect(head.method).toBe("GET");
		expect(head.uri).toBe("/chat?x=1");
		expect(head.version).toEqual({ major: 1, minor: 1 });
		expect(head.headers.get("sec-websocket-key")).toBe(CLIENT_KEY);
		expect(head.headers.size).toBe(5);
	});
});

describe("UpgradeServer", () => {
	// ═══════════════════════════════════════════════════════════════════════
	// Handshake
	// ═══════════════════════════════════════════════════════════════════════

	describe("handshake", () => {
		it("should answer an accepted upgrade with 101 and track the connection", () => {
			const { server, channels } = chatServer();
			const socket = new FakeSocket();

			server.handleUpgrade(request("/chat"), socket, Buffer.alloc(0));

			expect(socket.text()).toBe(SWITCHING_RESPONSE);
			expect(channels).toHaveLength(1);
			expect(server.connectionCount).toBe(1);
		});

		it("should answer an unknown path with 404", () => {
			const { server, channels } = chatServer();
			const socket = new FakeSocket();

			server.handleUpgrade(request("/missing"), socket, Buffer.alloc(0));

			const body = JSON.stringify({
				error: "No WebSocket endpoint accepted GET /missing",
				kind: "unsupportedWebSocketTarget",
			});
			expect(socket.text()).toBe(rejection("404 Not Found", body));
			expect(socket.writableEnded).toBe(true);
			expect(channels).toHaveLength(0);
			expect(server.connectionCount).toBe(0);
		});

		it("should answer an unsupported version with 400", () => {
			const { server } = chatServer();
			const socket = new FakeSocket();

			server.handleUpgrade(request("/chat", "12"), socket, Buffer.alloc(0));

			const body = JSON.stringify({
				error: "Unsupported Sec-WebSocket-Version \"12\", expected \"13\"",
				kind: "invalidUpgradeHeader",
			});
			expect(socket.text()).toBe(rejection("400 Bad Request", body));
		});

		it("should destroy the socket after writing a rejection", async () => {
			const { server } = chatServer();
			const socket = new FakeSocket();

			server.handleUpgrade(request("/missing"), socket, Buffer.alloc(0));

			await vi.waitFor(() => expect(socket.destroyed).toBe(true));
			expect(socket.text().startsWith("HTTP/1.1 404 Not Found\r\n")).toBe(true);
		});

		it("should drop the socket silently when HTTP errors are disabled", () => {
			const { server } = chatServer({ rejectWithHttpError: false });
			const socket = new FakeSocket();

			server.handleUpgrade(request("/missing"), socket, Buffer.alloc(0));

			expect(socket.written).toHaveLength(0);
			expect(socket.destroyed).toBe(true);
		});

		it("should read its options from the websocket config section", () => {
			const config = createConfig("project", { websocket: { rejectWithHttpError: false } });
			const { server } = chatServer({ config });
			const socket = new FakeSocket();

			server.handleUpgrade(request("/missing"), socket, Buffer.alloc(0));

			expect(socket.destroyed).toBe(true);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Frames
	// ═══════════════════════════════════════════════════════════════════════

	describe("frames", () => {
		it("should decode pipelined bytes and later socket data", () => {
			const { server, frames } = chatServer();
			const socket = new FakeSocket();

			server.handleUpgrade(request("/chat"), socket, encodeFrame(maskedFrame(Opcode.Text, "first", { maskKey: MASK })));
			socket.emit("data", encodeFrame(maskedFrame(Opcode.Binary, "hello, world", { maskKey: MASK })));

			expect(frames.map((f) => [f.opcode, f.payload.toString()])).toEqual([
				[Opcode.Text, "first"],
				[Opcode.Binary, "hello, world"],
			]);
		});

		it("should close with 1002 on a malformed frame", async () => {
			const { server } = chatServer();
			const socket = new FakeSocket();
			server.handleUpgrade(request("/chat"), socket, Buffer.alloc(0));

			socket.emit("data", Buffer.from([0xf1, 0x80, 0, 0, 0, 0]));

			const close = socket.written[1];
			expect([...close.subarray(0, 4)]).toEqual([0x88, 16, 0x03, 0xea]);
			expect(close.subarray(4).toString()).toBe("Protocol error");
			await vi.waitFor(() => expect(socket.destroyed).toBe(true));
		});

		it("should close with 1009 when a frame exceeds the payload limit", () => {
			const { server } = chatServer({ maxFramePayload: 4 });
			const socket = new FakeSocket();

			server.handleUpgrade(request("/chat"), socket, encodeFrame(maskedFrame(Opcode.Binary, "too long", { maskKey: MASK })));

			const close = socket.written[1];
			expect([...close.subarray(0, 4)]).toEqual([0x88, 17, 0x03, 0xf1]);
			expect(close.subarray(4).toString()).toBe("Message too big");
		});

		it("should discard frames sent to an endpoint with no frame handler", () => {
			const channels: FrameChannel[] = [];
			const registry = new UpgraderRegistry().register(pathUpgrader("/feed", (channel) => {
				channels.push(channel);
			}));
			const server = new UpgradeServer(registry, { closeTimeoutMs: 0 });
			const socket = new FakeSocket();
			server.handleUpgrade(request("/feed"), socket, Buffer.alloc(0));

			const frame = encodeFrame(maskedFrame(Opcode.Binary, Buffer.alloc(1000, 1), { maskKey: MASK }));
			for (let i = 0; i < 10_000; i++) socket.emit("data", frame);
			const late = vi.fn();
			channels[0].onFrame(late);

			expect(late).not.toHaveBeenCalled();
			expect(socket.written).toHaveLength(1);
			expect(server.connectionCount).toBe(1);
		});

		it("should close with 1008 and destroy the socket when an activating endpoint falls behind", async () => {
			const registry = new UpgraderRegistry().register(pathUpgrader("/slow", () => new Promise<void>(() => {})));
			const server = new UpgradeServer(registry, { closeTimeoutMs: 0, maxPendingBytes: 2048 });
			const socket = new FakeSocket();
			server.handleUpgrade(request("/slow"), socket, Buffer.alloc(0));

			const frame = encodeFrame(maskedFrame(Opcode.Binary, Buffer.alloc(1000, 1), { maskKey: MASK }));
			for (let i = 0; i < 3; i++) socket.emit("data", frame);

			const close = socket.written[1];
			expect([...close.subarray(0, 4)]).toEqual([0x88, 20, 0x03, 0xf0]);
			expect(close.subarray(4).toString()).toBe("Endpoint not ready");
			await vi.waitFor(() => expect(socket.destroyed).toBe(true));
			await vi.waitFor(() => expect(server.connectionCount).toBe(0));
		});

		it("should ignore data arriving after the connection failed", () => {
			const { server, frames } = chatServer();
			const socket = new FakeSocket();
			server.handleUpgrade(request("/chat"), socket, Buffer.alloc(0));

			socket.emit("data", Buffer.from([0xf1, 0x80, 0, 0, 0, 0]));
			socket.emit("data", encodeFrame(maskedFrame(Opcode.Text, "late", { maskKey: MASK })));

			expect(frames).toHaveLength(0);
			expect(socket.written).toHaveLength(2);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Lifecycle
	// ═══════════════════════════════════════════════════════════════════════

	describe("lifecycle", () => {
		it("should handle upgrade events once attached and seal the registry", () => {
			const { registry, server, channels } = chatServer();
			const source = new EventEmitter();

			server.attach(source);
			source.emit("upgrade", request("/chat"), new FakeSocket(), Buffer.alloc(0));

			expect(registry.isSealed).toBe(true);
			expect(channels).toHaveLength(1);
		});

		it("should refuse to attach twice", () => {
			const { server } = chatServer();
			server.attach(new EventEmitter());
			expect(() => server.attach(new EventEmitter())).toThrow("already attached");
		});

		it("should forget a connection when its socket closes", async () => {
			const { server, channels } = chatServer();
			const socket = new FakeSocket();
			server.handleUpgrade(request("/chat"), socket, Buffer.alloc(0));
			const onClose = vi.fn();
			channels[0].onClose(onClose);

			socket.destroy();

			await vi.waitFor(() => expect(server.connectionCount).toBe(0));
			expect(onClose).toHaveBeenCalledTimes(1);
		});

		it("should destroy and forget the socket after the endpoint closes", async () => {
			const { server, channels } = chatServer();
			const socket = new FakeSocket();
			server.handleUpgrade(request("/chat"), socket, Buffer.alloc(0));

			channels[0].close(1000, "bye");

			expect([...socket.written[1]]).toEqual([0x88, 5, 0x03, 0xe8, 0x62, 0x79, 0x65]);
			await vi.waitFor(() => expect(socket.destroyed).toBe(true));
			await vi.waitFor(() => expect(server.connectionCount).toBe(0));
		});

		it("should close every connection with 1001 on shutdown", () => {
			const { server, channels } = chatServer();
			const source = new EventEmitter();
			server.attach(source);
			const socket = new FakeSocket();
			source.emit("upgrade", request("/chat"), socket, Buffer.alloc(0));
			const onClose = vi.fn();
			channels[0].onClose(onClose);

			server.shutdown();

			const close = socket.written[1];
			expect([...close.subarray(0, 4)]).toEqual([0x88, 22, 0x03, 0xe9]);
			expect(close.subarray(4).toString()).toBe("Server shutting down");
			expect(onClose).toHaveBeenCalledTimes(1);
			expect(server.connectionCount).toBe(0);
			expect(source.listenerCount("upgrade")).toBe(0);
		});
	});
});
