/**
 * Binds the upgrade coordinator to a Node.js `http.Server`.
 *
 * Node's HTTP parser is the HTTP layer here: it emits `upgrade` with the
 * parsed request, the raw socket, and whatever bytes it had already read
 * past the request head. Reporting a rejected upgrade as an HTTP error is
 * this adapter's job, not the coordinator's.
 */

import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { FrameDecodeError, createLogger } from "@setu/core";
import type { Config, UpgradeErrorKind } from "@setu/core";
import { UpgradeConnection } from "./connection.js";
import { CloseCode } from "./frame.js";
import { HeaderSet, createRequestHead } from "./headers.js";
import type { RequestHead } from "./headers.js";
import { resolveUpgradeOptions } from "./options.js";
import type { UpgradeOptions } from "./options.js";
import type { UpgraderRegistry } from "./registry.js";

const log = createLogger("sandhi:upgrade-server");

/** The parts of an `IncomingMessage` the adapter reads. */
export type UpgradeRequest = Pick<
	IncomingMessage,
	"method" | "url" | "httpVersionMajor" | "httpVersionMinor" | "rawHeaders"
>;

type UpgradeListener = (req: IncomingMessage, socket: Duplex, head: Buffer) => void;

/** Anything that emits Node's `upgrade` event; `http.Server` and `https.Server` qualify. */
export interface UpgradeEventSource {
	on(event: "upgrade", listener: UpgradeListener): unknown;
	removeListener(event: "upgrade", listener: UpgradeListener): unknown;
}

export interface UpgradeServerOptions extends Partial<UpgradeOptions> {
	/** Config whose `websocket` section supplies defaults for the options above. */
	config?: Config;
}

const REJECTION_STATUS: Record<UpgradeErrorKind, string> = {
	invalidUpgradeHeader: "400 Bad Request",
	unsupportedWebSocketTarget: "404 Not Found",
	invalidResponseHeader: "500 Internal Server Error",
};

/** Convert Node's request object into a request head. */
export function requestHeadFromIncoming(req: UpgradeRequest): RequestHead {
	return createRequestHead({
		method: req.method ?? "GET",
		uri: req.url ?? "/",
		version: { major: req.httpVersionMajor, minor: req.httpVersionMinor },
		headers: HeaderSet.fromRawHeaders(req.rawHeaders),
	});
}

interface LiveConnection {
	connection: UpgradeConnection;
	socket: Duplex;
}

export class UpgradeServer {
	private readonly registry: UpgraderRegistry;
	private readonly options: UpgradeOptions;
	private readonly connections: Map<string, LiveConnection> = new Map();
	private source: UpgradeEventSource | null = null;

	private readonly listener: UpgradeListener = (req, socket, head) => {
		this.handleUpgrade(req, socket, head);
	};

	constructor(registry: UpgraderRegistry, options: UpgradeServerOptions = {}) {
		const { config, ...overrides } = options;
		this.registry = registry;
		this.options = resolveUpgradeOptions(config, overrides);
	}

	/**
	 * Start handling `upgrade` events. Seals the registry.
	 * Can only be attached once.
	 */
	attach(server: UpgradeEventSource): void {
		if (this.source) {
			throw new Error("UpgradeServer is already attached to a server");
		}
		this.source = server;
		this.registry.seal();
		server.on("upgrade", this.listener);
	}

	/** Number of upgraded connections still open. */
	get connectionCount(): number {
		return this.connections.size;
	}

	/**
	 * Handle one upgrade. Exposed for servers that dispatch `upgrade`
	 * themselves rather than through {@link attach}.
	 */
	handleUpgrade(req: UpgradeRequest, socket: Duplex, head: Buffer): void {
		const connection = new UpgradeConnection(this.registry, socket, {
			maxFramePayload: this.options.maxFramePayload,
			maxPendingBytes: this.options.maxPendingBytes,
		});

		socket.on("error", (err: Error) => {
			log.warn("Socket error", { connectionId: connection.id, error: err.message });
			this.remove(connection);
		});

		const requestHead = requestHeadFromIncoming(req);
		try {
			const result = connection.handleRequest(requestHead, head);
			if (!result.accepted) {
				this.rejectUpgrade(socket, result.error.kind, result.error.message);
				return;
			}
		} catch (err) {
			if (!(err instanceof FrameDecodeError) || !connection.channel) {
				log.error("Upgrade handling failed", err, { connectionId: connection.id, uri: requestHead.uri });
				socket.destroy(err instanceof Error ? err : undefined);
				return;
			}
			// Upgraded, but the pipelined bytes were not a valid frame.
			this.track(connection, socket);
			this.failConnection(connection, socket, err);
			return;
		}

		this.track(connection, socket);
		socket.on("data", (chunk: Buffer) => this.onData(connection, socket, chunk));
		log.info("WebSocket connected", { connectionId: connection.id, uri: requestHead.uri });
	}

	/**
	 * Close every connection with 1001 and stop listening for upgrades.
	 */
	shutdown(): void {
		if (this.source) {
			this.source.removeListener("upgrade", this.listener);
			this.source = null;
		}
		for (const { connection, socket } of this.connections.values()) {
			connection.channel?.close(CloseCode.GoingAway, "Server shutting down");
			connection.close();
			this.scheduleDestroy(socket);
		}
		this.connections.clear();
	}

	// ─── Internal ─────────────────────────────────────────────────────────

	private track(connection: UpgradeConnection, socket: Duplex): void {
		this.connections.set(connection.id, { connection, socket });
		socket.on("close", () => this.remove(connection));
		// A sent close frame ends the write side; the read side stays open until destroyed.
		socket.once("finish", () => this.scheduleDestroy(socket));
	}

	private onData(connection: UpgradeConnection, socket: Duplex, chunk: Buffer): void {
		if (connection.state !== "frame-mode") {
			log.debug("Dropping bytes received after close", { connectionId: connection.id, bytes: chunk.length });
			return;
		}
		try {
			connection.handleBytes(chunk);
		} catch (err) {
			if (err instanceof FrameDecodeError) {
				this.failConnection(connection, socket, err);
				return;
			}
			socket.destroy(err instanceof Error ? err : new Error(String(err)));
		}
	}

	private failConnection(connection: UpgradeConnection, socket: Duplex, err: FrameDecodeError): void {
		log.warn("Closing connection after malformed frame", {
			connectionId: connection.id,
			reason: err.message,
			closeCode: err.closeCode,
		});
		connection.channel?.close(err.closeCode, err.closeCode === CloseCode.MessageTooBig ? "Message too big" : "Protocol error");
		this.scheduleDestroy(socket);
	}

	private scheduleDestroy(socket: Duplex): void {
		const timer = setTimeout(() => socket.destroy(), this.options.closeTimeoutMs);
		timer.unref();
	}

	/**
	 * Report a refused upgrade, then destroy the socket after
	 * `closeTimeoutMs`. Without `rejectWithHttpError` the socket is
	 * destroyed straight away.
	 */
	private rejectUpgrade(socket: Duplex, kind: UpgradeErrorKind, message: string): void {
		if (!this.options.rejectWithHttpError) {
			socket.destroy();
			return;
		}
		const body = JSON.stringify({ error: message, kind });
		const response = [
			`HTTP/1.1 ${REJECTION_STATUS[kind]}`,
			"Content-Type: application/json",
			`Content-Length: ${Buffer.byteLength(body)}`,
			"Connection: close",
			"",
			body,
		].join("\r\n");
		socket.end(response);
		this.scheduleDestroy(socket);
	}

	private remove(connection: UpgradeConnection): void {
		if (!this.connections.delete(connection.id)) return;
		connection.close();
		log.info("WebSocket disconnected", { connectionId: connection.id });
	}
}
