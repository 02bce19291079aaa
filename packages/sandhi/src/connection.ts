/**
 * Sandhi: per-connection upgrade coordinator.
 * Sanskrit: Sandhi (सन्धि) = joining, the point where two things meet.
 *
 * Drives one connection from a parsed HTTP request head to frame mode:
 *
 *   awaiting-request → validating → rejected
 *                                 → accepted → frame-mode → closed
 *
 * The HTTP layer hands over the request head together with any bytes it
 * read past the end of the head. On acceptance the 101 response is written,
 * the endpoint is activated, and only then are those leftover bytes decoded
 * as frames. Nothing after that point is interpreted as HTTP.
 */

import { randomUUID } from "node:crypto";
import { FrameDecodeError, ProtocolError, UpgradeError, createLogger } from "@setu/core";
import type { Logger } from "@setu/core";
import { decodeFrame } from "./frame-codec.js";
import { CloseCode } from "./frame.js";
import { FrameChannel } from "./frame-channel.js";
import type { ByteChannel } from "./frame-channel.js";
import { serializeResponseHead } from "./handshake.js";
import type { RequestHead } from "./headers.js";
import type { HandshakeResult, UpgraderDescriptor, UpgraderRegistry } from "./registry.js";

const connectionLog = createLogger("sandhi:connection");

export type UpgradeState =
	| "awaiting-request"
	| "validating"
	| "accepted"
	| "rejected"
	| "frame-mode"
	| "closed";

export interface UpgradeConnectionOptions {
	/** Connection identifier for logs. Default: random UUID. */
	id?: string;
	/** Largest payload accepted in a single frame. Default: unlimited. */
	maxFramePayload?: number;
	/** Wire bytes held for an endpoint with no frame handler yet. Default: unlimited. */
	maxPendingBytes?: number;
	logger?: Logger;
}

export class UpgradeConnection {
	readonly id: string;

	private _state: UpgradeState = "awaiting-request";
	private _channel?: FrameChannel;
	/** Bytes of an incomplete frame, carried to the next `handleBytes` call. */
	private buffer: Buffer = Buffer.alloc(0);

	private readonly registry: UpgraderRegistry;
	private readonly sink: ByteChannel;
	private readonly maxFramePayload?: number;
	private readonly maxPendingBytes?: number;
	private readonly log: Logger;

	constructor(registry: UpgraderRegistry, sink: ByteChannel, options: UpgradeConnectionOptions = {}) {
		this.registry = registry;
		this.sink = sink;
		this.id = options.id ?? randomUUID();
		this.maxFramePayload = options.maxFramePayload;
		this.maxPendingBytes = options.maxPendingBytes;
		this.log = (options.logger ?? connectionLog).withContext({ connectionId: this.id });
	}

	get state(): UpgradeState {
		return this._state;
	}

	/** The endpoint's frame channel, once the upgrade has been accepted. */
	get channel(): FrameChannel | undefined {
		return this._channel;
	}

	/**
	 * Run the handshake for `head`.
	 *
	 * On rejection nothing is written and the connection is left open for
	 * the HTTP layer to report the error. On acceptance the response head is
	 * written, the winning endpoint is activated, and `buffered` (bytes read
	 * past the request head) is decoded as frame data.
	 *
	 * @throws {ProtocolError} if a handshake has already been attempted on
	 *   this connection.
	 * @throws {FrameDecodeError} if `buffered` holds a malformed frame. The
	 *   upgrade has completed by then; the caller should close the connection.
	 */
	handleRequest(head: RequestHead, buffered?: Uint8Array): HandshakeResult {
		if (this._state !== "awaiting-request") {
			throw new ProtocolError(
				`Upgrade request received in state "${this._state}"; only one handshake is allowed per connection`,
				this._state,
			);
		}
		this._state = "validating";

		let result: HandshakeResult;
		try {
			result = this.registry.select(head);
		} catch (err) {
			this._state = "rejected";
			throw err;
		}

		if (!result.accepted) {
			return this.reject(head, result.error);
		}

		let responseHead: string;
		try {
			responseHead = serializeResponseHead(result.responseHeaders);
		} catch (err) {
			if (err instanceof UpgradeError) return this.reject(head, err);
			throw err;
		}

		this._state = "accepted";
		this.sink.write(Buffer.from(responseHead, "latin1"));

		const channel = new FrameChannel(this.sink, this.id, this.log, { maxPendingBytes: this.maxPendingBytes });
		this._channel = channel;
		this.log.debug("WebSocket upgrade accepted", {
			endpoint: result.descriptor.name ?? "(unnamed)",
			uri: head.uri,
		});

		this.activate(result.descriptor, channel, head);

		if (!channel.isOpen) {
			this._state = "closed";
			return result;
		}
		this._state = "frame-mode";
		if (buffered && buffered.length > 0) {
			this.handleBytes(buffered);
		}
		return result;
	}

	/**
	 * Feed bytes received after the upgrade. Complete frames are delivered to
	 * the endpoint in order; a trailing partial frame is kept for next time.
	 *
	 * @throws {ProtocolError} unless the connection is in frame mode.
	 * @throws {FrameDecodeError} on a malformed frame; the connection moves
	 *   to `closed` and the caller should close the transport.
	 */
	handleBytes(chunk: Uint8Array): void {
		const channel = this._channel;
		if (this._state !== "frame-mode" || !channel) {
			throw new ProtocolError(`Frame data received in state "${this._state}"`, this._state);
		}

		this.buffer = this.buffer.length > 0
			? Buffer.concat([this.buffer, chunk])
			: Buffer.from(chunk);

		let offset = 0;
		try {
			while (offset < this.buffer.length) {
				const result = decodeFrame(this.buffer, offset, { maxPayloadLength: this.maxFramePayload });
				if (result.kind === "need-more-data") break;
				offset += result.bytesConsumed;
				channel._deliver(result.frame);
			}
		} catch (err) {
			this._state = "closed";
			this.buffer = Buffer.alloc(0);
			if (err instanceof FrameDecodeError) {
				this.log.debug("Frame decode failed", { reason: err.message, closeCode: err.closeCode });
				channel._fail(err);
			}
			throw err;
		}

		this.buffer = offset > 0 ? Buffer.from(this.buffer.subarray(offset)) : this.buffer;
	}

	/** Mark the connection finished, e.g. when the transport closes. */
	close(): void {
		this._state = "closed";
		this.buffer = Buffer.alloc(0);
		this._channel?._markClosed();
	}

	// ─── Internal ─────────────────────────────────────────────────────────

	private reject(head: RequestHead, error: UpgradeError): HandshakeResult {
		this._state = "rejected";
		this.log.debug("WebSocket upgrade rejected", { kind: error.kind, uri: head.uri });
		return { accepted: false, error };
	}

	private activate(descriptor: UpgraderDescriptor, channel: FrameChannel, head: RequestHead): void {
		let outcome: void | Promise<void>;
		try {
			outcome = descriptor.onActivate(channel, head);
		} catch (err) {
			this.activationFailed(channel, err);
			return;
		}
		if (outcome instanceof Promise) {
			outcome.then(
				() => channel._activationSettled(),
				(err: unknown) => this.activationFailed(channel, err),
			);
			return;
		}
		channel._activationSettled();
	}

	private activationFailed(channel: FrameChannel, err: unknown): void {
		const error = err instanceof Error ? err : new Error(String(err));
		this.log.error("Endpoint activation failed", error);
		channel._fail(error);
		channel.close(CloseCode.InternalError, "Endpoint activation failed");
		if (this._state === "frame-mode") {
			this._state = "closed";
			this.buffer = Buffer.alloc(0);
		}
	}
}
