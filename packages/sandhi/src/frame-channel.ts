/**
 * The frame-level handle an activated endpoint works with.
 *
 * Outbound frames are encoded straight onto the connection's byte channel.
 * Inbound frames arrive from the connection's decoder; any that arrive
 * before the endpoint attaches a handler are held and replayed, in order,
 * to the first handler registered. The hold is bounded: once activation
 * has settled without a handler, inbound frames are discarded, and a
 * backlog over `maxPendingBytes` closes the connection with 1008.
 */

import { SetuError } from "@setu/core";
import type { Logger } from "@setu/core";
import { encodeFrame, frameHeaderLength } from "./frame-codec.js";
import { CloseCode, Opcode, createFrame, encodeClosePayload } from "./frame.js";
import type { WebSocketFrame } from "./frame.js";

/**
 * Byte-oriented write side of a connection. A Node `Duplex`/`net.Socket`
 * satisfies it.
 */
export interface ByteChannel {
	write(chunk: Buffer): unknown;
	end?(): unknown;
}

export type FrameHandler = (frame: WebSocketFrame) => void;
export type CloseHandler = () => void;
export type ErrorHandler = (error: Error) => void;

export interface FrameChannelOptions {
	/**
	 * Wire bytes held for an endpoint that has not attached a frame handler
	 * yet. Default: unlimited.
	 */
	maxPendingBytes?: number;
}

export class FrameChannel {
	readonly id: string;

	private readonly sink: ByteChannel;
	private readonly log: Logger;
	private frameHandlers: FrameHandler[] = [];
	private closeHandlers: CloseHandler[] = [];
	private errorHandlers: ErrorHandler[] = [];
	private readonly maxPendingBytes?: number;
	/** Frames received before any frame handler was attached. */
	private pending: WebSocketFrame[] = [];
	private pendingBytes = 0;
	/** Activation finished; frames without a handler are no longer held. */
	private settled = false;
	private closeSent = false;
	private closed = false;

	constructor(sink: ByteChannel, id: string, log: Logger, options: FrameChannelOptions = {}) {
		this.sink = sink;
		this.id = id;
		this.log = log;
		this.maxPendingBytes = options.maxPendingBytes;
	}

	/** True until a close frame has been sent or the transport has gone away. */
	get isOpen(): boolean {
		return !this.closeSent && !this.closed;
	}

	/**
	 * Encode and write a frame. Returns false, writing nothing, once a
	 * close frame has been sent.
	 */
	send(frame: WebSocketFrame): boolean {
		if (!this.isOpen) return false;
		this.sink.write(encodeFrame(frame));
		if (frame.opcode === Opcode.Close) this.closeSent = true;
		return true;
	}

	sendText(text: string): boolean {
		return this.send(createFrame({ opcode: Opcode.Text, payload: text }));
	}

	sendBinary(data: Uint8Array): boolean {
		return this.send(createFrame({ opcode: Opcode.Binary, payload: data }));
	}

	ping(payload: Uint8Array | string = ""): boolean {
		return this.send(createFrame({ opcode: Opcode.Ping, payload }));
	}

	pong(payload: Uint8Array | string = ""): boolean {
		return this.send(createFrame({ opcode: Opcode.Pong, payload }));
	}

	/**
	 * Send a close frame (once) and end the byte channel.
	 */
	close(code: number = CloseCode.Normal, reason = ""): void {
		if (!this.isOpen) return;
		this.send(createFrame({ opcode: Opcode.Close, payload: encodeClosePayload(code, reason) }));
		this.sink.end?.();
	}

	onFrame(handler: FrameHandler): void {
		this.frameHandlers.push(handler);
		if (this.frameHandlers.length === 1 && this.pending.length > 0) {
			const queued = this.pending;
			this.dropPending();
			for (const frame of queued) this.dispatch(frame);
		}
	}

	onClose(handler: CloseHandler): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: ErrorHandler): void {
		this.errorHandlers.push(handler);
	}

	/** Hand a decoded frame to the endpoint. @internal */
	_deliver(frame: WebSocketFrame): void {
		if (this.frameHandlers.length > 0) {
			this.dispatch(frame);
			return;
		}
		if (this.settled || !this.isOpen) {
			this.log.debug("Discarding frame with no handler", { opcode: Opcode[frame.opcode] });
			return;
		}

		this.pending.push(frame);
		this.pendingBytes += frameHeaderLength(frame.payload.length, frame.masked) + frame.payload.length;
		if (this.maxPendingBytes !== undefined && this.pendingBytes > this.maxPendingBytes) {
			const held = this.pendingBytes;
			this.dropPending();
			this.log.warn("Closing connection with too many unhandled frames", {
				bytes: held,
				limit: this.maxPendingBytes,
			});
			this._fail(new SetuError(
				`${held} bytes of frames arrived before the endpoint attached a handler, limit is ${this.maxPendingBytes}`,
				"FRAME_BACKLOG",
			));
			this.close(CloseCode.PolicyViolation, "Endpoint not ready");
		}
	}

	/**
	 * Activation returned (or its promise resolved). Held frames are
	 * discarded if no frame handler was attached by then. @internal
	 */
	_activationSettled(): void {
		this.settled = true;
		if (this.frameHandlers.length === 0 && this.pending.length > 0) {
			this.log.debug("Endpoint attached no frame handler; discarding held frames", {
				frames: this.pending.length,
			});
			this.dropPending();
		}
	}

	/** Report a connection-level failure to error handlers. @internal */
	_fail(error: Error): void {
		if (this.errorHandlers.length === 0) {
			this.log.warn("Unhandled frame channel error", { error: error.message });
			return;
		}
		for (const h of this.errorHandlers) {
			try {
				h(error);
			} catch (err) {
				this.log.error("Error handler threw", err);
			}
		}
	}

	/** The transport is gone; notify close handlers once. @internal */
	_markClosed(): void {
		if (this.closed) return;
		this.closed = true;
		this.dropPending();
		for (const h of this.closeHandlers) {
			try {
				h();
			} catch (err) {
				this.log.error("Close handler threw", err);
			}
		}
	}

	private dropPending(): void {
		this.pending = [];
		this.pendingBytes = 0;
	}

	private dispatch(frame: WebSocketFrame): void {
		for (const h of this.frameHandlers) {
			try {
				h(frame);
			} catch (err) {
				this.log.error("Frame handler threw", err, { opcode: Opcode[frame.opcode] });
				this._fail(err instanceof Error ? err : new Error(String(err)));
			}
		}
	}
}
