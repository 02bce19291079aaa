/**
 * WebSocket frame values (RFC 6455 section 5).
 */

import { FrameDecodeError, FrameError } from "@setu/core";

// ─── Opcodes ────────────────────────────────────────────────────────────────

export enum Opcode {
	Continuation = 0x0,
	Text = 0x1,
	Binary = 0x2,
	Close = 0x8,
	Ping = 0x9,
	Pong = 0xa,
}

const KNOWN_OPCODES: ReadonlyMap<number, Opcode> = new Map([
	[Opcode.Continuation, Opcode.Continuation],
	[Opcode.Text, Opcode.Text],
	[Opcode.Binary, Opcode.Binary],
	[Opcode.Close, Opcode.Close],
	[Opcode.Ping, Opcode.Ping],
	[Opcode.Pong, Opcode.Pong],
]);

/** Map a 4-bit wire value to an opcode. Reserved values (3-7, 11-15) give undefined. */
export function toOpcode(value: number): Opcode | undefined {
	return KNOWN_OPCODES.get(value);
}

/** Close, ping and pong. */
export function isControlOpcode(opcode: Opcode): boolean {
	return (opcode & 0x8) !== 0;
}

/** Largest payload a control frame may carry. */
export const MAX_CONTROL_PAYLOAD = 125;

/** Status codes used in close frames (RFC 6455 section 7.4.1). */
export const CloseCode = {
	Normal: 1000,
	GoingAway: 1001,
	ProtocolError: 1002,
	UnsupportedData: 1003,
	InvalidPayload: 1007,
	PolicyViolation: 1008,
	MessageTooBig: 1009,
	InternalError: 1011,
} as const;

// ─── Frame ──────────────────────────────────────────────────────────────────

interface FrameFields {
	/** Final fragment of a message. Always true for control frames. */
	readonly fin: boolean;
	readonly opcode: Opcode;
	/** Application data, never masked. */
	readonly payload: Buffer;
}

/** A masked frame always carries its four-byte key. */
export type WebSocketFrame = FrameFields & (
	| { readonly masked: true; readonly maskKey: Buffer }
	| { readonly masked: false; readonly maskKey?: undefined }
);

export interface FrameInit {
	/** Default: true. */
	fin?: boolean;
	opcode: Opcode;
	/** Strings are encoded as UTF-8. Default: empty. */
	payload?: Uint8Array | string;
	maskKey?: Uint8Array;
}

/**
 * Create a frame value, enforcing the invariants every frame must hold.
 *
 * @throws {FrameError} on a mask key that is not 4 bytes, a fragmented
 *   control frame, or a control payload over 125 bytes.
 */
export function createFrame(init: FrameInit): WebSocketFrame {
	const fin = init.fin ?? true;
	const payload = typeof init.payload === "string"
		? Buffer.from(init.payload, "utf-8")
		: Buffer.from(init.payload ?? new Uint8Array(0));

	if (toOpcode(init.opcode) === undefined) {
		throw new FrameError(`Unknown opcode 0x${init.opcode.toString(16)}`);
	}
	if (init.maskKey !== undefined && init.maskKey.length !== 4) {
		throw new FrameError(`Mask key must be 4 bytes, got ${init.maskKey.length}`);
	}
	if (isControlOpcode(init.opcode)) {
		if (!fin) {
			throw new FrameError(`Control frame ${Opcode[init.opcode]} must not be fragmented`);
		}
		if (payload.length > MAX_CONTROL_PAYLOAD) {
			throw new FrameError(
				`Control frame ${Opcode[init.opcode]} payload is ${payload.length} bytes, limit is ${MAX_CONTROL_PAYLOAD}`,
			);
		}
	}

	const frame: WebSocketFrame = init.maskKey !== undefined
		? { fin, opcode: init.opcode, masked: true, maskKey: Buffer.from(init.maskKey), payload }
		: { fin, opcode: init.opcode, masked: false, payload };
	return Object.freeze(frame);
}

/** Payload decoded as UTF-8. */
export function frameText(frame: WebSocketFrame): string {
	return frame.payload.toString("utf-8");
}

// ─── Close Payload ──────────────────────────────────────────────────────────

/**
 * Build a close frame body: 2-byte status code followed by a UTF-8 reason.
 * With no code the body is empty.
 */
export function encodeClosePayload(code?: number, reason = ""): Buffer {
	if (code === undefined) {
		if (reason) throw new FrameError("A close reason requires a status code");
		return Buffer.alloc(0);
	}
	if (!Number.isInteger(code) || code < 1000 || code > 4999) {
		throw new FrameError(`Invalid close code ${code}`);
	}
	const reasonBuf = Buffer.from(reason, "utf-8");
	if (reasonBuf.length > MAX_CONTROL_PAYLOAD - 2) {
		throw new FrameError(`Close reason is ${reasonBuf.length} bytes, limit is ${MAX_CONTROL_PAYLOAD - 2}`);
	}
	const payload = Buffer.alloc(2 + reasonBuf.length);
	payload.writeUInt16BE(code, 0);
	reasonBuf.copy(payload, 2);
	return payload;
}

export interface ClosePayload {
	code?: number;
	reason: string;
}

/**
 * Parse a close frame body.
 *
 * @throws {FrameDecodeError} on a 1-byte body, which cannot hold a status code.
 */
export function decodeClosePayload(payload: Uint8Array): ClosePayload {
	if (payload.length === 0) return { reason: "" };
	if (payload.length === 1) {
		throw new FrameDecodeError("Close frame body of 1 byte cannot carry a status code");
	}
	const buf = Buffer.from(payload);
	return { code: buf.readUInt16BE(0), reason: buf.toString("utf-8", 2) };
}

/** Convenience: an unmasked close frame. */
export function closeFrame(code?: number, reason = ""): WebSocketFrame {
	return createFrame({ opcode: Opcode.Close, payload: encodeClosePayload(code, reason) });
}
