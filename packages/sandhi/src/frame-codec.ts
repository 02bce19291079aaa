/**
 * Frame codec: bytes to frames and back (RFC 6455 section 5.2).
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-------+-+-------------+-------------------------------+
 *  |F|R|R|R| opcode|M| Payload len |    Extended payload length    |
 *  |I|S|S|S|  (4)  |A|     (7)     |             (16/64)           |
 *  |N|V|V|V|       |S|             |   (if payload len==126/127)   |
 *  +-+-+-+-+-------+-+-------------+-------------------------------+
 *
 * Both directions are pure functions. The decoder keeps nothing between
 * calls: a caller holding a partial frame re-offers the whole buffer once
 * more bytes arrive.
 */

import { randomBytes } from "node:crypto";
import { FrameDecodeError } from "@setu/core";
import {
	CloseCode,
	MAX_CONTROL_PAYLOAD,
	Opcode,
	createFrame,
	isControlOpcode,
	toOpcode,
} from "./frame.js";
import type { WebSocketFrame } from "./frame.js";

const FIN_BIT = 0x80;
const RSV_BITS = 0x70;
const OPCODE_BITS = 0x0f;
const MASK_BIT = 0x80;
const LENGTH_BITS = 0x7f;

/** Length field values that announce an extended length. */
const LENGTH_16 = 126;
const LENGTH_64 = 127;

const TWO_POW_32 = 0x1_0000_0000;

// ─── Masking ────────────────────────────────────────────────────────────────

/**
 * XOR every byte with `maskKey[i mod 4]`. Returns a new buffer; masking
 * and unmasking are the same operation.
 */
export function applyMask(payload: Uint8Array, maskKey: Uint8Array): Buffer {
	const out = Buffer.allocUnsafe(payload.length);
	for (let i = 0; i < payload.length; i++) {
		out[i] = payload[i] ^ maskKey[i % 4];
	}
	return out;
}

// ─── Encoding ───────────────────────────────────────────────────────────────

/** Size of the header (base, extended length and mask key) for a frame. */
export function frameHeaderLength(payloadLength: number, masked: boolean): number {
	const base = payloadLength < LENGTH_16 ? 2 : payloadLength <= 0xffff ? 4 : 10;
	return base + (masked ? 4 : 0);
}

/**
 * Encode a frame. Reserved bits are always written as zero. A frame with a
 * mask key has its payload masked on the way out.
 */
export function encodeFrame(frame: WebSocketFrame): Buffer {
	const len = frame.payload.length;
	const headerLen = frameHeaderLength(len, frame.masked);
	const out = Buffer.alloc(headerLen + len);

	out[0] = (frame.fin ? FIN_BIT : 0) | frame.opcode;
	const maskBit = frame.masked ? MASK_BIT : 0;

	let offset: number;
	if (len < LENGTH_16) {
		out[1] = maskBit | len;
		offset = 2;
	} else if (len <= 0xffff) {
		out[1] = maskBit | LENGTH_16;
		out.writeUInt16BE(len, 2);
		offset = 4;
	} else {
		out[1] = maskBit | LENGTH_64;
		// Buffer has no 53-bit writer; split into high and low words.
		out.writeUInt32BE(Math.floor(len / TWO_POW_32), 2);
		out.writeUInt32BE(len >>> 0, 6);
		offset = 10;
	}

	if (frame.masked) {
		const maskKey = frame.maskKey;
		maskKey.copy(out, offset);
		offset += 4;
		for (let i = 0; i < len; i++) {
			out[offset + i] = frame.payload[i] ^ maskKey[i % 4];
		}
	} else {
		frame.payload.copy(out, offset);
	}
	return out;
}

/**
 * Build a client-to-server frame with a freshly generated mask key.
 * Clients must mask every frame they send.
 */
export function maskedFrame(
	opcode: Opcode,
	payload: Uint8Array | string = new Uint8Array(0),
	options: { fin?: boolean; maskKey?: Uint8Array } = {},
): WebSocketFrame {
	return createFrame({
		fin: options.fin,
		opcode,
		payload,
		maskKey: options.maskKey ?? randomBytes(4),
	});
}

// ─── Decoding ───────────────────────────────────────────────────────────────

export interface DecodeOptions {
	/** Reject frames declaring a larger payload (close code 1009). */
	maxPayloadLength?: number;
}

export type DecodeResult =
	| { kind: "frame"; frame: WebSocketFrame; bytesConsumed: number }
	| { kind: "need-more-data"; bytesNeeded: number };

function needMore(bytesNeeded: number): DecodeResult {
	return { kind: "need-more-data", bytesNeeded };
}

/**
 * Try to decode one frame starting at `offset`.
 *
 * Returns `need-more-data` with the minimum number of further bytes
 * required when the buffer ends inside the frame. `bytesNeeded` can grow
 * once the extended length becomes readable.
 *
 * @throws {FrameDecodeError} for reserved bits, reserved opcodes, malformed
 *   control frames, a 64-bit length with its top bit set, or a payload
 *   over `maxPayloadLength`.
 */
export function decodeFrame(
	buffer: Uint8Array,
	offset = 0,
	options: DecodeOptions = {},
): DecodeResult {
	const buf = Buffer.isBuffer(buffer) ? buffer : Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);
	const available = buf.length - offset;
	if (available < 2) return needMore(2 - available);

	const byte0 = buf[offset];
	const byte1 = buf[offset + 1];

	if ((byte0 & RSV_BITS) !== 0) {
		throw new FrameDecodeError(`Reserved bits set in frame header (0x${(byte0 & RSV_BITS).toString(16)})`);
	}
	const opcode = toOpcode(byte0 & OPCODE_BITS);
	if (opcode === undefined) {
		throw new FrameDecodeError(`Reserved opcode 0x${(byte0 & OPCODE_BITS).toString(16)}`);
	}

	const fin = (byte0 & FIN_BIT) !== 0;
	const masked = (byte1 & MASK_BIT) !== 0;
	let payloadLen = byte1 & LENGTH_BITS;

	if (isControlOpcode(opcode)) {
		if (!fin) {
			throw new FrameDecodeError(`Fragmented control frame (${Opcode[opcode]})`);
		}
		if (payloadLen > MAX_CONTROL_PAYLOAD) {
			throw new FrameDecodeError(`Control frame (${Opcode[opcode]}) declares a payload over ${MAX_CONTROL_PAYLOAD} bytes`);
		}
	}

	let headerLen = 2;
	if (payloadLen === LENGTH_16) {
		if (available < 4) return needMore(4 - available);
		payloadLen = buf.readUInt16BE(offset + 2);
		headerLen = 4;
	} else if (payloadLen === LENGTH_64) {
		if (available < 10) return needMore(10 - available);
		const high = buf.readUInt32BE(offset + 2);
		const low = buf.readUInt32BE(offset + 6);
		if ((high & 0x8000_0000) !== 0) {
			throw new FrameDecodeError("64-bit payload length has its most significant bit set");
		}
		payloadLen = high * TWO_POW_32 + low;
		if (!Number.isSafeInteger(payloadLen)) {
			throw new FrameDecodeError(`Payload length ${payloadLen} cannot be represented`, CloseCode.MessageTooBig);
		}
		headerLen = 10;
	}

	if (options.maxPayloadLength !== undefined && payloadLen > options.maxPayloadLength) {
		throw new FrameDecodeError(
			`Payload of ${payloadLen} bytes exceeds limit of ${options.maxPayloadLength}`,
			CloseCode.MessageTooBig,
		);
	}

	const maskLen = masked ? 4 : 0;
	const totalLen = headerLen + maskLen + payloadLen;
	if (available < totalLen) return needMore(totalLen - available);

	const payloadStart = offset + headerLen + maskLen;
	const raw = buf.subarray(payloadStart, payloadStart + payloadLen);

	let frame: WebSocketFrame;
	if (masked) {
		const maskKey = buf.subarray(offset + headerLen, offset + headerLen + 4);
		frame = createFrame({ fin, opcode, payload: applyMask(raw, maskKey), maskKey });
	} else {
		frame = createFrame({ fin, opcode, payload: raw });
	}
	return { kind: "frame", frame, bytesConsumed: totalLen };
}
