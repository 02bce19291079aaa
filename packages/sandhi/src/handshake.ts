/**
 * Opening handshake checks and the 101 response (RFC 6455 section 4.2).
 */

import { createHash, randomBytes } from "node:crypto";
import { UpgradeError } from "@setu/core";
import { HeaderSet } from "./headers.js";

/** The magic GUID specified in RFC 6455 section 4.2.2 */
export const WS_MAGIC_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

/** The only protocol version this server speaks. */
export const WS_VERSION = "13";

export const SWITCHING_PROTOCOLS_LINE = "HTTP/1.1 101 Switching Protocols";

/** RFC 7230 token characters, the legal alphabet for header names. */
const HEADER_NAME_RE = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Compute the Sec-WebSocket-Accept value:
 * base64(SHA-1(key + GUID)).
 */
export function computeAcceptKey(secWebSocketKey: string): string {
	return createHash("sha1")
		.update(secWebSocketKey + WS_MAGIC_GUID)
		.digest("base64");
}

/** A random Sec-WebSocket-Key for a client request (16 bytes, base64). */
export function generateWebSocketKey(): string {
	return randomBytes(16).toString("base64");
}

export type HandshakeValidation =
	| { ok: true; key: string; acceptKey: string }
	| { ok: false; error: UpgradeError };

function invalid(message: string): HandshakeValidation {
	return { ok: false, error: new UpgradeError("invalidUpgradeHeader", message) };
}

/**
 * Check the headers of an upgrade request.
 *
 * Connection and Upgrade are compared as case-insensitive token lists, the
 * version must be exactly "13" and the key must be present. The key's
 * base64 shape is not checked.
 */
export function validateUpgradeRequest(headers: HeaderSet): HandshakeValidation {
	if (!headers.containsToken("connection", "upgrade")) {
		return invalid("Connection header does not contain the \"upgrade\" token");
	}
	if (!headers.containsToken("upgrade", "websocket")) {
		return invalid("Upgrade header does not contain the \"websocket\" token");
	}

	const version = headers.get("sec-websocket-version");
	if (version === undefined) {
		return invalid("Missing Sec-WebSocket-Version header");
	}
	if (version !== WS_VERSION) {
		return invalid(`Unsupported Sec-WebSocket-Version "${version}", expected "${WS_VERSION}"`);
	}

	const key = headers.get("sec-websocket-key");
	if (key === undefined || key.length === 0) {
		return invalid("Missing Sec-WebSocket-Key header");
	}

	return { ok: true, key, acceptKey: computeAcceptKey(key) };
}

/**
 * Headers of the 101 response: the three mandatory headers followed by
 * the endpoint's extras in the order it supplied them.
 */
export function buildResponseHeaders(acceptKey: string, extraHeaders?: Iterable<readonly [string, string]>): HeaderSet {
	const headers = new HeaderSet([
		["Upgrade", "websocket"],
		["Connection", "upgrade"],
		["Sec-WebSocket-Accept", acceptKey],
	]);
	if (extraHeaders) {
		for (const [name, value] of extraHeaders) headers.add(name, value);
	}
	return headers;
}

/**
 * Serialize the status line and headers, terminated by the blank line.
 * Names and values are written verbatim.
 *
 * @throws {UpgradeError} `invalidResponseHeader` for a name that is not a
 *   token or a value containing CR, LF or NUL.
 */
export function serializeResponseHead(headers: HeaderSet): string {
	const lines = [SWITCHING_PROTOCOLS_LINE];
	for (const [name, value] of headers) {
		if (!HEADER_NAME_RE.test(name)) {
			throw new UpgradeError("invalidResponseHeader", `Invalid response header name ${JSON.stringify(name)}`);
		}
		if (/[\r\n\0]/.test(value)) {
			throw new UpgradeError("invalidResponseHeader", `Response header "${name}" has a value containing CR, LF or NUL`);
		}
		lines.push(`${name}: ${value}`);
	}
	lines.push("", "");
	return lines.join("\r\n");
}
