/**
 * Typed error hierarchy for Setu.
 *
 * All Setu errors extend {@link SetuError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all Setu errors.
 *
 * Carries a machine-readable `code` field (e.g. `"UPGRADE_ERROR"`) for
 * programmatic error detection in addition to the human-readable `message`.
 */
export class SetuError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "SetuError";
		this.code = code;
	}
}

/** Why an opening handshake was refused. */
export type UpgradeErrorKind =
	| "invalidUpgradeHeader"
	| "unsupportedWebSocketTarget"
	| "invalidResponseHeader";

/**
 * Failure of a WebSocket opening handshake.
 *
 * Fatal to the handshake attempt only. Nothing has been written to the
 * connection when this is raised; the HTTP layer decides how to report it.
 */
export class UpgradeError extends SetuError {
	readonly kind: UpgradeErrorKind;

	constructor(kind: UpgradeErrorKind, message: string) {
		super(message, "UPGRADE_ERROR");
		this.name = "UpgradeError";
		this.kind = kind;
	}
}

/**
 * Malformed frame on the wire (reserved bits, reserved opcode, bad length).
 *
 * Fatal to the connection. `closeCode` is the status the peer should be
 * sent in the close frame.
 */
export class FrameDecodeError extends SetuError {
	readonly closeCode: number;

	constructor(message: string, closeCode = 1002) {
		super(message, "FRAME_DECODE_ERROR");
		this.name = "FrameDecodeError";
		this.closeCode = closeCode;
	}
}

/**
 * Attempt to construct a frame that violates RFC 6455 (e.g. a fragmented ping).
 */
export class FrameError extends SetuError {
	constructor(message: string) {
		super(message, "FRAME_ERROR");
		this.name = "FrameError";
	}
}

/**
 * Illegal transition of a connection's upgrade state machine.
 */
export class ProtocolError extends SetuError {
	readonly state: string;

	constructor(message: string, state: string) {
		super(message, "PROTOCOL_ERROR");
		this.name = "ProtocolError";
		this.state = state;
	}
}

/**
 * Configuration error (missing file, invalid JSON, bad option value, etc.).
 */
export class ConfigError extends SetuError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}
