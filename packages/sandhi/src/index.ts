// @setu/sandhi: WebSocket opening handshake and frame codec

// Frames
export {
	Opcode,
	CloseCode,
	MAX_CONTROL_PAYLOAD,
	createFrame,
	closeFrame,
	frameText,
	isControlOpcode,
	toOpcode,
	encodeClosePayload,
	decodeClosePayload,
} from "./frame.js";
export type { WebSocketFrame, FrameInit, ClosePayload } from "./frame.js";

// Codec
export { encodeFrame, decodeFrame, applyMask, maskedFrame, frameHeaderLength } from "./frame-codec.js";
export type { DecodeOptions, DecodeResult } from "./frame-codec.js";

// Headers
export { HeaderSet, createRequestHead, requestPath } from "./headers.js";
export type { HeaderInit, HttpVersion, RequestHead, RequestHeadInit } from "./headers.js";

// Handshake
export {
	WS_MAGIC_GUID,
	WS_VERSION,
	SWITCHING_PROTOCOLS_LINE,
	computeAcceptKey,
	generateWebSocketKey,
	validateUpgradeRequest,
	buildResponseHeaders,
	serializeResponseHead,
} from "./handshake.js";
export type { HandshakeValidation } from "./handshake.js";

// Registry
export { UpgraderRegistry, pathUpgrader } from "./registry.js";
export type {
	ActivationHandler,
	HandshakeResult,
	UpgradeSelector,
	UpgraderDescriptor,
} from "./registry.js";

// Connection
export { FrameChannel } from "./frame-channel.js";
export type { ByteChannel, CloseHandler, ErrorHandler, FrameChannelOptions, FrameHandler } from "./frame-channel.js";
export { UpgradeConnection } from "./connection.js";
export type { UpgradeConnectionOptions, UpgradeState } from "./connection.js";

// Options & Node adapter
export {
	DEFAULT_CLOSE_TIMEOUT_MS,
	DEFAULT_MAX_FRAME_PAYLOAD,
	DEFAULT_MAX_PENDING_BYTES,
	DEFAULT_UPGRADE_OPTIONS,
	resolveUpgradeOptions,
} from "./options.js";
export type { UpgradeOptions } from "./options.js";
export { UpgradeServer, requestHeadFromIncoming } from "./upgrade-server.js";
export type { UpgradeEventSource, UpgradeRequest, UpgradeServerOptions } from "./upgrade-server.js";
