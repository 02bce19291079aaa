import { ConfigError, v, validate } from "@setu/core";
import type { Config } from "@setu/core";

/** Maximum payload length we accept for a single frame (16 MiB). */
export const DEFAULT_MAX_FRAME_PAYLOAD = 16 * 1024 * 1024;

/** Delay between sending a close frame and destroying the socket. */
export const DEFAULT_CLOSE_TIMEOUT_MS = 100;

/** Frame bytes held for an endpoint that has not attached a frame handler (1 MiB). */
export const DEFAULT_MAX_PENDING_BYTES = 1024 * 1024;

export interface UpgradeOptions {
	/** Largest frame payload accepted before closing with 1009. */
	maxFramePayload: number;
	/** Backlog of frames, in wire bytes, allowed before the endpoint is ready; past it the connection closes with 1008. */
	maxPendingBytes: number;
	/** Answer rejected upgrades with an HTTP error response instead of just dropping the socket. */
	rejectWithHttpError: boolean;
	/** Grace period for a close frame to flush before the socket is destroyed. */
	closeTimeoutMs: number;
}

export const DEFAULT_UPGRADE_OPTIONS: Readonly<UpgradeOptions> = Object.freeze({
	maxFramePayload: DEFAULT_MAX_FRAME_PAYLOAD,
	maxPendingBytes: DEFAULT_MAX_PENDING_BYTES,
	rejectWithHttpError: true,
	closeTimeoutMs: DEFAULT_CLOSE_TIMEOUT_MS,
});

const websocketSection = v.object({
	maxFramePayload: v.optional(v.number().integer().min(1).validate).validate,
	maxPendingBytes: v.optional(v.number().integer().min(0).validate).validate,
	rejectWithHttpError: v.optional(v.boolean().validate).validate,
	closeTimeoutMs: v.optional(v.number().integer().min(0).validate).validate,
}).validate;

/**
 * Resolve options from the `websocket` section of a config, then apply
 * explicit overrides.
 *
 * ```json
 * { "websocket": { "maxFramePayload": 1048576, "closeTimeoutMs": 250 } }
 * ```
 *
 * @throws {ConfigError} if the section holds a value of the wrong type or range.
 */
export function resolveUpgradeOptions(
	config?: Config,
	overrides: Partial<UpgradeOptions> = {},
): UpgradeOptions {
	const section = config?.get("websocket") ?? {};
	const result = validate(section, websocketSection, "websocket");
	if (!result.valid || !result.value) {
		const detail = result.errors.map((e) => `${e.path}: ${e.message}`).join("; ");
		throw new ConfigError(`Invalid WebSocket configuration (${detail})`);
	}
	const fromConfig = result.value;

	return {
		maxFramePayload: overrides.maxFramePayload ?? fromConfig.maxFramePayload ?? DEFAULT_UPGRADE_OPTIONS.maxFramePayload,
		maxPendingBytes: overrides.maxPendingBytes ?? fromConfig.maxPendingBytes ?? DEFAULT_UPGRADE_OPTIONS.maxPendingBytes,
		rejectWithHttpError: overrides.rejectWithHttpError ?? fromConfig.rejectWithHttpError ?? DEFAULT_UPGRADE_OPTIONS.rejectWithHttpError,
		closeTimeoutMs: overrides.closeTimeoutMs ?? fromConfig.closeTimeoutMs ?? DEFAULT_UPGRADE_OPTIONS.closeTimeoutMs,
	};
}
