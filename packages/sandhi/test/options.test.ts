import { describe, it, expect } from "vitest";
import { ConfigError, cascadeConfigs, createConfig } from "@setu/core";
import {
	DEFAULT_CLOSE_TIMEOUT_MS,
	DEFAULT_MAX_FRAME_PAYLOAD,
	DEFAULT_MAX_PENDING_BYTES,
	resolveUpgradeOptions,
} from "../src/options.js";

describe("resolveUpgradeOptions", () => {
	it("should fall back to the defaults", () => {
		expect(resolveUpgradeOptions()).toEqual({
			maxFramePayload: 16 * 1024 * 1024,
			maxPendingBytes: 1024 * 1024,
			rejectWithHttpError: true,
			closeTimeoutMs: 100,
		});
		expect(DEFAULT_MAX_FRAME_PAYLOAD).toBe(16_777_216);
		expect(DEFAULT_MAX_PENDING_BYTES).toBe(1_048_576);
		expect(DEFAULT_CLOSE_TIMEOUT_MS).toBe(100);
	});

	it("should read the websocket section of a config", () => {
		const config = createConfig("project", {
			websocket: { maxFramePayload: 65536, closeTimeoutMs: 250 },
		});
		expect(resolveUpgradeOptions(config)).toEqual({
			maxFramePayload: 65536,
			maxPendingBytes: 1_048_576,
			rejectWithHttpError: true,
			closeTimeoutMs: 250,
		});
	});

	it("should let later config layers win", () => {
		const config = cascadeConfigs(
			createConfig("defaults", { websocket: { maxFramePayload: 1024, rejectWithHttpError: true } }),
			createConfig("environment", { websocket: { rejectWithHttpError: false } }),
		);
		const options = resolveUpgradeOptions(config);
		expect(options.maxFramePayload).toBe(1024);
		expect(options.rejectWithHttpError).toBe(false);
	});

	it("should let explicit overrides beat the config", () => {
		const config = createConfig("project", { websocket: { maxFramePayload: 65536 } });
		expect(resolveUpgradeOptions(config, { maxFramePayload: 10 }).maxFramePayload).toBe(10);
	});

	it("should reject an out-of-range value", () => {
		const config = createConfig("project", { websocket: { maxFramePayload: 0 } });
		expect(() => resolveUpgradeOptions(config)).toThrow(
			"Invalid WebSocket configuration (websocket: maxFramePayload: Number 0 is below minimum 1)",
		);
	});

	it("should reject a section that is not an object", () => {
		const config = createConfig("project", { websocket: "fast" });
		expect(() => resolveUpgradeOptions(config)).toThrow(ConfigError);
	});

	it("should accept a zero backlog and reject a negative one", () => {
		const zero = createConfig("project", { websocket: { maxPendingBytes: 0 } });
		expect(resolveUpgradeOptions(zero).maxPendingBytes).toBe(0);

		const negative = createConfig("project", { websocket: { maxPendingBytes: -1 } });
		expect(() => resolveUpgradeOptions(negative)).toThrow(
			"Invalid WebSocket configuration (websocket: maxPendingBytes: Number -1 is below minimum 0)",
		);
	});

	it("should reject a fractional timeout", () => {
		const config = createConfig("project", { websocket: { closeTimeoutMs: 1.5 } });
		expect(() => resolveUpgradeOptions(config)).toThrow(/closeTimeoutMs: Expected integer, received 1.5/);
	});
});
