import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors.js";
import type { Config, ConfigLayer } from "./types.js";

/** Name of the per-project configuration file. */
export const PROJECT_CONFIG_FILE = "setu.json";

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-get a nested value from an object using dot-notation keys.
 */
function deepGet(obj: Record<string, unknown>, key: string): unknown {
	let current: unknown = obj;
	for (const part of key.split(".")) {
		if (!isRecord(current)) return undefined;
		current = current[part];
	}
	return current;
}

/**
 * Deep-set a nested value on an object using dot-notation keys.
 * Intermediate objects are created as needed.
 */
export function deepSet(obj: Record<string, unknown>, key: string, value: unknown): void {
	const parts = key.split(".");
	const last = parts.pop();
	if (last === undefined) return;
	let current = obj;
	for (const part of parts) {
		const next = current[part];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: Record<string, unknown> = {};
			current[part] = created;
			current = created;
		}
	}
	current[last] = value;
}

function deepDelete(obj: Record<string, unknown>, key: string): void {
	const parts = key.split(".");
	const last = parts.pop();
	if (last === undefined) return;
	let current = obj;
	for (const part of parts) {
		const next = current[part];
		if (!isRecord(next)) return;
		current = next;
	}
	delete current[last];
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not concatenated.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const key of Object.keys(source)) {
		const sv = source[key];
		const tv = target[key];
		if (isRecord(sv) && isRecord(tv)) {
			deepMerge(tv, sv);
		} else {
			target[key] = isRecord(sv) ? structuredClone(sv) : sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object with dot-notation key support.
 *
 * @example
 * ```ts
 * const cfg = createConfig("project", { websocket: { maxFramePayload: 65536 } });
 * cfg.set("websocket.closeTimeoutMs", 250);
 * cfg.get("websocket.maxFramePayload"); // 65536
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	return {
		layer,

		get(key: string): unknown {
			return deepGet(data, key);
		},

		set(key: string, value: unknown): void {
			deepSet(data, key, value);
		},

		has(key: string): boolean {
			return deepGet(data, key) !== undefined;
		},

		delete(key: string): void {
			deepDelete(data, key);
		},

		all(): Record<string, unknown> {
			return structuredClone(data);
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade multiple config layers into a single merged config.
 *
 * Layers are applied left-to-right, so later layers override earlier ones
 * on key conflicts. The result has layer type "runtime".
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("runtime");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

/**
 * Load project-level configuration from `<projectPath>/setu.json`.
 *
 * Returns an empty object if the file does not exist.
 *
 * @throws {ConfigError} If the file exists but is not a JSON object.
 */
export function loadProjectConfig(projectPath: string): Record<string, unknown> {
	const configPath = path.join(projectPath, PROJECT_CONFIG_FILE);
	if (!fs.existsSync(configPath)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${configPath}`, err instanceof Error ? err : undefined);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`${configPath} must contain a JSON object`);
	}
	return parsed;
}
