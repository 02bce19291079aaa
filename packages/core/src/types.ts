/**
 * @setu/core: Foundation types shared across Setu packages.
 */

// ─── Configuration ───────────────────────────────────────────────────────────

/** The scope/priority tier of a configuration layer. */
export type ConfigLayer = "defaults" | "project" | "environment" | "runtime";

/**
 * A configuration store with dot-notation key access and layer awareness.
 *
 * Values come back as `unknown`; typed reads go through the `v` validators.
 */
export interface Config {
	get(key: string): unknown;
	set(key: string, value: unknown): void;
	has(key: string): boolean;
	delete(key: string): void;
	layer: ConfigLayer;
	/** Snapshot of all values. */
	all(): Record<string, unknown>;
	/** Deep-merge another object into this config. Arrays are replaced. */
	merge(other: Record<string, unknown>): void;
}
