/**
 * Ordered registry of WebSocket endpoints.
 *
 * Each descriptor pairs a selection predicate with an activation callback.
 * Selection walks the descriptors in registration order and the first one
 * whose predicate returns a header set wins.
 */

import { ConfigError, UpgradeError } from "@setu/core";
import { buildResponseHeaders, validateUpgradeRequest } from "./handshake.js";
import { HeaderSet, requestPath } from "./headers.js";
import type { HeaderInit, RequestHead } from "./headers.js";
import type { FrameChannel } from "./frame-channel.js";

/**
 * Decide whether to accept an upgrade. Return the extra response headers
 * (possibly empty) to accept, or undefined to decline.
 *
 * Must be synchronous and free of side effects.
 */
export type UpgradeSelector = (head: RequestHead) => HeaderSet | undefined;

/**
 * Called once, after the 101 response has been queued, to attach the
 * endpoint's frame-level behaviour. May be async; slow work such as
 * authentication belongs here rather than in the selector.
 */
export type ActivationHandler = (channel: FrameChannel, head: RequestHead) => void | Promise<void>;

export interface UpgraderDescriptor {
	/** Label used in logs. */
	readonly name?: string;
	readonly shouldUpgrade: UpgradeSelector;
	readonly onActivate: ActivationHandler;
}

export type HandshakeResult =
	| {
		accepted: true;
		acceptKey: string;
		responseHeaders: HeaderSet;
		descriptor: UpgraderDescriptor;
	}
	| { accepted: false; error: UpgradeError };

export class UpgraderRegistry {
	private readonly entries: UpgraderDescriptor[] = [];
	private sealed = false;

	/**
	 * Append an endpoint. Order is significant: earlier registrations are
	 * asked first.
	 *
	 * @throws {ConfigError} once the registry is sealed.
	 */
	register(descriptor: UpgraderDescriptor): this;
	register(shouldUpgrade: UpgradeSelector, onActivate: ActivationHandler, name?: string): this;
	register(
		descriptorOrSelector: UpgraderDescriptor | UpgradeSelector,
		onActivate?: ActivationHandler,
		name?: string,
	): this {
		if (this.sealed) {
			throw new ConfigError("Cannot register a WebSocket endpoint after the registry has been sealed");
		}
		let descriptor: UpgraderDescriptor;
		if (typeof descriptorOrSelector === "function") {
			if (!onActivate) {
				throw new ConfigError("register(shouldUpgrade, onActivate) requires an activation handler");
			}
			descriptor = { name, shouldUpgrade: descriptorOrSelector, onActivate };
		} else {
			descriptor = { ...descriptorOrSelector };
		}
		this.entries.push(Object.freeze(descriptor));
		return this;
	}

	/** Freeze the descriptor list. Called when a server starts using the registry. */
	seal(): void {
		this.sealed = true;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	get size(): number {
		return this.entries.length;
	}

	get descriptors(): readonly UpgraderDescriptor[] {
		return [...this.entries];
	}

	/**
	 * Validate the request and pick the endpoint that will serve it.
	 *
	 * Malformed requests fail with `invalidUpgradeHeader` before any
	 * predicate runs. If every predicate declines, or none are registered,
	 * the result is `unsupportedWebSocketTarget`. An exception thrown by a
	 * predicate propagates to the caller.
	 */
	select(head: RequestHead): HandshakeResult {
		const validation = validateUpgradeRequest(head.headers);
		if (!validation.ok) {
			return { accepted: false, error: validation.error };
		}

		for (const descriptor of this.entries) {
			const extra = descriptor.shouldUpgrade(head);
			if (extra === undefined) continue;
			return {
				accepted: true,
				acceptKey: validation.acceptKey,
				responseHeaders: buildResponseHeaders(validation.acceptKey, extra),
				descriptor,
			};
		}

		return {
			accepted: false,
			error: new UpgradeError(
				"unsupportedWebSocketTarget",
				`No WebSocket endpoint accepted ${head.method} ${head.uri}`,
			),
		};
	}
}

/**
 * Descriptor that accepts requests whose path (query string ignored)
 * equals `path`, adding `extraHeaders` to the response.
 */
export function pathUpgrader(
	path: string,
	onActivate: ActivationHandler,
	extraHeaders?: HeaderInit,
): UpgraderDescriptor {
	return {
		name: path,
		shouldUpgrade: (head) => (requestPath(head) === path ? new HeaderSet(extraHeaders) : undefined),
		onActivate,
	};
}
