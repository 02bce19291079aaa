/**
 * HTTP header container and request head used by the opening handshake.
 *
 * Header names compare case-insensitively but keep their original casing
 * for the wire. Insertion order and duplicate names are preserved.
 */

import { SetuError } from "@setu/core";

export type HeaderInit = Iterable<readonly [string, string]> | Record<string, string>;

function isIterable(init: HeaderInit): init is Iterable<readonly [string, string]> {
	return typeof Reflect.get(init, Symbol.iterator) === "function";
}

export class HeaderSet implements Iterable<[string, string]> {
	private readonly list: Array<[string, string]> = [];
	private sealed = false;

	constructor(init?: HeaderInit) {
		if (!init) return;
		if (isIterable(init)) {
			for (const [name, value] of init) this.add(name, value);
		} else {
			for (const [name, value] of Object.entries(init)) this.add(name, value);
		}
	}

	/**
	 * Build a header set from Node's `rawHeaders` (alternating name/value).
	 */
	static fromRawHeaders(raw: readonly string[]): HeaderSet {
		const headers = new HeaderSet();
		for (let i = 0; i + 1 < raw.length; i += 2) {
			headers.add(raw[i], raw[i + 1]);
		}
		return headers;
	}

	/** Append a header. Existing headers with the same name are kept. */
	add(name: string, value: string): this {
		if (this.sealed) {
			throw new SetuError(`Cannot add "${name}": header set is read-only`, "HEADERS_SEALED");
		}
		this.list.push([name, value]);
		return this;
	}

	/** First value for `name`, or undefined. */
	get(name: string): string | undefined {
		const wanted = name.toLowerCase();
		return this.list.find(([n]) => n.toLowerCase() === wanted)?.[1];
	}

	getAll(name: string): string[] {
		const wanted = name.toLowerCase();
		return this.list.filter(([n]) => n.toLowerCase() === wanted).map(([, value]) => value);
	}

	has(name: string): boolean {
		return this.get(name) !== undefined;
	}

	/**
	 * Comma-separated token list across every `name` header, trimmed and
	 * lower-cased. `Connection: keep-alive, Upgrade` yields
	 * `["keep-alive", "upgrade"]`.
	 */
	tokens(name: string): string[] {
		return this.getAll(name)
			.flatMap((value) => value.split(","))
			.map((token) => token.trim().toLowerCase())
			.filter((token) => token.length > 0);
	}

	containsToken(name: string, token: string): boolean {
		return this.tokens(name).includes(token.toLowerCase());
	}

	get size(): number {
		return this.list.length;
	}

	/** Make the set read-only. Further `add` calls throw. */
	seal(): this {
		this.sealed = true;
		return this;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	*[Symbol.iterator](): Iterator<[string, string]> {
		for (const [name, value] of this.list) {
			yield [name, value];
		}
	}
}

// ─── Request Head ───────────────────────────────────────────────────────────

export interface HttpVersion {
	readonly major: number;
	readonly minor: number;
}

/**
 * Parsed HTTP request line and headers, as handed over by the HTTP layer.
 */
export interface RequestHead {
	readonly method: string;
	/** Request target exactly as sent, including any query string. */
	readonly uri: string;
	readonly version: HttpVersion;
	readonly headers: HeaderSet;
}

export interface RequestHeadInit {
	method?: string;
	uri: string;
	version?: HttpVersion;
	headers?: HeaderSet | HeaderInit;
}

/**
 * Create an immutable request head. The headers are copied into a sealed set,
 * so later changes to the caller's object are not observed.
 */
export function createRequestHead(init: RequestHeadInit): RequestHead {
	const headers = new HeaderSet(init.headers).seal();
	return Object.freeze({
		method: init.method ?? "GET",
		uri: init.uri,
		version: Object.freeze({ ...(init.version ?? { major: 1, minor: 1 }) }),
		headers,
	});
}

/** The path part of a request target, without query string or fragment. */
export function requestPath(head: RequestHead): string {
	const end = head.uri.search(/[?#]/);
	return end === -1 ? head.uri : head.uri.slice(0, end);
}
