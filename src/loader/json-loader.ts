// SPDX-License-Identifier: MIT
// lazyref JSON Loader
// Loads documents by URI for the reference walker. Synchronous loads go
// through the transport; prefetch() fetches http(s) documents ahead of time
// so the synchronous resolution that follows is served from the cache.

import { isJsonObject, type JsonValue } from "../types/json.js";
import type { Loader } from "../types/resolution.js";
import {
	resolveJsonLoaderOptions,
	type JsonLoaderOptions,
} from "../config/options.js";
import {
	DocumentLoadFailedError,
	describeError,
} from "../resolution/resolution-errors.js";
import type { Logger } from "../utils/logger.js";
import { normalizeUri, splitFragment, urljoin } from "../utils/uri.js";
import {
	fileTransport,
	isRemoteUri,
	type FetchLike,
	type FetchResponse,
	type Transport,
	type TransportResult,
} from "./transport.js";
import { UriStore } from "./uri-store.js";

//==============================================================================
// Helpers
//==============================================================================

function parseDocument(uri: string, text: string): JsonValue {
	try {
		const document: JsonValue = JSON.parse(text);
		return document;
	} catch (error) {
		throw new DocumentLoadFailedError(uri, `invalid JSON (${describeError(error)})`, error);
	}
}

function asLoadFailure(uri: string, error: unknown): DocumentLoadFailedError {
	if (error instanceof DocumentLoadFailedError) {
		return error;
	}
	return new DocumentLoadFailedError(uri, describeError(error), error);
}

function idOf(value: Record<string, JsonValue>): string | undefined {
	if (typeof value.$id === "string") {
		return value.$id;
	}
	return typeof value.id === "string" ? value.id : undefined;
}

interface ReferenceScan {
	/** Documents referenced from the scanned one */
	targets: Set<string>;
	/** Documents the scanned one defines itself through `$id` */
	defined: Set<string>;
}

/**
 * Collect the document URIs a raw (unwalked) document refers to, tracking
 * base URI changes the same way the walker does.
 */
function scanReferences(
	value: JsonValue,
	baseUri: string,
	jsonschema: boolean,
	scan: ReferenceScan,
): void {
	if (Array.isArray(value)) {
		for (const item of value) {
			scanReferences(item, baseUri, jsonschema, scan);
		}
		return;
	}
	if (!isJsonObject(value)) {
		return;
	}

	let base = baseUri;
	const id = jsonschema ? idOf(value) : undefined;
	if (id !== undefined) {
		base = splitFragment(urljoin(base, id)).docUri;
		scan.defined.add(normalizeUri(base));
	}
	if (typeof value.$ref === "string") {
		scan.targets.add(splitFragment(urljoin(base, value.$ref)).docUri);
	}
	for (const member of Object.values(value)) {
		scanReferences(member, base, jsonschema, scan);
	}
}

//==============================================================================
// JsonLoader
//==============================================================================

export interface PrefetchRefsOptions {
	/** Honour `$id`/`id` base URI changes while scanning */
	jsonschema?: boolean;
}

export class JsonLoader {
	/** Loaded documents keyed by normalized URI */
	readonly store = new UriStore<JsonValue>();

	/** `load` bound to this instance, for use as a replaceRefs loader */
	readonly loader: Loader = (uri) => this.load(uri);

	private readonly inFlight = new Map<string, Promise<JsonValue>>();
	private readonly cache: boolean;
	private readonly transport: Transport;
	private readonly fetcher: FetchLike;
	private readonly logger: Logger;

	constructor(options?: JsonLoaderOptions) {
		const resolved = resolveJsonLoaderOptions(options);
		this.cache = resolved.cache;
		this.transport = resolved.transport ?? fileTransport;
		this.fetcher = resolved.fetch ?? ((url) => fetch(url));
		this.logger = resolved.logger;
	}

	/**
	 * Load the document at `uri` (fragment ignored).
	 *
	 * @throws DocumentLoadFailedError when the transport fails or the text is not JSON
	 */
	load(uri: string): JsonValue {
		const cached = this.store.get(uri);
		if (cached !== undefined) {
			this.logger.debug(`Cache hit for ${uri}`);
			return cached;
		}

		const document = this.read(splitFragment(uri).docUri);
		if (this.cache) {
			this.remember(uri, document);
		}
		return document;
	}

	/**
	 * Fetch the document at `uri` and keep it for later synchronous loads.
	 * Prefetched documents are kept even when caching is off, since remote
	 * documents have no other way to reach `load`. Concurrent calls for one
	 * URI share a single request.
	 */
	async prefetch(uri: string): Promise<JsonValue> {
		const cached = this.store.get(uri);
		if (cached !== undefined) {
			return cached;
		}

		const key = normalizeUri(uri);
		const pending = this.inFlight.get(key);
		if (pending !== undefined) {
			return pending;
		}

		const request = this.fetchDocument(splitFragment(uri).docUri)
			.then((document) => {
				this.remember(uri, document);
				return document;
			})
			.finally(() => {
				this.inFlight.delete(key);
			});
		this.inFlight.set(key, request);
		return request;
	}

	/**
	 * Prefetch `uri` and every document its references reach, transitively.
	 * Only a failure to fetch `uri` itself rejects. Other documents that
	 * fail are logged and left out of the store, so the reference that
	 * needs one fails when it is resolved.
	 */
	async prefetchRefs(uri: string, options: PrefetchRefsOptions = {}): Promise<void> {
		const jsonschema = options.jsonschema ?? false;
		const visited = new Set<string>();

		const crawl = async (documentUri: string, isRoot: boolean): Promise<void> => {
			const key = normalizeUri(documentUri);
			if (key === "" || visited.has(key)) {
				return;
			}
			visited.add(key);

			let document: JsonValue;
			try {
				document = await this.prefetch(documentUri);
			} catch (error) {
				if (isRoot) {
					throw error;
				}
				this.logger.warn(`Prefetch failed for ${key}: ${describeError(error)}`);
				return;
			}
			const scan: ReferenceScan = { targets: new Set(), defined: new Set() };
			scanReferences(document, splitFragment(documentUri).docUri, jsonschema, scan);
			for (const defined of scan.defined) {
				visited.add(defined);
			}
			await Promise.all([...scan.targets].map((target) => crawl(target, false)));
		};

		await crawl(uri, true);
	}

	//==========================================================================
	// Internals
	//==========================================================================

	private remember(uri: string, document: JsonValue): void {
		this.store.set(uri, document);
		this.logger.debug(`Stored ${normalizeUri(uri)}`);
	}

	private read(uri: string): JsonValue {
		let result: TransportResult;
		try {
			result = this.transport(uri);
		} catch (error) {
			throw asLoadFailure(uri, error);
		}
		return result.kind === "json" ? result.value : parseDocument(uri, result.text);
	}

	private async fetchDocument(uri: string): Promise<JsonValue> {
		if (!isRemoteUri(uri)) {
			return this.read(uri);
		}

		this.logger.debug(`Fetching ${uri}`);
		let response: FetchResponse;
		let text: string;
		try {
			response = await this.fetcher(uri);
			text = await response.text();
		} catch (error) {
			throw asLoadFailure(uri, error);
		}
		if (!response.ok) {
			throw new DocumentLoadFailedError(uri, `HTTP ${response.status} ${response.statusText}`);
		}
		return parseDocument(uri, text);
	}
}
