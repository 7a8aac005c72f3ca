// SPDX-License-Identifier: MIT
// lazyref Document Transports
// A transport turns a document URI into text or an already parsed value.
// Resolution is synchronous, so the default transport only reads local
// files; remote documents reach the loader through JsonLoader.prefetch.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { JsonValue } from "../types/json.js";
import { DocumentLoadFailedError } from "../resolution/resolution-errors.js";
import { uriScheme } from "../utils/uri.js";

//==============================================================================
// Types
//==============================================================================

export type TransportResult =
	| { kind: "text"; text: string }
	| { kind: "json"; value: JsonValue };

/** Synchronous document source. Throws when the URI cannot be read. */
export type Transport = (uri: string) => TransportResult;

/** The part of a fetch Response the loader reads */
export interface FetchResponse {
	ok: boolean;
	status: number;
	statusText: string;
	text(): Promise<string>;
}

/** Anything shaped like the global fetch */
export type FetchLike = (url: string) => Promise<FetchResponse>;

//==============================================================================
// Helpers
//==============================================================================

const REMOTE_SCHEMES = new Set(["http", "https"]);

export function isRemoteUri(uri: string): boolean {
	const scheme = uriScheme(uri);
	return scheme !== undefined && REMOTE_SCHEMES.has(scheme);
}

//==============================================================================
// File Transport
//==============================================================================

/**
 * Read `file:` URIs and scheme-less paths from disk.
 *
 * @throws DocumentLoadFailedError for http(s) and other schemes
 */
export const fileTransport: Transport = (uri) => {
	const scheme = uriScheme(uri);

	if (scheme === undefined) {
		return { kind: "text", text: readFileSync(uri, "utf8") };
	}
	if (scheme === "file") {
		return { kind: "text", text: readFileSync(fileURLToPath(uri), "utf8") };
	}
	if (REMOTE_SCHEMES.has(scheme)) {
		throw new DocumentLoadFailedError(
			uri,
			"remote documents cannot be read synchronously; call JsonLoader.prefetch first",
		);
	}
	throw new DocumentLoadFailedError(uri, `unsupported URI scheme "${scheme}"`);
};
