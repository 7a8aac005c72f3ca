// SPDX-License-Identifier: MIT
// lazyref JSON Codec
// Drop-in counterparts of JSON.parse/JSON.stringify (plus file variants)
// that resolve references on the way in and keep them on the way out.

import { readFileSync, writeFileSync } from "node:fs";
import { resolve as resolvePath } from "node:path";
import { pathToFileURL } from "node:url";
import type { JsonValue } from "./types/json.js";
import { resolveReplaceRefsOptions, type ReplaceRefsOptions } from "./config/options.js";
import { JsonLoader } from "./loader/json-loader.js";
import { isProxy, subjectOf } from "./proxy/transparent.js";
import { jsonRefOf, replaceRefs } from "./resolution/ref-resolver.js";

//==============================================================================
// Types
//==============================================================================

export type Reviver = (this: unknown, key: string, value: unknown) => unknown;
export type Replacer = (this: unknown, key: string, value: unknown) => unknown;

export interface LoadsOptions extends ReplaceRefsOptions {
	reviver?: Reviver;
}

export interface LoadOptions extends LoadsOptions {
	/** Text encoding of the file (default "utf8") */
	encoding?: BufferEncoding;
}

export interface DumpsOptions {
	/** Applied after reference views are written as reference objects */
	replacer?: Replacer;
	space?: string | number;
}

export interface LoadUriAsyncOptions extends ReplaceRefsOptions {
	/** Loader to prefetch with and resolve from (a fresh one when omitted) */
	jsonLoader?: JsonLoader;
}

/** A file path or an open file descriptor */
export type FileTarget = string | number;

//==============================================================================
// Parsing
//==============================================================================

/**
 * Parse JSON text and replace its references.
 *
 * @throws SyntaxError when the text is not JSON
 */
export function loads(text: string, options: LoadsOptions = {}): JsonValue {
	const { reviver, ...rest } = options;
	const parsed: JsonValue = JSON.parse(text, reviver);
	return replaceRefs(parsed, rest);
}

/**
 * Read a JSON file and replace its references. A path with no explicit
 * `baseUri` becomes the base, so relative references resolve beside it.
 */
export function load(file: FileTarget, options: LoadOptions = {}): JsonValue {
	const { encoding = "utf8", ...rest } = options;
	const baseUri =
		rest.baseUri ?? (typeof file === "string" ? pathToFileURL(resolvePath(file)).href : undefined);
	return loads(readFileSync(file, { encoding }), { ...rest, baseUri });
}

/**
 * Load the document at `uri` and replace its references, using `uri` as the
 * base unless another is given.
 *
 * @throws DocumentLoadFailedError when the document cannot be loaded
 */
export function loadUri(uri: string, options: ReplaceRefsOptions = {}): JsonValue {
	const resolved = resolveReplaceRefsOptions(options);
	const loader = resolved.loader ?? new JsonLoader({ logger: resolved.logger }).loader;
	return replaceRefs(loader(uri), {
		...options,
		baseUri: options.baseUri ?? uri,
		loader,
	});
}

/**
 * Prefetch `uri` and every document its references reach, then load it.
 * The only way to resolve http(s) references with the default transport.
 * A custom `loader` without a `jsonLoader` is used as is, with nothing
 * prefetched.
 */
export async function loadUriAsync(
	uri: string,
	options: LoadUriAsyncOptions = {},
): Promise<JsonValue> {
	const { jsonLoader, ...rest } = options;
	const resolved = resolveReplaceRefsOptions(rest);
	if (jsonLoader === undefined && resolved.loader !== undefined) {
		return loadUri(uri, rest);
	}

	const prefetcher = jsonLoader ?? new JsonLoader({ logger: resolved.logger });
	await prefetcher.prefetchRefs(uri, { jsonschema: resolved.jsonschema });
	return loadUri(uri, { ...rest, loader: resolved.loader ?? prefetcher.loader });
}

//==============================================================================
// Serialization
//==============================================================================

/**
 * Serialize a value. Reference views are written as their reference
 * objects without being resolved; other proxies are written as their
 * subjects.
 */
export function dumps(value: unknown, options: DumpsOptions = {}): string {
	const { replacer, space } = options;
	return JSON.stringify(
		value,
		function (this: unknown, key: string, member: unknown): unknown {
			const plain = isProxy(member) && jsonRefOf(member) === undefined ? subjectOf(member) : member;
			return replacer === undefined ? plain : replacer.call(this, key, plain);
		},
		space,
	);
}

/** Serialize a value into a file */
export function dump(value: unknown, file: FileTarget, options: DumpsOptions = {}): void {
	writeFileSync(file, dumps(value, options));
}
