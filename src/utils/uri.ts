// SPDX-License-Identifier: MIT
// lazyref URI Utilities
// RFC 3986 reference resolution. Bases without a scheme ("", "doc.json",
// "/schemas/a") are accepted so documents can be resolved before they have
// an absolute location.
// See: https://www.rfc-editor.org/rfc/rfc3986.html

import type { ParsedRef } from "../types/resolution.js";

//==============================================================================
// URI Parsing
//==============================================================================

/**
 * URI components as defined by RFC 3986 section 3.
 * Undefined means the component is absent, which differs from empty.
 */
export interface UriParts {
	scheme?: string | undefined;
	authority?: string | undefined;
	path: string;
	query?: string | undefined;
	fragment?: string | undefined;
}

// RFC 3986 Appendix B
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

/** Split a URI into its five components */
export function parseUri(uri: string): UriParts {
	const match = URI_PATTERN.exec(uri);
	if (!match) {
		return { path: uri };
	}
	return {
		scheme: match[1],
		authority: match[2],
		path: match[3] ?? "",
		query: match[4],
		fragment: match[5],
	};
}

/** Recompose a URI from its components (RFC 3986 section 5.3) */
export function serializeUri(parts: UriParts): string {
	let result = "";
	if (parts.scheme !== undefined) {
		result += parts.scheme + ":";
	}
	if (parts.authority !== undefined) {
		result += "//" + parts.authority;
	}
	result += parts.path;
	if (parts.query !== undefined) {
		result += "?" + parts.query;
	}
	if (parts.fragment !== undefined) {
		result += "#" + parts.fragment;
	}
	return result;
}

/** The lower-cased scheme of a URI, if it has one */
export function uriScheme(uri: string): string | undefined {
	return parseUri(uri).scheme?.toLowerCase();
}

//==============================================================================
// Reference Resolution (RFC 3986 section 5.2)
//==============================================================================

function dropLastSegment(output: string): string {
	const index = output.lastIndexOf("/");
	return index >= 0 ? output.slice(0, index) : "";
}

/**
 * Remove "." and ".." segments (RFC 3986 section 5.2.4)
 */
export function removeDotSegments(path: string): string {
	let input = path;
	let output = "";

	while (input.length > 0) {
		if (input.startsWith("../")) {
			input = input.slice(3);
		} else if (input.startsWith("./")) {
			input = input.slice(2);
		} else if (input.startsWith("/./")) {
			input = input.slice(2);
		} else if (input === "/.") {
			input = "/";
		} else if (input.startsWith("/../")) {
			input = input.slice(3);
			output = dropLastSegment(output);
		} else if (input === "/..") {
			input = "/";
			output = dropLastSegment(output);
		} else if (input === "." || input === "..") {
			input = "";
		} else {
			const next = input.indexOf("/", 1);
			const end = next === -1 ? input.length : next;
			output += input.slice(0, end);
			input = input.slice(end);
		}
	}

	return output;
}

function mergePaths(base: UriParts, relativePath: string): string {
	if (base.authority !== undefined && base.path === "") {
		return "/" + relativePath;
	}
	const lastSlash = base.path.lastIndexOf("/");
	return lastSlash >= 0 ? base.path.slice(0, lastSlash + 1) + relativePath : relativePath;
}

function resolveParts(base: UriParts, ref: UriParts): UriParts {
	if (ref.scheme !== undefined) {
		return { ...ref, path: removeDotSegments(ref.path) };
	}

	if (ref.authority !== undefined) {
		return {
			scheme: base.scheme,
			authority: ref.authority,
			path: removeDotSegments(ref.path),
			query: ref.query,
			fragment: ref.fragment,
		};
	}

	if (ref.path === "") {
		return {
			scheme: base.scheme,
			authority: base.authority,
			path: base.path,
			query: ref.query ?? base.query,
			fragment: ref.fragment,
		};
	}

	const path = ref.path.startsWith("/") ? ref.path : mergePaths(base, ref.path);
	return {
		scheme: base.scheme,
		authority: base.authority,
		path: removeDotSegments(path),
		query: ref.query,
		fragment: ref.fragment,
	};
}

/**
 * Resolve a URI reference against a base URI.
 *
 * @example
 * urljoin("http://bar.com", "foo") // "http://bar.com/foo"
 * urljoin("http://foo.com/a/schema", "/other") // "http://foo.com/other"
 * urljoin("urn:lib", "#/$defs/country") // "urn:lib#/$defs/country"
 * urljoin("", "#/a") // "#/a"
 */
export function urljoin(base: string, ref: string): string {
	if (base === "") {
		return ref;
	}
	return serializeUri(resolveParts(parseUri(base), parseUri(ref)));
}

//==============================================================================
// Fragments
//==============================================================================

/**
 * Split a URI at its fragment.
 *
 * @example
 * splitFragment("doc.json#/a/b") // { fullUri: "doc.json#/a/b", docUri: "doc.json", fragment: "/a/b" }
 * splitFragment("#") // { fullUri: "#", docUri: "", fragment: "" }
 */
export function splitFragment(uri: string): ParsedRef {
	const hashIndex = uri.indexOf("#");
	if (hashIndex < 0) {
		return { fullUri: uri, docUri: uri, fragment: "" };
	}
	return {
		fullUri: uri,
		docUri: uri.slice(0, hashIndex),
		fragment: uri.slice(hashIndex + 1),
	};
}

/**
 * Percent-decode a URI fragment before it is read as a JSON Pointer
 * (RFC 6901 section 6). Malformed escapes are kept as written.
 */
export function decodeFragment(fragment: string): string {
	try {
		return decodeURIComponent(fragment);
	} catch (error) {
		if (error instanceof URIError) {
			return fragment;
		}
		throw error;
	}
}

//==============================================================================
// Normalization
//==============================================================================

/**
 * Normalize a URI for use as a cache key: fragment dropped, scheme and
 * authority lower-cased, empty path of a hierarchical URI written as "/".
 *
 * @example
 * normalizeUri("HTTP://Example.com#top") // "http://example.com/"
 */
export function normalizeUri(uri: string): string {
	const parts = parseUri(uri);
	const hasAuthority = parts.authority !== undefined;
	return serializeUri({
		scheme: parts.scheme?.toLowerCase(),
		authority: parts.authority?.toLowerCase(),
		path: hasAuthority && parts.path === "" ? "/" : parts.path,
		query: parts.query,
	});
}
