// SPDX-License-Identifier: MIT
// lazyref JSON Pointer Utilities
// RFC 6901 compliant JSON Pointer implementation for reference resolution
// See: https://www.rfc-editor.org/rfc/rfc6901.html

//==============================================================================
// Types
//==============================================================================

/**
 * A parsed JSON Pointer with decoded segments
 */
export interface ParsedPointer {
	/** The original pointer string */
	original: string;
	/** Decoded reference tokens (after ~1 and ~0 unescaping) */
	tokens: string[];
}

/**
 * Result type for fallible operations
 */
export type Result<T> =
	| { success: true; value: T }
	| { success: false; error: string };

/**
 * Maps a container to the value that should be indexed instead.
 * Lets callers see through wrappers such as reference proxies.
 */
export type Deref = (container: unknown) => unknown;

//==============================================================================
// Constants
//==============================================================================

/** Empty string represents the root document in JSON Pointer */
const ROOT_POINTER = "";

/** Prefix for JSON Pointer fragment identifiers */
const FRAGMENT_PREFIX = "#";

/** RFC 6901 array index: no sign, no leading zeros */
const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

const identity: Deref = (container) => container;

//==============================================================================
// JSON Pointer Escaping (RFC 6901)
//==============================================================================

/**
 * Escape a reference token for use in a JSON Pointer
 * Replaces: ~ → ~0, / → ~1
 */
export function escapeToken(token: string): string {
	return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Unescape a reference token from a JSON Pointer
 * Replaces: ~1 → /, ~0 → ~
 */
export function unescapeToken(token: string): string {
	return token.replace(/~1/g, "/").replace(/~0/g, "~");
}

//==============================================================================
// JSON Pointer Parsing
//==============================================================================

/**
 * Parse a JSON Pointer string into its component tokens
 *
 * @param ptr - The JSON Pointer string (with or without # prefix)
 *
 * @example
 * parseJsonPointer("#/foo/bar") // { success: true, tokens: ["foo", "bar"] }
 * parseJsonPointer("#/foo~1baz") // { success: true, tokens: ["foo/baz"] }
 * parseJsonPointer("#") // { success: true, tokens: [] }
 */
export function parseJsonPointer(ptr: string): Result<ParsedPointer> {
	let workingPtr = ptr;
	if (workingPtr.startsWith(FRAGMENT_PREFIX)) {
		workingPtr = workingPtr.slice(1);
	}

	if (workingPtr === ROOT_POINTER) {
		return {
			success: true,
			value: { original: ptr, tokens: [] },
		};
	}

	if (!workingPtr.startsWith("/")) {
		return {
			success: false,
			error: `Invalid JSON Pointer "${ptr}": must start with "/" or "#"`,
		};
	}

	// First token is empty due to leading /
	const tokens = workingPtr.split("/").slice(1).map(unescapeToken);

	return {
		success: true,
		value: { original: ptr, tokens },
	};
}

//==============================================================================
// Helper Functions for Navigation
//==============================================================================

function navigateArray(
	arr: readonly unknown[],
	token: string,
	pointer: string,
): Result<unknown> {
	if (!ARRAY_INDEX.test(token)) {
		return {
			success: false,
			error: `Invalid array index "${token}" in pointer "${pointer}"`,
		};
	}
	const index = Number(token);
	if (index >= arr.length) {
		return {
			success: false,
			error: `Array index ${index} out of bounds [0, ${arr.length}) in pointer "${pointer}"`,
		};
	}
	return { success: true, value: arr[index] };
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function navigateObject(
	obj: Record<string, unknown>,
	token: string,
	pointer: string,
): Result<unknown> {
	if (!Object.hasOwn(obj, token)) {
		return {
			success: false,
			error: `Property "${token}" not found in pointer "${pointer}"`,
		};
	}
	return { success: true, value: obj[token] };
}

function navigateToken(
	current: unknown,
	token: string,
	pointer: string,
): Result<unknown> {
	if (Array.isArray(current)) {
		return navigateArray(current, token, pointer);
	}
	if (isObject(current)) {
		return navigateObject(current, token, pointer);
	}
	return {
		success: false,
		error: `Cannot navigate into primitive value at token "${token}" in pointer "${pointer}"`,
	};
}

//==============================================================================
// JSON Pointer Navigation
//==============================================================================

/**
 * Navigate through an object using a JSON Pointer
 *
 * @param obj - The root object to navigate
 * @param pointer - The JSON Pointer string
 * @param deref - Applied to every container before it is indexed
 *
 * @example
 * const obj = { foo: { bar: 42 } };
 * navigate(obj, "#/foo/bar") // { success: true, value: 42 }
 * navigate(obj, "#/foo/baz") // { success: false, error: "..." }
 */
export function navigate(
	obj: unknown,
	pointer: string,
	deref: Deref = identity,
): Result<unknown> {
	const parseResult = parseJsonPointer(pointer);
	if (!parseResult.success) {
		return parseResult;
	}

	let current: unknown = obj;
	for (const token of parseResult.value.tokens) {
		const result = navigateToken(deref(current), token, pointer);
		if (!result.success) {
			return result;
		}
		current = result.value;
	}

	return { success: true, value: current };
}

//==============================================================================
// Utility Functions
//==============================================================================

/**
 * Build a JSON Pointer string from tokens
 *
 * @param tokens - Array of unescaped tokens
 * @param includePrefix - Whether to include the # prefix (default: true)
 *
 * @example
 * buildPointer(["foo", "bar"]) // "#/foo/bar"
 * buildPointer(["foo", "bar/baz"]) // "#/foo/bar~1baz"
 * buildPointer(["foo", "bar"], false) // "/foo/bar"
 */
export function buildPointer(tokens: readonly string[], includePrefix = true): string {
	const escaped = tokens.map(escapeToken);
	const ptr = escaped.length === 0 ? ROOT_POINTER : `/${escaped.join("/")}`;
	return includePrefix ? FRAGMENT_PREFIX + ptr : ptr;
}
