// SPDX-License-Identifier: MIT
// lazyref JSON Value Types
// The JSON data model shared by the walker, the loader and the codec.

//==============================================================================
// Value Types
//==============================================================================

export type JsonPrimitive = null | boolean | number | string;

export interface JsonObject {
	[key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/** A JSON object whose `$ref` member is a string */
export interface ReferenceObject extends JsonObject {
	$ref: string;
}

//==============================================================================
// Type Guards
//==============================================================================

/**
 * Check if value is a plain object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isReferenceObject(value: unknown): value is ReferenceObject {
	return isJsonObject(value) && typeof value.$ref === "string";
}

/**
 * Shallow check that a value is JSON-shaped. Container members are not
 * inspected, since walked trees hold lazily resolving references.
 */
export function isJsonValue(value: unknown): value is JsonValue {
	switch (typeof value) {
		case "boolean":
		case "number":
		case "string":
			return true;
		case "object":
			return true;
		default:
			return false;
	}
}
