// SPDX-License-Identifier: MIT
// lazyref Reference Resolution Types
// Types shared by the reference walker, JsonRef and the public API

import type { JsonValue } from "./json.js";
import type { Logger } from "../utils/logger.js";

//==============================================================================
// Collaborators
//==============================================================================

/**
 * Maps a document URI (no fragment) to the parsed document.
 * Throwing signals that the URI cannot be resolved.
 */
export type Loader = (uri: string) => JsonValue;

/** Display policy for unresolved references */
export type LoadOnRepr = boolean | "auto";

/** One step of a JSON location: an object key or an array index */
export type PathSegment = string | number;

//==============================================================================
// Resolution Context
//==============================================================================

/**
 * Settings captured by every reference created during one walk
 */
export interface RefSettings {
	/** Base URI for resolving relative references */
	baseUri: string;
	loader: Loader;
	/** Treat `$id`/`id` members as base URI changes */
	jsonschema: boolean;
	loadOnRepr: LoadOnRepr;
	/** Overlay sibling members of `$ref` onto object targets */
	mergeProps: boolean;
	logger: Logger;
}

/**
 * State shared by all references of one walk
 */
export interface ResolutionState {
	/** Full URIs of the references currently being resolved, outermost first */
	resolutionStack: string[];
}

/**
 * Create a new resolution state
 */
export function createResolutionState(): ResolutionState {
	return { resolutionStack: [] };
}

//==============================================================================
// URI Parts
//==============================================================================

/**
 * A reference URI split at its fragment
 */
export interface ParsedRef {
	/** Full URI including fragment */
	fullUri: string;
	/** Document URI (without fragment) */
	docUri: string;
	/** Fragment identifier, percent-encoded, without "#" */
	fragment: string;
}
