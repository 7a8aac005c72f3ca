// SPDX-License-Identifier: MIT
// lazyref - lazy JSON Reference resolution
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	JsonArray,
	JsonObject,
	JsonPrimitive,
	JsonValue,
	ReferenceObject,
} from "./types/json.js";

export type {
	Loader,
	LoadOnRepr,
	ParsedRef,
	PathSegment,
	RefSettings,
	ResolutionState,
} from "./types/resolution.js";

export { isJsonObject, isReferenceObject } from "./types/json.js";

//==============================================================================
// Reference Resolution
//==============================================================================

export {
	JsonRef,
	isJsonRef,
	jsonRefOf,
	replaceRefs,
	walkRefs,
} from "./resolution/ref-resolver.js";
export type { JsonRefScope, WalkContext, WalkRefsOptions } from "./resolution/ref-resolver.js";

export { represent } from "./resolution/represent.js";
export { jsonEqual } from "./resolution/compare.js";

//==============================================================================
// Errors
//==============================================================================

export {
	CircularReferenceError,
	DocumentLoadFailedError,
	InvalidOptionsError,
	JsonRefError,
	MalformedReferenceError,
	PointerResolutionError,
	ResolutionError,
	ResolutionErrorCode,
} from "./resolution/resolution-errors.js";
export type { JsonRefErrorDetails, OptionIssue } from "./resolution/resolution-errors.js";

//==============================================================================
// Loading
//==============================================================================

export { JsonLoader } from "./loader/json-loader.js";
export type { PrefetchRefsOptions } from "./loader/json-loader.js";
export { UriStore } from "./loader/uri-store.js";
export { fileTransport, isRemoteUri } from "./loader/transport.js";
export type { FetchLike, FetchResponse, Transport, TransportResult } from "./loader/transport.js";

//==============================================================================
// Proxies
//==============================================================================

export * from "./proxy/index.js";

//==============================================================================
// Codec
//==============================================================================

export { dump, dumps, load, loadUri, loadUriAsync, loads } from "./api.js";
export type {
	DumpsOptions,
	FileTarget,
	LoadOptions,
	LoadsOptions,
	LoadUriAsyncOptions,
	Replacer,
	Reviver,
} from "./api.js";

//==============================================================================
// Configuration and Utilities
//==============================================================================

export {
	JsonLoaderOptionsSchema,
	ReplaceRefsOptionsSchema,
} from "./config/options.js";
export type { JsonLoaderOptions, ReplaceRefsOptions } from "./config/options.js";

export { consoleLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";

export {
	buildPointer,
	escapeToken,
	navigate,
	parseJsonPointer,
	unescapeToken,
} from "./utils/json-pointer.js";
export { normalizeUri, urljoin } from "./utils/uri.js";
