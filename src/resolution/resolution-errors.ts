// SPDX-License-Identifier: MIT
// lazyref Resolution Error Types
// Every failure raised by the library is a ResolutionError carrying a code.

import type { JsonObject } from "../types/json.js";
import type { PathSegment } from "../types/resolution.js";

//==============================================================================
// Resolution Error Codes
//==============================================================================

export enum ResolutionErrorCode {
	/** A `$ref`-bearing object whose `$ref` is not a string */
	MalformedReference = "MalformedReference",

	/** JSON Pointer did not resolve to a value */
	ResolutionFailed = "ResolutionFailed",

	/** A lazy value was forced while it was being computed */
	CircularReference = "CircularReference",

	/** The loader could not produce a document */
	DocumentLoadFailed = "DocumentLoadFailed",

	/** Options failed validation */
	InvalidOptions = "InvalidOptions",

	/** A reference could not be resolved (wraps one of the above) */
	ReferenceResolutionFailed = "ReferenceResolutionFailed",
}

//==============================================================================
// Resolution Error Classes
//==============================================================================

/** Base class for all resolution errors */
export class ResolutionError extends Error {
	constructor(
		message: string,
		public readonly resolutionCode: ResolutionErrorCode,
		public override cause?: unknown,
	) {
		super(message);
		this.name = "ResolutionError";
	}
}

/** Error thrown when a reference object is built from a non-string `$ref` */
export class MalformedReferenceError extends ResolutionError {
	constructor(public readonly reference: unknown) {
		super(
			`Not a valid JSON reference object: ${JSON.stringify(reference)}`,
			ResolutionErrorCode.MalformedReference,
		);
		this.name = "MalformedReferenceError";
	}
}

/** Error thrown when JSON Pointer resolution fails */
export class PointerResolutionError extends ResolutionError {
	constructor(public readonly pointer: string, reason: string) {
		super(
			`Failed to resolve pointer "${pointer}": ${reason}`,
			ResolutionErrorCode.ResolutionFailed,
		);
		this.name = "PointerResolutionError";
	}
}

/** Error thrown when a lazy value is forced while it is being computed */
export class CircularReferenceError extends ResolutionError {
	public readonly path: string[];

	constructor(path: string[]) {
		super(
			path.length > 0
				? `Circular reference detected: ${path.join(" -> ")}`
				: "Circular reference detected",
			ResolutionErrorCode.CircularReference,
		);
		this.name = "CircularReferenceError";
		this.path = path;
	}
}

/** Error thrown when document loading fails */
export class DocumentLoadFailedError extends ResolutionError {
	constructor(public readonly uri: string, reason: string, cause?: unknown) {
		super(
			`Failed to load document "${uri}": ${reason}`,
			ResolutionErrorCode.DocumentLoadFailed,
			cause,
		);
		this.name = "DocumentLoadFailedError";
	}
}

export interface OptionIssue {
	path: string;
	message: string;
}

/** Error thrown when an options object fails validation */
export class InvalidOptionsError extends ResolutionError {
	constructor(public readonly issues: OptionIssue[]) {
		super(
			`Invalid options: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`,
			ResolutionErrorCode.InvalidOptions,
		);
		this.name = "InvalidOptionsError";
	}
}

export interface JsonRefErrorDetails {
	/** The reference object that failed */
	reference: JsonObject;
	/** Fully resolved target URI */
	uri: string;
	/** Base URI in effect for the reference */
	baseUri: string;
	/** Location of the reference inside its document */
	path: readonly PathSegment[];
	/** Full URIs of the references being resolved, outermost first */
	chain: readonly string[];
	cause?: unknown;
}

/**
 * Error thrown when a reference cannot be resolved.
 * This is the error callers catch to get full diagnostic context.
 */
export class JsonRefError extends ResolutionError {
	public readonly reference: JsonObject;
	public readonly uri: string;
	public readonly baseUri: string;
	public readonly path: readonly PathSegment[];
	public readonly chain: readonly string[];

	constructor(message: string, details: JsonRefErrorDetails) {
		super(message, ResolutionErrorCode.ReferenceResolutionFailed, details.cause);
		this.name = "JsonRefError";
		this.reference = details.reference;
		this.uri = details.uri;
		this.baseUri = details.baseUri;
		this.path = details.path;
		this.chain = details.chain;
	}
}

/** Render an unknown thrown value as `Name: message` */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return `${error.name}: ${error.message}`;
	}
	return String(error);
}
