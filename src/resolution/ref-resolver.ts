// SPDX-License-Identifier: MIT
// lazyref Reference Resolution
//
// Walks a JSON document and replaces every reference object with a lazily
// resolving view. Supports:
// - Local references: #/definitions/foo
// - Relative and absolute references: other.json#/a, http://example.com/doc#/b
// - Custom schemes served by the loader: urn:lib#/$defs/country
// - Base URI changes through `$id`/`id` in jsonschema mode

import { inspect } from "node:util";
import {
	isJsonObject,
	isJsonValue,
	isReferenceObject,
	type JsonObject,
	type JsonValue,
	type ReferenceObject,
} from "../types/json.js";
import {
	createResolutionState,
	type LoadOnRepr,
	type PathSegment,
	type RefSettings,
	type ResolutionState,
} from "../types/resolution.js";
import {
	resolveReplaceRefsOptions,
	type ReplaceRefsOptions,
	type ResolvedReplaceRefsOptions,
} from "../config/options.js";
import { JsonLoader } from "../loader/json-loader.js";
import { UriStore } from "../loader/uri-store.js";
import { LazySubject, type Subject } from "../proxy/subjects.js";
import { sourceOf, subjectOf, transparent } from "../proxy/transparent.js";
import { navigate } from "../utils/json-pointer.js";
import { decodeFragment, splitFragment, urljoin } from "../utils/uri.js";
import {
	CircularReferenceError,
	DocumentLoadFailedError,
	JsonRefError,
	MalformedReferenceError,
	PointerResolutionError,
	describeError,
} from "./resolution-errors.js";
import { represent } from "./represent.js";

//==============================================================================
// Walk Context
//==============================================================================

/**
 * Shared by every reference created during one walk
 */
export interface WalkContext {
	/** Walked documents keyed by normalized URI */
	store: UriStore<JsonValue>;
	state: ResolutionState;
}

export function createWalkContext(): WalkContext {
	return { store: new UriStore<JsonValue>(), state: createResolutionState() };
}

/**
 * What the walker hands to each JsonRef it creates
 */
export interface JsonRefScope {
	settings: RefSettings;
	context: WalkContext;
	/** Location of the reference inside its document */
	path: readonly PathSegment[];
}

function settingsFrom(options: ResolvedReplaceRefsOptions): RefSettings {
	return {
		baseUri: options.baseUri,
		loader: options.loader ?? new JsonLoader({ logger: options.logger }).loader,
		jsonschema: options.jsonschema,
		loadOnRepr: options.loadOnRepr,
		mergeProps: options.mergeProps,
		logger: options.logger,
	};
}

function idOf(value: JsonObject): string | undefined {
	if (typeof value.$id === "string") {
		return value.$id;
	}
	return typeof value.id === "string" ? value.id : undefined;
}

//==============================================================================
// JsonRef
//==============================================================================

/**
 * A reference object together with everything needed to resolve it.
 * `view` is what the walker puts in the tree: it reads like the target
 * value, and serializes back to the reference object.
 */
export class JsonRef implements Subject<JsonValue> {
	readonly reference: ReferenceObject;
	readonly baseUri: string;
	readonly path: readonly PathSegment[];
	readonly settings: RefSettings;
	readonly view: JsonObject;

	private readonly context: WalkContext;
	private readonly lazy: LazySubject<JsonValue>;

	/**
	 * @param reference - Object with a string `$ref` member
	 * @param options - replaceRefs options, or the scope of an ongoing walk
	 * @throws MalformedReferenceError when `$ref` is missing or not a string
	 */
	constructor(reference: JsonObject, options: ReplaceRefsOptions | JsonRefScope = {}) {
		if (!isReferenceObject(reference)) {
			throw new MalformedReferenceError(reference);
		}

		const scope: JsonRefScope =
			"context" in options
				? options
				: {
						settings: settingsFrom(resolveReplaceRefsOptions(options)),
						context: createWalkContext(),
						path: [],
					};

		this.reference = reference;
		this.settings = scope.settings;
		this.baseUri = scope.settings.baseUri;
		this.path = scope.path;
		this.context = scope.context;
		this.lazy = new LazySubject(
			() => this.resolve(),
			() => [...this.context.state.resolutionStack, this.fullUri],
		);
		this.view = transparent<JsonObject>(this, {}, {
			toJSON: () => this.reference,
			[inspect.custom]: () => represent(this.view),
		});
	}

	/** Alias of {@link replaceRefs} */
	static replaceRefs(value: JsonValue, options?: ReplaceRefsOptions): JsonValue {
		return replaceRefs(value, options);
	}

	/** `$ref` resolved against the base URI */
	get fullUri(): string {
		return urljoin(this.baseUri, this.reference.$ref);
	}

	get isResolved(): boolean {
		return this.lazy.isResolved;
	}

	get loadOnRepr(): LoadOnRepr {
		return this.settings.loadOnRepr;
	}

	/** The target value, resolved on first access and cached */
	get subject(): JsonValue {
		return this.lazy.subject;
	}

	set subject(value: JsonValue) {
		this.lazy.subject = value;
	}

	/**
	 * Compute the target value. Called once through `subject`; calling it
	 * directly recomputes without touching the cache.
	 *
	 * @throws JsonRefError when the document or the pointer cannot be resolved
	 */
	resolve(): JsonValue {
		const { fullUri } = this;
		const { docUri, fragment } = splitFragment(fullUri);
		const stack = this.context.state.resolutionStack;

		stack.push(fullUri);
		try {
			const document = this.documentFor(docUri);
			return this.mergeExtras(this.lookup(document, fullUri, fragment));
		} finally {
			stack.pop();
		}
	}

	//==========================================================================
	// Resolution Steps
	//==========================================================================

	private documentFor(uri: string): JsonValue {
		const stored = this.context.store.get(uri);
		if (stored !== undefined) {
			return stored;
		}

		this.settings.logger.debug(`Loading document ${uri}`);
		let loaded: JsonValue;
		try {
			loaded = this.settings.loader(uri);
		} catch (error) {
			const failure =
				error instanceof DocumentLoadFailedError
					? error
					: new DocumentLoadFailedError(uri, describeError(error), error);
			throw this.failure(`Error while resolving \`${uri}\`: ${describeError(failure)}`, failure);
		}

		return replaceRefsIn(loaded, { ...this.settings, baseUri: uri }, this.context, [], true);
	}

	private lookup(document: JsonValue, fullUri: string, fragment: string): JsonValue {
		const pointer = decodeFragment(fragment);
		try {
			const found = navigate(document, pointer, (container) =>
				container === this.view ? this.reference : subjectOf(container),
			);
			if (!found.success) {
				throw this.failure(
					`Error while resolving \`${fullUri}\`: Unresolvable JSON pointer: ${JSON.stringify(fragment)}`,
					new PointerResolutionError(pointer, found.error),
				);
			}
			if (found.value === this.view) {
				throw this.failure(`Error while resolving \`${fullUri}\`: reference refers directly to itself`);
			}

			const target = subjectOf(found.value);
			if (!isJsonValue(target)) {
				throw this.failure(`Error while resolving \`${fullUri}\`: target is not a JSON value`);
			}
			return target;
		} catch (error) {
			if (error instanceof CircularReferenceError) {
				throw this.failure(`Error while resolving \`${fullUri}\`: ${describeError(error)}`, error);
			}
			throw error;
		}
	}

	private mergeExtras(target: JsonValue): JsonValue {
		if (!this.settings.mergeProps || !isJsonObject(target)) {
			return target;
		}

		const skipped = this.settings.jsonschema ? ["$ref", "$id", "id"] : ["$ref"];
		const extras = Object.entries(this.reference).filter(([key]) => !skipped.includes(key));
		if (extras.length === 0) {
			return target;
		}
		return Object.fromEntries([...Object.entries(target), ...extras]);
	}

	private failure(message: string, cause?: unknown): JsonRefError {
		return new JsonRefError(message, {
			reference: this.reference,
			uri: this.fullUri,
			baseUri: this.baseUri,
			path: this.path,
			chain: [...this.context.state.resolutionStack],
			cause,
		});
	}
}

//==============================================================================
// Inspection
//==============================================================================

/** The JsonRef behind a reference view */
export function jsonRefOf(value: unknown): JsonRef | undefined {
	const source = sourceOf(value);
	return source instanceof JsonRef ? source : undefined;
}

export function isJsonRef(value: unknown): boolean {
	return jsonRefOf(value) !== undefined;
}

//==============================================================================
// Walking
//==============================================================================

/**
 * Build a copy of `value` with every reference object replaced by a view.
 * Members are walked before their object becomes a reference, so references
 * in extra properties resolve against the referencing node's base URI.
 *
 * @param topLevel - Store the result under the base URI
 */
export function replaceRefsIn(
	value: JsonValue,
	settings: RefSettings,
	context: WalkContext,
	path: readonly PathSegment[],
	topLevel: boolean,
): JsonValue {
	const baseUri = splitFragment(settings.baseUri).docUri;
	let scoped: RefSettings = { ...settings, baseUri };
	const storeUnder: string[] = topLevel ? [baseUri] : [];

	const id = settings.jsonschema && isJsonObject(value) ? idOf(value) : undefined;
	if (id !== undefined) {
		const idUri = splitFragment(urljoin(baseUri, id)).docUri;
		scoped = { ...scoped, baseUri: idUri };
		storeUnder.push(idUri);
	}

	let result: JsonValue;
	if (Array.isArray(value)) {
		result = value.map((item, index) => replaceRefsIn(item, scoped, context, [...path, index], false));
	} else if (isJsonObject(value)) {
		const walked: JsonObject = Object.fromEntries(
			Object.entries(value).map(([key, member]) => [
				key,
				replaceRefsIn(member, scoped, context, [...path, key], false),
			]),
		);
		result = isReferenceObject(walked)
			? new JsonRef(walked, { settings: scoped, context, path }).view
			: walked;
	} else {
		result = value;
	}

	for (const uri of storeUnder) {
		context.store.set(uri, result);
	}
	return result;
}

export interface WalkRefsOptions {
	/** Put `fn`'s result in place of each reference */
	replace?: boolean;
}

/**
 * Visit every reference reachable from `value`, following references into
 * their targets. Each container is visited once, so cyclic graphs terminate.
 *
 * @returns `value`, or what replaced it when `value` is itself a reference
 */
export function walkRefs(
	value: JsonValue,
	fn: (ref: JsonRef) => JsonValue,
	options: WalkRefsOptions = {},
): JsonValue {
	return visitRefs(value, fn, options.replace ?? false, new Map());
}

function visitRefs(
	value: JsonValue,
	fn: (ref: JsonRef) => JsonValue,
	replace: boolean,
	processed: Map<object, JsonValue>,
): JsonValue {
	if (typeof value !== "object" || value === null) {
		return value;
	}
	const seen = processed.get(value);
	if (seen !== undefined) {
		return seen;
	}

	let current: JsonValue = value;
	const ref = jsonRefOf(value);
	if (ref !== undefined) {
		const replacement = fn(ref);
		if (replace) {
			current = replacement;
		}
	}
	processed.set(value, current);

	const container = subjectOf(current);
	if (typeof container !== "object" || container === null) {
		return current;
	}
	if (container !== value) {
		if (processed.has(container)) {
			return current;
		}
		processed.set(container, container);
	}

	if (Array.isArray(container)) {
		container.forEach((item, index) => {
			const visited = visitRefs(item, fn, replace, processed);
			if (replace) {
				container[index] = visited;
			}
		});
	} else if (isJsonObject(container)) {
		for (const [key, member] of Object.entries(container)) {
			const visited = visitRefs(member, fn, replace, processed);
			if (replace) {
				container[key] = visited;
			}
		}
	}
	return current;
}

/**
 * Resolve every reference reachable from `value`, including references
 * inside the extra members of reference objects.
 *
 * @throws JsonRefError for the first reference that fails
 */
function forceRefs(value: JsonValue): void {
	const processed = new Map<object, JsonValue>();
	const forced = new Set<JsonRef>();
	const force = (ref: JsonRef): JsonValue => {
		if (!forced.has(ref)) {
			forced.add(ref);
			for (const [key, member] of Object.entries(ref.reference)) {
				if (key !== "$ref") {
					visitRefs(member, force, false, processed);
				}
			}
		}
		return ref.subject;
	};
	visitRefs(value, force, false, processed);
}

//==============================================================================
// Entry Point
//==============================================================================

/**
 * Replace every reference object in `value` with a lazily resolving view.
 * The input is not modified.
 *
 * @throws InvalidOptionsError when an option has the wrong type
 * @throws JsonRefError when `lazyLoad` is false and a reference fails
 */
export function replaceRefs(value: JsonValue, options?: ReplaceRefsOptions): JsonValue {
	const resolved = resolveReplaceRefsOptions(options);
	const settings = settingsFrom(resolved);
	let result = replaceRefsIn(value, settings, createWalkContext(), [], true);

	if (!resolved.lazyLoad) {
		forceRefs(result);
	}
	if (!resolved.proxies) {
		result = walkRefs(result, (ref) => ref.subject, { replace: true });
	}
	return result;
}
