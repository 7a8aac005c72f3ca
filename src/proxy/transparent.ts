// SPDX-License-Identifier: MIT
// lazyref Transparent Proxies
// A view forwards property access, `in`, key enumeration, descriptors, the
// prototype and calls to the current subject of its source. Primitive
// subjects are boxed for lookups and unboxed by Symbol.toPrimitive, so
// coercions (Number(view), `${view}`, view + 1, view < 2) behave like the
// primitive itself.
//
// What a Proxy cannot intercept: ===, typeof, truthiness and Array.isArray
// see the target. Use subjectOf() where those matter.

import { inspect, type InspectOptions } from "node:util";
import { CallbackSubject, LazySubject, StaticSubject, isSubject, type Subject } from "./subjects.js";

//==============================================================================
// Types
//==============================================================================

/** Every view answers this key with its source */
export const PROXY_SOURCE: unique symbol = Symbol("lazyref.proxySource");

/**
 * Members answered by the wrapper itself instead of the subject
 */
export type OwnMembers = Readonly<Record<PropertyKey, unknown>>;

/**
 * What the proxy target looks like before the subject is known.
 * Decides typeof, Array.isArray and whether the view can be called.
 */
export type ProxyShape = "object" | "array" | "function";

//==============================================================================
// Helpers
//==============================================================================

function isObjectLike(value: unknown): value is object {
	return (typeof value === "object" && value !== null) || typeof value === "function";
}

function box(subject: unknown): object {
	if (isObjectLike(subject)) {
		return subject;
	}
	const boxed: object = Object(subject);
	return boxed;
}

/** Create an empty target of the given shape */
export function targetFor(shape: ProxyShape): object {
	switch (shape) {
		case "array":
			return [];
		case "function":
			return () => undefined;
		case "object":
			return {};
	}
}

function shapeOf(value: unknown): ProxyShape {
	if (Array.isArray(value)) {
		return "array";
	}
	return typeof value === "function" ? "function" : "object";
}

function ownKeysOf(subject: object, target: object): (string | symbol)[] {
	const keys = Reflect.ownKeys(subject);
	for (const key of Reflect.ownKeys(target)) {
		const descriptor = Reflect.getOwnPropertyDescriptor(target, key);
		if (descriptor?.configurable === false && !keys.includes(key)) {
			keys.push(key);
		}
	}
	return keys;
}

function descriptorOf(
	subject: object,
	target: object,
	key: string | symbol,
): PropertyDescriptor | undefined {
	const descriptor = Reflect.getOwnPropertyDescriptor(subject, key);
	const targetDescriptor = Reflect.getOwnPropertyDescriptor(target, key);
	if (descriptor === undefined) {
		return targetDescriptor?.configurable === false ? targetDescriptor : undefined;
	}
	// A proxy may only report non-configurable properties its target has
	if (!descriptor.configurable && targetDescriptor?.configurable !== false) {
		return { ...descriptor, configurable: true };
	}
	return descriptor;
}

//==============================================================================
// Transparent View
//==============================================================================

function createHandler<V extends object>(
	source: Subject<unknown>,
	ownMembers: OwnMembers,
): ProxyHandler<V> {
	return {
		get(_target, key) {
			if (key === PROXY_SOURCE) {
				return source;
			}
			if (Object.hasOwn(ownMembers, key)) {
				return ownMembers[key];
			}
			const subject = source.subject;
			if (isObjectLike(subject)) {
				return Reflect.get(subject, key);
			}
			if (key === Symbol.toPrimitive) {
				return () => subject;
			}
			const value: unknown = Reflect.get(box(subject), key);
			return typeof value === "function" ? value.bind(subject) : value;
		},
		set(_target, key, value) {
			return Reflect.set(box(source.subject), key, value);
		},
		has(_target, key) {
			return (
				key === PROXY_SOURCE ||
				Object.hasOwn(ownMembers, key) ||
				Reflect.has(box(source.subject), key)
			);
		},
		deleteProperty(_target, key) {
			return Reflect.deleteProperty(box(source.subject), key);
		},
		ownKeys(target) {
			return ownKeysOf(box(source.subject), target);
		},
		getOwnPropertyDescriptor(target, key) {
			return descriptorOf(box(source.subject), target, key);
		},
		defineProperty(_target, key, descriptor) {
			return Reflect.defineProperty(box(source.subject), key, descriptor);
		},
		getPrototypeOf() {
			return Reflect.getPrototypeOf(box(source.subject));
		},
		apply(_target, thisArg, args) {
			const subject = source.subject;
			if (typeof subject !== "function") {
				throw new TypeError("Proxy subject is not callable");
			}
			return Reflect.apply(subject, thisArg, args);
		},
	};
}

/**
 * Create a view over `target` that forwards to `source.subject`.
 *
 * @param source - Where the subject comes from
 * @param target - Empty object of the shape consumers should see
 * @param ownMembers - Keys answered by the wrapper instead of the subject
 */
export function transparent<V extends object>(
	source: Subject<unknown>,
	target: V,
	ownMembers: OwnMembers = {},
): V {
	// util.inspect looks at the target, not through the traps
	const custom = ownMembers[inspect.custom];
	Object.defineProperty(target, inspect.custom, {
		configurable: true,
		enumerable: false,
		writable: true,
		value:
			typeof custom === "function"
				? custom
				: (_depth: number, options: InspectOptions) => inspect(source.subject, options),
	});
	return new Proxy(target, createHandler<V>(source, ownMembers));
}

//==============================================================================
// Flavors
//==============================================================================

/** Eager proxy over a concrete value */
export function proxy(value: unknown): object {
	return transparent(new StaticSubject(value), targetFor(shapeOf(value)));
}

/** Proxy that calls `callback` on every access */
export function callbackProxy(callback: () => unknown, shape: ProxyShape = "object"): object {
	return transparent(new CallbackSubject(callback), targetFor(shape));
}

/** Proxy that calls `callback` once, on first access */
export function lazyProxy(callback: () => unknown, shape: ProxyShape = "object"): object {
	return transparent(new LazySubject(callback), targetFor(shape));
}

//==============================================================================
// Inspection
//==============================================================================

/** The source behind a view, or undefined for anything else */
export function sourceOf(value: unknown): Subject<unknown> | undefined {
	if (!isObjectLike(value)) {
		return undefined;
	}
	const source: unknown = Reflect.get(value, PROXY_SOURCE);
	return isSubject(source) ? source : undefined;
}

export function isProxy(value: unknown): boolean {
	return sourceOf(value) !== undefined;
}

/**
 * The value a view stands for (forcing lazy views), or the value itself
 * when it is not a view
 */
export function subjectOf(value: unknown): unknown {
	const source = sourceOf(value);
	return source === undefined ? value : source.subject;
}
