// SPDX-License-Identifier: MIT
// lazyref Structural Equality
// Deep equality that sees through proxies. `===` on a view compares the
// proxy itself, so walked trees are compared with jsonEqual instead.

import { isProxy, subjectOf } from "../proxy/transparent.js";

/** Pairs assumed equal while their members are being compared */
type PairMemo = Map<object, Set<object>>;

function unwrap(value: unknown): unknown {
	let current = value;
	while (isProxy(current)) {
		current = subjectOf(current);
	}
	return current;
}

function assumeEqual(left: object, right: object, memo: PairMemo): boolean {
	const partners = memo.get(left);
	if (partners?.has(right)) {
		return true;
	}
	if (partners) {
		partners.add(right);
	} else {
		memo.set(left, new Set([right]));
	}
	return false;
}

function equal(leftValue: unknown, rightValue: unknown, memo: PairMemo): boolean {
	const left = unwrap(leftValue);
	const right = unwrap(rightValue);
	if (left === right) {
		return true;
	}

	if (Array.isArray(left)) {
		if (!Array.isArray(right) || left.length !== right.length) {
			return false;
		}
		if (assumeEqual(left, right, memo)) {
			return true;
		}
		const rightItems: unknown[] = right;
		return left.every((item, index) => equal(item, rightItems[index], memo));
	}

	if (typeof left !== "object" || left === null) {
		return false;
	}
	if (typeof right !== "object" || right === null || Array.isArray(right)) {
		return false;
	}

	const leftKeys = Object.keys(left);
	if (leftKeys.length !== Object.keys(right).length) {
		return false;
	}
	if (!leftKeys.every((key) => Object.hasOwn(right, key))) {
		return false;
	}
	if (assumeEqual(left, right, memo)) {
		return true;
	}
	return leftKeys.every((key) => equal(Reflect.get(left, key), Reflect.get(right, key), memo));
}

/**
 * Deep equality of JSON values through reference views and other proxies.
 * Object member order is ignored; cyclic graphs compare without recursing
 * forever.
 *
 * @example
 * const result = replaceRefs({ a: [1], b: { $ref: "#/a" } });
 * jsonEqual(result, { a: [1], b: [1] }) // true
 */
export function jsonEqual(left: unknown, right: unknown): boolean {
	return equal(left, right, new Map());
}
