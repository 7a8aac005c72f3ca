// SPDX-License-Identifier: MIT
// lazyref Display
// JSON-like rendering of walked trees that terminates on cycles and shows
// unresolved references without forcing them when asked to.

import { isProxy, subjectOf } from "../proxy/transparent.js";
import { jsonRefOf, type JsonRef } from "./ref-resolver.js";

//==============================================================================
// Display State
//==============================================================================

interface DisplayChain {
	/** Containers currently being displayed */
	containers: Set<object>;
	/** Full URIs of the references currently being displayed */
	uris: string[];
}

//==============================================================================
// Rendering
//==============================================================================

function showReference(ref: JsonRef, chain: DisplayChain): string {
	return `JsonRef(${show(ref.reference, chain)})`;
}

function showResolving(ref: JsonRef, chain: DisplayChain): string {
	if (ref.isResolved) {
		return show(ref.subject, chain);
	}

	const policy = ref.loadOnRepr;
	if (policy === false || (policy === "auto" && chain.uris.includes(ref.fullUri))) {
		return showReference(ref, chain);
	}

	chain.uris.push(ref.fullUri);
	try {
		return show(ref.subject, chain);
	} finally {
		chain.uris.pop();
	}
}

function showContainer(
	container: object,
	chain: DisplayChain,
	render: () => string,
	placeholder: string,
): string {
	if (chain.containers.has(container)) {
		return placeholder;
	}
	chain.containers.add(container);
	try {
		return render();
	} finally {
		chain.containers.delete(container);
	}
}

function show(value: unknown, chain: DisplayChain): string {
	const ref = jsonRefOf(value);
	if (ref !== undefined) {
		return showResolving(ref, chain);
	}
	if (isProxy(value)) {
		return show(subjectOf(value), chain);
	}

	if (Array.isArray(value)) {
		const items: unknown[] = value;
		return showContainer(
			items,
			chain,
			() => `[${items.map((item) => show(item, chain)).join(", ")}]`,
			"[...]",
		);
	}
	if (typeof value === "object" && value !== null) {
		return showContainer(
			value,
			chain,
			() => {
				const members = Object.entries(value).map(
					([key, member]) => `${JSON.stringify(key)}: ${show(member, chain)}`,
				);
				return `{${members.join(", ")}}`;
			},
			"{...}",
		);
	}

	return JSON.stringify(value) ?? String(value);
}

/**
 * Render a value as JSON-like text (`{"a": [1, 2]}`).
 *
 * Resolved references show their target. An unresolved reference shows as
 * `JsonRef({"$ref": ...})` when its loadOnRepr is false, or when it is
 * "auto" and the same URI is already being displayed; otherwise it is
 * resolved. Containers met again inside themselves show as `[...]`/`{...}`.
 *
 * @throws JsonRefError when a reference that must be shown fails to resolve
 */
export function represent(value: unknown): string {
	return show(value, { containers: new Set(), uris: [] });
}
