// SPDX-License-Identifier: MIT
// lazyref Proxy Subjects
// The three ways a proxy can obtain the value it stands for.

import { CircularReferenceError } from "../resolution/resolution-errors.js";

//==============================================================================
// Subject Interface
//==============================================================================

/**
 * Source of the value a proxy forwards to
 */
export interface Subject<T> {
	readonly subject: T;
}

export function isSubject(value: unknown): value is Subject<unknown> {
	return typeof value === "object" && value !== null && "subject" in value;
}

//==============================================================================
// Flavors
//==============================================================================

/** Wraps a concrete value */
export class StaticSubject<T> implements Subject<T> {
	constructor(public subject: T) {}
}

/**
 * Recomputes the value on every access. Nothing is cached, so two reads
 * may return different objects.
 */
export class CallbackSubject<T> implements Subject<T> {
	constructor(private readonly callback: () => T) {}

	get subject(): T {
		return this.callback();
	}
}

type LazyState<T> =
	| { kind: "pending" }
	| { kind: "resolving" }
	| { kind: "resolved"; value: T };

/**
 * Computes the value once, on first access, and caches it.
 * A failing callback leaves the subject pending, so the next access retries.
 * Forcing the subject from inside its own callback throws a
 * CircularReferenceError whose path comes from `trace`.
 */
export class LazySubject<T> implements Subject<T> {
	private state: LazyState<T> = { kind: "pending" };

	constructor(
		private readonly callback: () => T,
		private readonly trace: () => string[] = () => [],
	) {}

	get isResolved(): boolean {
		return this.state.kind === "resolved";
	}

	get subject(): T {
		switch (this.state.kind) {
			case "resolved":
				return this.state.value;
			case "resolving":
				throw new CircularReferenceError(this.trace());
			case "pending":
				break;
		}

		this.state = { kind: "resolving" };
		try {
			const value = this.callback();
			this.state = { kind: "resolved", value };
			return value;
		} catch (error) {
			this.state = { kind: "pending" };
			throw error;
		}
	}

	/** Replace the cached value (in-place updates such as `source.subject *= 2`) */
	set subject(value: T) {
		this.state = { kind: "resolved", value };
	}
}
