// SPDX-License-Identifier: MIT
// lazyref URI Store
// Map whose keys are normalized URIs, so "HTTP://a.com#x" and "http://a.com/"
// name the same document.

import { normalizeUri } from "../utils/uri.js";

export class UriStore<T> {
	private readonly entries = new Map<string, T>();

	get size(): number {
		return this.entries.size;
	}

	get(uri: string): T | undefined {
		return this.entries.get(normalizeUri(uri));
	}

	has(uri: string): boolean {
		return this.entries.has(normalizeUri(uri));
	}

	set(uri: string, value: T): this {
		this.entries.set(normalizeUri(uri), value);
		return this;
	}

	delete(uri: string): boolean {
		return this.entries.delete(normalizeUri(uri));
	}

	clear(): void {
		this.entries.clear();
	}

	/** Normalized keys in insertion order */
	keys(): IterableIterator<string> {
		return this.entries.keys();
	}
}
