// SPDX-License-Identifier: MIT
// walkRefs Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { jsonRefOf, replaceRefs, walkRefs } from "../../src/resolution/ref-resolver.js";
import { dig, mapLoader } from "../helpers/documents.js";

describe("walkRefs - Visiting", () => {
	it("should visit every reference", () => {
		const result = replaceRefs({ a: [1], b: { $ref: "#/a" }, c: { $ref: "#/a" } });
		const visited: string[] = [];
		walkRefs(result, (ref) => {
			visited.push(ref.reference.$ref);
			return ref.subject;
		});
		assert.deepEqual(visited, ["#/a", "#/a"]);
	});

	it("should follow references into other documents", () => {
		const { loader } = mapLoader({ "x.json": { inner: { $ref: "#/v" }, v: 2 } });
		const result = replaceRefs({ $ref: "x.json" }, { loader });
		const visited: string[] = [];
		walkRefs(result, (ref) => {
			visited.push(ref.fullUri);
			return ref.subject;
		});
		assert.deepEqual(visited, ["x.json", "x.json#/v"]);
	});

	it("should visit each reference of a cycle once", () => {
		const result = replaceRefs({ a: { $ref: "#" } });
		let visits = 0;
		walkRefs(result, (ref) => {
			visits++;
			return ref.subject;
		});
		assert.equal(visits, 1);
	});

	it("should leave plain values alone", () => {
		const value = { a: [1, { b: 2 }] };
		let visits = 0;
		const walked = walkRefs(value, (ref) => {
			visits++;
			return ref.subject;
		});
		assert.equal(walked, value);
		assert.equal(visits, 0);
		assert.equal(walkRefs(7, (ref) => ref.subject), 7);
	});

	it("should not resolve references the callback does not touch", () => {
		const result = replaceRefs({ a: { $ref: "#/missing" } });
		walkRefs(result, (ref) => ref.reference);
		assert.equal(jsonRefOf(dig(result, "a"))?.isResolved, false);
	});
});

describe("walkRefs - Replacing", () => {
	it("should replace references in their containers", () => {
		const result = replaceRefs({ a: [1], b: { $ref: "#/a" } });
		const walked = walkRefs(result, (ref) => ref.subject, { replace: true });
		assert.equal(walked, result);
		assert.equal(dig(result, "b"), dig(result, "a"));
	});

	it("should return the replacement of a top-level reference", () => {
		const result = replaceRefs({ $ref: "#/x", x: 5 });
		assert.equal(walkRefs(result, (ref) => ref.subject, { replace: true }), 5);
	});

	it("should put whatever the callback returns in place", () => {
		const result = replaceRefs({ a: { $ref: "#/missing" }, b: [{ $ref: "#/missing" }] });
		walkRefs(result, () => "replaced", { replace: true });
		assert.deepEqual(result, { a: "replaced", b: ["replaced"] });
	});
});
