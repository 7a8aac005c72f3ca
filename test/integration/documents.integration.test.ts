// SPDX-License-Identifier: MIT
// Integration Tests for Multi-Document Resolution
//
// Loads schema documents from test/fixtures/schemas and checks:
// - References across files resolve beside the referencing file
// - Shared targets keep their identity across documents
// - Recursive definitions build cyclic graphs
// - Serialization writes the original reference objects

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { dumps, load } from "../../src/api.js";
import { JsonLoader } from "../../src/loader/json-loader.js";
import { replaceRefs } from "../../src/resolution/ref-resolver.js";
import { jsonEqual } from "../../src/resolution/compare.js";
import { JsonRefError } from "../../src/resolution/resolution-errors.js";
import { subjectOf } from "../../src/proxy/transparent.js";
import { dig, mapLoader, recordingLogger } from "../helpers/documents.js";

function fixture(name: string): string {
	return fileURLToPath(new URL(`../fixtures/schemas/${name}`, import.meta.url));
}

const orderPath = fixture("order.json");
const commonUri = pathToFileURL(fixture("common.json")).href;

describe("Multi-document resolution", () => {
	it("should resolve references into a sibling file", () => {
		const result = load(orderPath);
		assert.equal(dig(result, "properties", "customer", "properties", "name", "type"), "string");
		assert.equal(dig(result, "properties", "shipTo", "properties", "city", "type"), "string");
	});

	it("should share targets across documents", () => {
		const result = load(orderPath);
		assert.equal(
			subjectOf(dig(result, "properties", "customer", "properties", "address")),
			subjectOf(dig(result, "properties", "shipTo")),
		);
	});

	it("should load each document once", () => {
		const { logger, messages } = recordingLogger();
		const result = load(orderPath, { logger });
		subjectOf(dig(result, "properties", "customer"));
		subjectOf(dig(result, "properties", "shipTo"));
		subjectOf(dig(result, "properties", "customer", "properties", "address"));
		assert.deepEqual(messages, [`debug: Loading document ${commonUri}`, `debug: Stored ${commonUri}`]);
	});

	it("should build cycles for recursive definitions", () => {
		const result = load(orderPath);
		const item = dig(result, "$defs", "item");
		assert.equal(subjectOf(dig(result, "properties", "items", "items")), item);
		assert.equal(subjectOf(dig(item, "properties", "related")), item);
		assert.equal(dig(item, "properties", "related", "properties", "related", "properties", "sku", "type"), "string");
	});

	it("should merge extra properties across documents", () => {
		const result = load(orderPath, { mergeProps: true });
		assert.ok(jsonEqual(dig(result, "properties", "shipTo"), {
			type: "object",
			properties: { city: { type: "string" }, street: { type: "string" } },
			description: "delivery address",
		}));
	});

	it("should write the original text back", () => {
		const result = load(orderPath);
		subjectOf(dig(result, "properties", "customer"));
		const original: unknown = JSON.parse(readFileSync(orderPath, "utf8"));
		assert.equal(dumps(result), JSON.stringify(original));
	});

	it("should produce plain cyclic data without proxies", () => {
		const result = load(orderPath, { proxies: false });
		const item = dig(result, "$defs", "item");
		assert.equal(dig(item, "properties", "related"), item);
		assert.equal(dig(result, "properties", "items", "items"), item);
		assert.equal(
			dig(result, "properties", "shipTo"),
			dig(result, "properties", "customer", "properties", "address"),
		);
	});
});

describe("Broken documents", () => {
	const brokenPath = fixture("broken.json");
	const brokenUri = pathToFileURL(brokenPath).href;

	it("should defer failures to the broken reference", () => {
		const result = load(brokenPath);
		assert.equal(dig(result, "properties", "ok", "type"), "string");
		assert.throws(() => subjectOf(dig(result, "properties", "bad")), JsonRefError);
	});

	it("should fail the whole load without lazy loading", () => {
		assert.throws(() => load(brokenPath, { lazyLoad: false }), {
			name: "JsonRefError",
			uri: `${brokenUri}#/$defs/nowhere`,
			message: `Error while resolving \`${brokenUri}#/$defs/nowhere\`: Unresolvable JSON pointer: "/$defs/nowhere"`,
		});
	});
});

describe("Loader documents", () => {
	it("should resolve remote references against the base URI", () => {
		const { loader, calls } = mapLoader({ doc2: { x: 1 } });
		const result = replaceRefs({ $ref: "doc2#/x" }, { baseUri: "doc1", loader });
		assert.equal(subjectOf(result), 1);
		assert.deepEqual(calls, ["doc2"]);
	});

	it("should reuse a caching loader across walks", () => {
		const calls: string[] = [];
		const jsonLoader = new JsonLoader({
			transport: (uri) => {
				calls.push(uri);
				return { kind: "json", value: { x: "shared" } };
			},
		});
		const first = replaceRefs({ a: { $ref: "u#/x" }, b: { $ref: "u#/x" } }, { loader: jsonLoader.loader });
		const second = replaceRefs({ $ref: "u#/x" }, { loader: jsonLoader.loader });
		assert.ok(jsonEqual(first, { a: "shared", b: "shared" }));
		assert.equal(subjectOf(second), "shared");
		assert.deepEqual(calls, ["u"]);
	});
});
