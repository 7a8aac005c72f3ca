// SPDX-License-Identifier: MIT
// Codec Unit Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { dump, dumps, load, loadUri, loadUriAsync, loads } from "../../src/api.js";
import { JsonLoader } from "../../src/loader/json-loader.js";
import { jsonRefOf } from "../../src/resolution/ref-resolver.js";
import { jsonEqual } from "../../src/resolution/compare.js";
import { proxy, subjectOf } from "../../src/proxy/transparent.js";
import { constantLoader, dig, fakeFetch, mapLoader } from "../helpers/documents.js";

describe("loads and dumps", () => {
	it("should round-trip reference objects", () => {
		const text = '[1,2,{"$ref":"#/0"},3]';
		const result = loads(text);
		assert.equal(dumps(result), text);
		assert.equal(jsonRefOf(dig(result, 2))?.isResolved, false);
		assert.ok(jsonEqual(result, [1, 2, 1, 3]));
		assert.equal(dumps(result), text);
	});

	it("should pass resolution options through", () => {
		const { loader, calls } = constantLoader(() => 42);
		const result = loads('{"$ref": "answer.json"}', { loader, baseUri: "mem://docs/" });
		assert.equal(Number(result), 42);
		assert.deepEqual(calls, ["mem://docs/answer.json"]);
	});

	it("should apply the reviver before references are replaced", () => {
		const result = loads('{"a": 1, "b": {"$ref": "#/a"}}', {
			reviver: (key, value) => (key === "a" ? 10 : value),
		});
		assert.equal(subjectOf(dig(result, "b")), 10);
	});

	it("should write other proxies as their subjects", () => {
		assert.equal(dumps({ list: proxy([1, 2]) }), '{"list":[1,2]}');
	});

	it("should apply the replacer after reference objects are substituted", () => {
		const result = loads('{"a": 1, "b": {"$ref": "#/a"}}');
		const text = dumps(result, {
			replacer: (key, value) => (key === "a" ? 2 : value),
		});
		assert.equal(text, '{"a":2,"b":{"$ref":"#/a"}}');
	});

	it("should indent with space", () => {
		assert.equal(dumps({ a: 1 }, { space: 2 }), '{\n  "a": 1\n}');
	});

	it("should throw on invalid text", () => {
		assert.throws(() => loads("{"), SyntaxError);
	});
});

describe("load and dump", () => {
	let dir: string;

	before(() => {
		dir = mkdtempSync(join(tmpdir(), "lazyref-api-"));
		writeFileSync(
			join(dir, "main.json"),
			'{"local": {"$ref": "#/defs/a"}, "beside": {"$ref": "other.json#/b"}, "defs": {"a": 1}}',
		);
		writeFileSync(join(dir, "other.json"), '{"b": "beside"}');
	});

	after(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("should resolve references beside the file", () => {
		const result = load(join(dir, "main.json"));
		assert.equal(subjectOf(dig(result, "local")), 1);
		assert.equal(subjectOf(dig(result, "beside")), "beside");
	});

	it("should prefer an explicit base URI", () => {
		const { loader, calls } = mapLoader({ "mem://elsewhere/other.json": { b: "elsewhere" } });
		const result = load(join(dir, "main.json"), { baseUri: "mem://elsewhere/main.json", loader });
		assert.equal(subjectOf(dig(result, "beside")), "elsewhere");
		assert.deepEqual(calls, ["mem://elsewhere/other.json"]);
	});

	it("should write reference objects back to a file", () => {
		const target = join(dir, "written.json");
		dump(load(join(dir, "main.json")), target);
		assert.equal(
			readFileSync(target, "utf8"),
			'{"local":{"$ref":"#/defs/a"},"beside":{"$ref":"other.json#/b"},"defs":{"a":1}}',
		);
	});

	it("should load documents by URI", () => {
		const result = loadUri(join(dir, "other.json"));
		assert.deepEqual(result, { b: "beside" });
	});
});

describe("loadUri", () => {
	it("should use the URI as the base", () => {
		const { loader, calls } = mapLoader({ "mem://root": { a: { $ref: "#/b" }, b: 3 } });
		const result = loadUri("mem://root", { loader });
		assert.equal(subjectOf(dig(result, "a")), 3);
		assert.deepEqual(calls, ["mem://root"]);
	});

	it("should resolve remote documents after prefetching", async () => {
		const { fetch, calls } = fakeFetch({
			"http://example.com/root.json": { a: { $ref: "defs.json#/x" } },
			"http://example.com/defs.json": { x: "fetched" },
		});
		const jsonLoader = new JsonLoader({ fetch });
		const result = await loadUriAsync("http://example.com/root.json", { jsonLoader });
		assert.equal(subjectOf(dig(result, "a")), "fetched");
		assert.deepEqual(calls, ["http://example.com/root.json", "http://example.com/defs.json"]);
	});

	it("should leave unreachable documents to the references that need them", async () => {
		const { fetch } = fakeFetch({
			"http://example.com/root.json": { ok: { $ref: "defs.json#/x" }, bad: { $ref: "gone.json" } },
			"http://example.com/defs.json": { x: "fetched" },
		});
		const result = await loadUriAsync("http://example.com/root.json", { jsonLoader: new JsonLoader({ fetch }) });
		assert.equal(subjectOf(dig(result, "ok")), "fetched");
		assert.throws(() => subjectOf(dig(result, "bad")), {
			name: "JsonRefError",
			uri: "http://example.com/gone.json",
		});
	});

	it("should resolve through a custom loader without prefetching", async () => {
		const { loader, calls } = mapLoader({
			"urn:example:root": { a: { $ref: "urn:example:lib#/x" } },
			"urn:example:lib": { x: 1 },
		});
		const result = await loadUriAsync("urn:example:root", { loader });
		assert.equal(subjectOf(dig(result, "a")), 1);
		assert.deepEqual(calls, ["urn:example:root", "urn:example:lib"]);
	});
});
