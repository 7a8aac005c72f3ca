// SPDX-License-Identifier: MIT
// Options Schema Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
	resolveJsonLoaderOptions,
	resolveReplaceRefsOptions,
} from "../../src/config/options.js";
import { InvalidOptionsError, ResolutionErrorCode } from "../../src/resolution/resolution-errors.js";
import { silentLogger } from "../../src/utils/logger.js";

function optionIssues(fn: () => unknown): string[] {
	try {
		fn();
	} catch (error) {
		assert.ok(error instanceof InvalidOptionsError);
		assert.equal(error.resolutionCode, ResolutionErrorCode.InvalidOptions);
		return error.issues.map((issue) => issue.path);
	}
	return assert.fail("expected InvalidOptionsError");
}

describe("resolveReplaceRefsOptions", () => {
	it("should fill in every default", () => {
		const options = resolveReplaceRefsOptions(undefined);
		assert.equal(options.baseUri, "");
		assert.equal(options.loader, undefined);
		assert.equal(options.jsonschema, false);
		assert.equal(options.loadOnRepr, "auto");
		assert.equal(options.mergeProps, false);
		assert.equal(options.proxies, true);
		assert.equal(options.lazyLoad, true);
		assert.equal(options.logger, silentLogger);
	});

	it("should keep supplied values", () => {
		const loader = (): number => 1;
		const options = resolveReplaceRefsOptions({
			baseUri: "http://example.com/a",
			loader,
			loadOnRepr: false,
			mergeProps: true,
		});
		assert.equal(options.baseUri, "http://example.com/a");
		assert.equal(options.loader, loader);
		assert.equal(options.loadOnRepr, false);
		assert.equal(options.mergeProps, true);
	});

	it("should reject values of the wrong type", () => {
		assert.deepEqual(optionIssues(() => resolveReplaceRefsOptions({ mergeProps: "yes" })), ["mergeProps"]);
		assert.deepEqual(optionIssues(() => resolveReplaceRefsOptions({ loadOnRepr: "sometimes" })), ["loadOnRepr"]);
	});

	it("should name the expected collaborator", () => {
		assert.throws(() => resolveReplaceRefsOptions({ loader: 42 }), {
			name: "InvalidOptionsError",
			message: "Invalid options: loader: Expected a loader function",
		});
	});

	it("should report the root when options are not an object", () => {
		assert.deepEqual(optionIssues(() => resolveReplaceRefsOptions("fast")), ["$"]);
	});
});

describe("resolveJsonLoaderOptions", () => {
	it("should default to a cached, silent loader", () => {
		const options = resolveJsonLoaderOptions({});
		assert.equal(options.cache, true);
		assert.equal(options.transport, undefined);
		assert.equal(options.fetch, undefined);
		assert.equal(options.logger, silentLogger);
	});

	it("should reject a logger without warn", () => {
		assert.deepEqual(optionIssues(() => resolveJsonLoaderOptions({ logger: { debug: () => undefined } })), ["logger"]);
	});
});
