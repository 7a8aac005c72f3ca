// SPDX-License-Identifier: MIT
// Logger Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { consoleLogger, isLogger, silentLogger } from "../../src/utils/logger.js";

describe("consoleLogger", () => {
	it("should prefix warnings with the component name", (t) => {
		const warn = t.mock.method(console, "warn", () => undefined);
		consoleLogger("loader").warn("document gone");
		assert.equal(warn.mock.callCount(), 1);
		assert.deepEqual(warn.mock.calls[0]?.arguments, ["[loader] document gone"]);
	});

	it("should drop debug messages unless verbose", (t) => {
		const debug = t.mock.method(console, "debug", () => undefined);
		consoleLogger().debug("quiet");
		consoleLogger("lazyref", true).debug("loud");
		assert.equal(debug.mock.callCount(), 1);
		assert.deepEqual(debug.mock.calls[0]?.arguments, ["[lazyref] loud"]);
	});
});

describe("isLogger", () => {
	it("should accept objects with debug and warn", () => {
		assert.equal(isLogger(silentLogger), true);
		assert.equal(isLogger(consoleLogger()), true);
	});

	it("should reject anything else", () => {
		assert.equal(isLogger({ warn: () => undefined }), false);
		assert.equal(isLogger(console.warn), false);
		assert.equal(isLogger(null), false);
	});
});
