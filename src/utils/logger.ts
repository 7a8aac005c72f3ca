// SPDX-License-Identifier: MIT
// lazyref Logging
// Diagnostics go through a Logger so embedding applications decide where
// they end up. Nothing is written unless a logger is supplied.

/**
 * Minimal logging surface used by the loader and the reference walker
 */
export interface Logger {
	debug(message: string): void;
	warn(message: string): void;
}

/** Discards everything (the default) */
export const silentLogger: Logger = {
	debug() {
		// silent
	},
	warn() {
		// silent
	},
};

/**
 * Log to the console with a bracketed component prefix, e.g. `[lazyref] ...`
 *
 * @param prefix - Component name shown in brackets
 * @param verbose - Also emit debug messages
 */
export function consoleLogger(prefix = "lazyref", verbose = false): Logger {
	return {
		debug(message) {
			if (verbose) {
				console.debug(`[${prefix}] ${message}`);
			}
		},
		warn(message) {
			console.warn(`[${prefix}] ${message}`);
		},
	};
}

export function isLogger(value: unknown): value is Logger {
	return (
		typeof value === "object" &&
		value !== null &&
		"debug" in value &&
		typeof value.debug === "function" &&
		"warn" in value &&
		typeof value.warn === "function"
	);
}
