// SPDX-License-Identifier: MIT
// lazyref Options Schemas
// Single source of truth for option defaults. Public option types are the
// schema inputs; the walker and loader work on the parsed outputs.

import { z } from "zod/v4";
import type { Loader } from "../types/resolution.js";
import type { FetchLike, Transport } from "../loader/transport.js";
import { isLogger, silentLogger, type Logger } from "../utils/logger.js";
import { InvalidOptionsError, type OptionIssue } from "../resolution/resolution-errors.js";

//==============================================================================
// Collaborator Schemas
//==============================================================================

function isFunction(value: unknown): boolean {
	return typeof value === "function";
}

const LoaderSchema = z.custom<Loader>(isFunction, "Expected a loader function");
const TransportSchema = z.custom<Transport>(isFunction, "Expected a transport function");
const FetchSchema = z.custom<FetchLike>(isFunction, "Expected a fetch function");
const LoggerSchema = z.custom<Logger>(isLogger, "Expected a logger with debug and warn");

//==============================================================================
// Option Schemas
//==============================================================================

export const ReplaceRefsOptionsSchema = z.object({
	/** Base URI for relative references */
	baseUri: z.string().default(""),
	/** Loader for remote documents; a fresh JsonLoader when omitted */
	loader: LoaderSchema.optional(),
	/** Honour `$id`/`id` as base URI changes */
	jsonschema: z.boolean().default(false),
	/** Whether displaying an unresolved reference resolves it */
	loadOnRepr: z.union([z.boolean(), z.literal("auto")]).default("auto"),
	/** Overlay sibling members of `$ref` onto object targets */
	mergeProps: z.boolean().default(false),
	/** Keep proxies in the result (false splices resolved values in) */
	proxies: z.boolean().default(true),
	/** Defer resolution until first access */
	lazyLoad: z.boolean().default(true),
	logger: LoggerSchema.default(silentLogger),
});

export type ReplaceRefsOptions = z.input<typeof ReplaceRefsOptionsSchema>;
export type ResolvedReplaceRefsOptions = z.output<typeof ReplaceRefsOptionsSchema>;

export const JsonLoaderOptionsSchema = z.object({
	/** Keep loaded documents keyed by normalized URI */
	cache: z.boolean().default(true),
	/** Synchronous document source; file transport when omitted */
	transport: TransportSchema.optional(),
	/** Used by prefetch for http(s) documents; global fetch when omitted */
	fetch: FetchSchema.optional(),
	logger: LoggerSchema.default(silentLogger),
});

export type JsonLoaderOptions = z.input<typeof JsonLoaderOptionsSchema>;
export type ResolvedJsonLoaderOptions = z.output<typeof JsonLoaderOptionsSchema>;

//==============================================================================
// Parsing
//==============================================================================

function zodToOptionIssues(error: z.ZodError): OptionIssue[] {
	return error.issues.map((issue) => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

/**
 * Validate replaceRefs options and fill in defaults
 *
 * @throws InvalidOptionsError when an option has the wrong type
 */
export function resolveReplaceRefsOptions(options: unknown): ResolvedReplaceRefsOptions {
	const parsed = ReplaceRefsOptionsSchema.safeParse(options ?? {});
	if (!parsed.success) {
		throw new InvalidOptionsError(zodToOptionIssues(parsed.error));
	}
	return parsed.data;
}

/**
 * Validate JsonLoader options and fill in defaults
 *
 * @throws InvalidOptionsError when an option has the wrong type
 */
export function resolveJsonLoaderOptions(options: unknown): ResolvedJsonLoaderOptions {
	const parsed = JsonLoaderOptionsSchema.safeParse(options ?? {});
	if (!parsed.success) {
		throw new InvalidOptionsError(zodToOptionIssues(parsed.error));
	}
	return parsed.data;
}
