// SPDX-License-Identifier: MIT
// lazyref Proxy Core exports

export { CallbackSubject, LazySubject, StaticSubject, isSubject } from "./subjects.js";
export type { Subject } from "./subjects.js";
export {
	PROXY_SOURCE,
	callbackProxy,
	isProxy,
	lazyProxy,
	proxy,
	sourceOf,
	subjectOf,
	targetFor,
	transparent,
} from "./transparent.js";
export type { OwnMembers, ProxyShape } from "./transparent.js";
