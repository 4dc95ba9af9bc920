/**
 * Directives shipped with the compiler.
 *
 *   const directives = registerBuiltins(new DirectiveRegistry());
 *   directives.define("set-header", hookMask(Hook.CREQ), loadSetHeader);
 */

import { DirectiveRegistry } from "../directive.ts";
import { ALL_HOOKS, Hook, hookMask } from "../hook.ts";
import { DEBUG_KEY, loadDebug } from "./debug.ts";
import { PROXY_REPLY_KEY, loadProxyReply } from "./proxy-reply.ts";
import { WHEN_KEY, loadWhen } from "./when.ts";
import { WITH_KEY, loadWith } from "./with.ts";

export { Debug, DEBUG_KEY } from "./debug.ts";
export { MAX_STATUS, MIN_STATUS, PROXY_REPLY_KEY, ProxyReply } from "./proxy-reply.ts";
export { WHEN_KEY, When } from "./when.ts";
export { IGNORE_CASE_KEY, SELECT_KEY, WITH_KEY, With, WithCase } from "./with.ts";

/** Register the built-in directives. Returns `registry`. */
export function registerBuiltins(registry: DirectiveRegistry): DirectiveRegistry {
	registry.define(WHEN_KEY, ALL_HOOKS, loadWhen);
	registry.define(WITH_KEY, ALL_HOOKS & ~hookMask(Hook.POST_LOAD), loadWith);
	registry.define(DEBUG_KEY, ALL_HOOKS, loadDebug);
	registry.define(
		PROXY_REPLY_KEY,
		hookMask(Hook.CREQ, Hook.PREQ, Hook.PRE_REMAP, Hook.POST_REMAP, Hook.REMAP),
		loadProxyReply,
	);
	return registry;
}

/** A fresh registry holding the built-ins. */
export function defaultDirectives(): DirectiveRegistry {
	return registerBuiltins(new DirectiveRegistry());
}
