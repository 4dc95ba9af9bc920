/**
 * Pipeline stages ("hooks") at which compiled directives run.
 *
 * The order is fixed and only used for indexing: per-hook root lists and
 * directive hook masks are addressed by these values.
 */

import { Lexicon } from "./lexicon.ts";

export const Hook = {
	INVALID: -1,
	POST_LOAD: 0,
	TXN_START: 1,
	CREQ: 2,
	PREQ: 3,
	URSP: 4,
	PRSP: 5,
	PRE_REMAP: 6,
	POST_REMAP: 7,
	TXN_CLOSE: 8,
	REMAP: 9,
	MSG: 10,
} as const;

export type Hook = (typeof Hook)[keyof typeof Hook];

/** Hooks in index order, excluding INVALID. */
export const HOOKS: readonly Hook[] = [
	Hook.POST_LOAD,
	Hook.TXN_START,
	Hook.CREQ,
	Hook.PREQ,
	Hook.URSP,
	Hook.PRSP,
	Hook.PRE_REMAP,
	Hook.POST_REMAP,
	Hook.TXN_CLOSE,
	Hook.REMAP,
	Hook.MSG,
];

export const HOOK_COUNT = HOOKS.length;

export const HookName = new Lexicon<Hook>(
	[
		[Hook.POST_LOAD, ["post-load"]],
		[Hook.TXN_START, ["txn-open"]],
		[Hook.CREQ, ["ua-req", "creq"]],
		[Hook.PREQ, ["proxy-req", "preq"]],
		[Hook.URSP, ["upstream-rsp", "upstream-resp", "ursp"]],
		[Hook.PRSP, ["proxy-rsp", "proxy-resp", "prsp"]],
		[Hook.PRE_REMAP, ["pre-remap"]],
		[Hook.POST_REMAP, ["post-remap"]],
		[Hook.TXN_CLOSE, ["txn-close"]],
		[Hook.REMAP, ["remap"]],
		[Hook.MSG, ["msg"]],
	],
	Hook.INVALID,
);

/** Hook for an index, or INVALID if out of range. */
export function hookAt(index: number): Hook {
	return HOOKS[index] ?? Hook.INVALID;
}

/** One bit per hook. */
export type HookMask = number;

export function hookMask(...hooks: Hook[]): HookMask {
	let mask = 0;
	for (const h of hooks) {
		if (h !== Hook.INVALID) mask |= 1 << h;
	}
	return mask;
}

export const ALL_HOOKS: HookMask = hookMask(...HOOKS);

export function maskAllows(mask: HookMask, hook: Hook): boolean {
	return hook !== Hook.INVALID && (mask & (1 << hook)) !== 0;
}

/** Hook names present in `mask`, in index order. */
export function maskHooks(mask: HookMask): string[] {
	return HOOKS.filter((h) => maskAllows(mask, h)).map((h) => HookName.name(h));
}
