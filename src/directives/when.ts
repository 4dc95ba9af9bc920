import { err, ok } from "neverthrow";

import { DO_KEY, Directive, type DirectiveLoader } from "../directive.ts";
import { fail } from "../errata.ts";
import { Hook, HookName } from "../hook.ts";

export const WHEN_KEY = "when";

/**
 * Attach directives to a hook. At the top level of a configuration the
 * loader unpacks this and attaches `directive` to `hook` directly.
 */
export class When extends Directive {
	constructor(
		readonly hook: Hook,
		readonly directive: Directive,
	) {
		super();
	}

	override children(): readonly Directive[] {
		return [this.directive];
	}
}

export const loadWhen: DirectiveLoader = (cfg, ctx, { node, value }) => {
	if (!value.isScalar()) {
		return fail(`Value for "${WHEN_KEY}" at ${value.mark} is not a hook name.`);
	}
	const hook = HookName.value(value.scalar);
	if (hook === Hook.INVALID) {
		return fail(
			`Invalid hook name "${value.scalar}" in "${WHEN_KEY}" directive at ${value.mark}.`,
		);
	}

	const doNode = node.get(DO_KEY);
	if (doNode === undefined) {
		return fail(`The "${WHEN_KEY}" directive at ${node.mark} has no "${DO_KEY}" key.`);
	}
	const inner = ctx.withHook(hook, () => cfg.parseDirective(ctx, doNode));
	if (inner.isErr()) {
		return err(
			inner.error.info(`While parsing "${DO_KEY}" key for "${WHEN_KEY}" at ${node.mark}.`),
		);
	}
	return ok(new When(hook, inner.value));
};
