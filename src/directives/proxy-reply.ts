/**
 * `proxy-reply`: answer the transaction from the proxy instead of the
 * upstream. The value is a status, or a `[ status, reason ]` tuple.
 */

import { err, ok } from "neverthrow";

import { Directive, type DirectiveLoader } from "../directive.ts";
import { fail } from "../errata.ts";
import type { Expr } from "../expr.ts";
import { ValueKind } from "../types.ts";

export const PROXY_REPLY_KEY = "proxy-reply";

export const MIN_STATUS = 100;
export const MAX_STATUS = 599;

export class ProxyReply extends Directive {
	constructor(readonly expr: Expr) {
		super();
	}
}

/** The status part of the value, if it is known now. */
function constantStatus(expr: Expr): number | null {
	if (expr.mods.length > 0) return null;
	if (expr.kind === "feature" && expr.feature.kind === "integer") {
		return expr.feature.value;
	}
	if (expr.kind === "list") {
		const [first] = expr.exprs;
		return first !== undefined ? constantStatus(first) : null;
	}
	return null;
}

export const loadProxyReply: DirectiveLoader = (cfg, ctx, { value }) => {
	const expr = cfg.parseExpr(ctx, value);
	if (expr.isErr()) {
		return err(expr.error.info(`While parsing "${PROXY_REPLY_KEY}" value at ${value.mark}.`));
	}

	const vt = expr.value.resultType;
	if (!vt.hasAny(ValueKind.INTEGER | ValueKind.LIST)) {
		return fail(
			`Value for "${PROXY_REPLY_KEY}" at ${value.mark} must be a status or a [ status, reason ] list, not ${vt}.`,
		);
	}
	const status = constantStatus(expr.value);
	if (status !== null && (status < MIN_STATUS || status > MAX_STATUS)) {
		return fail(
			`Status ${status} for "${PROXY_REPLY_KEY}" at ${value.mark} is not in the range ${MIN_STATUS}..${MAX_STATUS}.`,
		);
	}
	return ok(new ProxyReply(expr.value));
};
