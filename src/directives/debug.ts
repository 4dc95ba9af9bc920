import { err, ok } from "neverthrow";

import { Directive, type DirectiveLoader } from "../directive.ts";
import type { Expr } from "../expr.ts";

export const DEBUG_KEY = "debug";

/** Write the value of an expression to the debug log. */
export class Debug extends Directive {
	constructor(readonly expr: Expr) {
		super();
	}
}

export const loadDebug: DirectiveLoader = (cfg, ctx, { value }) => {
	const expr = cfg.parseExpr(ctx, value);
	if (expr.isErr()) {
		return err(expr.error.info(`While parsing "${DEBUG_KEY}" value at ${value.mark}.`));
	}
	return ok(new Debug(expr.value));
};
