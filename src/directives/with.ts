/**
 * `with`: compare the value of an expression against a list of cases and
 * run the directives of the first case that matches.
 *
 *   with: "{ua-req-path}"
 *   select:
 *   - prefix: "/api/"
 *     do: ...
 *   - rxp: "^/v(\\d+)/"
 *     do:
 *     - debug: "version {1}"
 *   - any-of:
 *     - match: "/"
 *     - prefix: "/index"
 *     do: ...
 *   do: ...              # no case matched
 *
 * Directives under an `rxp` case may use the pattern's capture groups.
 */

import { type Result, err, ok } from "neverthrow";

import {
	ANY_OF_KEY,
	AnyOfComparison,
	COMPARISON_KEYS,
	type Comparison,
	captureCount,
	compileComparison,
	isComparisonKey,
} from "../comparison.ts";
import type { Config } from "../config.ts";
import type { ParseContext } from "../context.ts";
import { DO_KEY, Directive, type DirectiveLoader } from "../directive.ts";
import { Errata, fail } from "../errata.ts";
import type { Expr } from "../expr.ts";
import type { CfgNode } from "../node.ts";
import { BoolNames, BoolTag, ValueKind } from "../types.ts";

export const WITH_KEY = "with";
export const SELECT_KEY = "select";
export const IGNORE_CASE_KEY = "ignore-case";

export class WithCase {
	constructor(
		/** Null for a case that matches anything. */
		readonly comparison: Comparison | null,
		readonly directive: Directive | null,
	) {}
}

export class With extends Directive {
	constructor(
		readonly expr: Expr,
		readonly cases: readonly WithCase[],
		readonly fallback: Directive | null,
		/** The expression reads the live transaction. */
		readonly ctxRef: boolean,
	) {
		super();
	}

	override children(): readonly Directive[] {
		const nested: Directive[] = [];
		for (const c of this.cases) {
			if (c.directive !== null) nested.push(c.directive);
		}
		if (this.fallback !== null) nested.push(this.fallback);
		return nested;
	}
}

function loadIgnoreCase(node: CfgNode): Result<boolean, Errata> {
	const flag = node.get(IGNORE_CASE_KEY);
	if (flag === undefined) return ok(false);
	const tag = flag.isScalar() ? BoolNames.value(flag.scalar) : BoolTag.INVALID;
	if (tag === BoolTag.INVALID) {
		return fail(`Value for "${IGNORE_CASE_KEY}" at ${flag.mark} is not a boolean.`);
	}
	return ok(tag === BoolTag.TRUE);
}

const CASE_KEYS = [...COMPARISON_KEYS, ANY_OF_KEY].join(", ");

function loadComparison(
	expr: Expr,
	key: string,
	keyNode: CfgNode,
	value: CfgNode,
	ignoreCase: boolean,
): Result<Comparison, Errata> {
	if (key === ANY_OF_KEY) {
		return loadAnyOf(expr, value, ignoreCase);
	}
	if (!isComparisonKey(key)) {
		return fail(
			`Key "${key}" at ${keyNode.mark} is not a comparison (expected one of ${CASE_KEYS}).`,
		);
	}
	if (!expr.resultType.has(ValueKind.STRING)) {
		return fail(
			`Comparison "${key}" at ${keyNode.mark} requires a string but the value is ${expr.resultType}.`,
		);
	}
	if (!value.isScalar()) {
		return fail(`Pattern for "${key}" at ${value.mark} is not a string.`);
	}
	const compiled = compileComparison(key, value.scalar, ignoreCase);
	if (compiled.isErr()) {
		return err(compiled.error.info(`While compiling "${key}" at ${value.mark}.`));
	}
	return ok(compiled.value);
}

function loadAnyOf(expr: Expr, value: CfgNode, ignoreCase: boolean): Result<Comparison, Errata> {
	const items = value.isSequence() ? value.items() : [value];
	if (items.length === 0) {
		return fail(`Value for "${ANY_OF_KEY}" at ${value.mark} has no comparisons.`);
	}
	const members: Comparison[] = [];
	for (const item of items) {
		const entries = item.isMap() ? item.entries() : [];
		const only = entries[0];
		if (entries.length !== 1 || only === undefined) {
			return fail(
				`Element of "${ANY_OF_KEY}" at ${item.mark} must be an object with exactly one comparison.`,
			);
		}
		const member = loadComparison(expr, only.key, only.keyNode, only.value, ignoreCase);
		if (member.isErr()) return err(member.error);
		members.push(member.value);
	}
	return ok(new AnyOfComparison(members));
}

function loadCase(
	cfg: Config,
	ctx: ParseContext,
	expr: Expr,
	node: CfgNode,
): Result<WithCase, Errata> {
	if (!node.isMap()) {
		return fail(`Case at ${node.mark} is not an object as required.`);
	}

	const ignoreCase = loadIgnoreCase(node);
	if (ignoreCase.isErr()) return err(ignoreCase.error);

	let comparison: Comparison | null = null;
	let line = 0;
	for (const { key, keyNode, value } of node.entries()) {
		if (key === DO_KEY || key === IGNORE_CASE_KEY) continue;
		if (comparison !== null) {
			return fail(`Case at ${node.mark} has more than one comparison.`);
		}
		const loaded = loadComparison(expr, key, keyNode, value, ignoreCase.value);
		if (loaded.isErr()) return err(loaded.error);
		comparison = loaded.value;
		line = value.mark.line;
	}
	const captures = comparison !== null ? captureCount(comparison) : 0;

	const doNode = node.get(DO_KEY);
	if (doNode === undefined) {
		return ok(new WithCase(comparison, null));
	}
	const body =
		captures > 0
			? ctx.withCapture(captures, line, () => cfg.parseDirective(ctx, doNode))
			: cfg.parseDirective(ctx, doNode);
	if (body.isErr()) {
		return err(body.error.info(`While parsing "${DO_KEY}" for case at ${node.mark}.`));
	}
	return ok(new WithCase(comparison, body.value));
}

export const loadWith: DirectiveLoader = (cfg, ctx, { node, value }) => {
	const scoped = ctx.featureScope(() => cfg.parseExpr(ctx, value));
	const expr = scoped.value;
	if (expr.isErr()) {
		return err(expr.error.info(`While parsing "${WITH_KEY}" value at ${value.mark}.`));
	}

	const cases: WithCase[] = [];
	const select = node.get(SELECT_KEY);
	if (select !== undefined && !select.isNull()) {
		const caseNodes = select.isSequence() ? select.items() : [select];
		const errata = new Errata();
		for (const caseNode of caseNodes) {
			const loaded = loadCase(cfg, ctx, expr.value, caseNode);
			if (loaded.isErr()) {
				errata.note(loaded.error);
			} else {
				cases.push(loaded.value);
			}
		}
		if (!errata.isOk()) {
			return err(errata.info(`While parsing "${SELECT_KEY}" at ${select.mark}.`));
		}
	}

	let fallback: Directive | null = null;
	const doNode = node.get(DO_KEY);
	if (doNode !== undefined) {
		const loaded = cfg.parseDirective(ctx, doNode);
		if (loaded.isErr()) {
			return err(loaded.error.info(`While parsing "${DO_KEY}" for "${WITH_KEY}" at ${node.mark}.`));
		}
		fallback = loaded.value;
	}

	if (cases.length === 0 && fallback === null) {
		return fail(
			`The "${WITH_KEY}" directive at ${node.mark} has neither "${SELECT_KEY}" nor "${DO_KEY}".`,
		);
	}
	return ok(new With(expr.value, cases, fallback, scoped.ctxRef));
};
