/**
 * Expression compiler: YAML node -> typed Expr.
 *
 * Node forms, checked in this order:
 *
 *   ~                          nil
 *   !literal "text"            constant string, never interpreted
 *   plain scalar               integer, boolean, address, or one extractor
 *   quoted scalar              composite format string
 *   []                         nil
 *   [ expr ]                   the scalar expression
 *   [ expr, { mod: }, ... ]    expression with a modifier chain
 *   [ expr, expr, ... ]        tuple
 */

import { type Result, err, ok } from "neverthrow";

import type { Config } from "./config.ts";
import type { ParseContext } from "./context.ts";
import { type Errata, fail } from "./errata.ts";
import {
	type Expr,
	compositeExpr,
	extractorExpr,
	featureExpr,
	listExpr,
	nilExpr,
	withModifier,
} from "./expr.ts";
import { ExtractorSpec, parseArg } from "./extractor.ts";
import { parseFormat, parseSpecifier } from "./format.ts";
import { type CfgNode, PLAIN_TAG, QUOTED_TAG } from "./node.ts";
import {
	ActiveType,
	BoolNames,
	BoolTag,
	NIL_FEATURE,
	ValueKind,
	booleanFeature,
	integerFeature,
	ipFeature,
	parseIntegerLiteral,
	parseIpLiteral,
	stringFeature,
	textOf,
} from "./types.ts";

/** Tag marking a scalar as literal text. Compared case-insensitively. */
export const LITERAL_TAG = "!literal";

/**
 * Resolve and validate a spec. Capture references are always strings;
 * named references are resolved in the extractor registry and validated by
 * the extractor. Names, arguments and extensions are interned.
 */
export function validateSpec(cfg: Config, spec: ExtractorSpec): Result<ActiveType, Errata> {
	const text = textOf(spec.name);
	if (text.length === 0) {
		return fail("Extractor name required but not found.");
	}
	spec.format = cfg.localize(spec.format);
	spec.ext = cfg.localize(spec.ext);

	if (spec.isCapture()) {
		spec.name = cfg.localize(text);
		return ok(ActiveType.of(ValueKind.STRING));
	}

	const parsed = parseArg(text);
	if (parsed.isErr()) return err(parsed.error);
	const { name, arg } = parsed.value;

	const ex = cfg.extractors.find(name);
	if (ex === null) {
		return fail(`Extractor "${name}" not found.`);
	}
	spec.extractor = ex;
	spec.name = cfg.localize(name);
	spec.arg = arg !== null ? cfg.localize(arg) : null;
	return ex.validate(cfg, spec, arg);
}

/** Expression for a validated spec, evaluated now if its type is constant. */
function specExpr(cfg: Config, spec: ExtractorSpec, vt: ActiveType): Expr {
	if (vt.isCfgConst() && spec.extractor !== null) {
		return featureExpr(cfg.localize(spec.extractor.extract(cfg, spec)));
	}
	return extractorExpr(spec, vt);
}

/** Plain scalar: integer, boolean, IP address, else a single extractor. */
export function parseUnquotedExpr(cfg: Config, text: string): Result<Expr, Errata> {
	const n = parseIntegerLiteral(text);
	if (n !== null) {
		return ok(featureExpr(integerFeature(n)));
	}

	const b = BoolNames.value(text);
	if (b !== BoolTag.INVALID) {
		return ok(featureExpr(booleanFeature(b === BoolTag.TRUE)));
	}

	const addr = parseIpLiteral(text);
	if (addr !== null) {
		return ok(featureExpr(ipFeature(addr)));
	}

	const parts = parseSpecifier(text);
	if (parts === null) {
		return fail(`Invalid syntax for extractor "${text}" - not a valid specifier.`);
	}
	const spec = ExtractorSpec.fromParts(parts);
	const vt = validateSpec(cfg, spec);
	if (vt.isErr()) return err(vt.error);
	return ok(specExpr(cfg, spec, vt.value));
}

/** Quoted scalar: literal text with embedded `{...}` specifiers. */
export function parseCompositeExpr(cfg: Config, text: string): Result<Expr, Errata> {
	const pieces = parseFormat(text);
	if (pieces.isErr()) return err(pieces.error);

	const specs: ExtractorSpec[] = [];
	let singleType = ActiveType.of(ValueKind.STRING);
	for (const piece of pieces.value) {
		if (piece.kind === "literal") {
			specs.push(ExtractorSpec.literal(cfg.localize(piece.text)));
			continue;
		}
		const spec = ExtractorSpec.fromParts(piece.spec);
		const vt = validateSpec(cfg, spec);
		if (vt.isErr()) {
			return err(vt.error.info(`While parsing specifier at offset ${piece.offset}.`));
		}
		singleType = vt.value;
		specs.push(spec);
	}

	const [first] = specs;
	if (first === undefined) {
		return ok(featureExpr(stringFeature(cfg.localize(""))));
	}
	if (specs.length === 1) {
		if (first.type === "literal") {
			return ok(featureExpr(stringFeature(first.ext)));
		}
		return ok(specExpr(cfg, first, singleType));
	}
	return ok(compositeExpr(specs));
}

/**
 * Scalar node. After parsing, capture references are checked against the
 * active regular expression and context references are recorded in the
 * enclosing feature scope.
 */
export function parseScalarExpr(
	cfg: Config,
	ctx: ParseContext,
	node: CfgNode,
): Result<Expr, Errata> {
	if (node.isNull()) {
		return ok(nilExpr());
	}

	const result =
		node.tag === PLAIN_TAG
			? parseUnquotedExpr(cfg, node.scalar)
			: parseCompositeExpr(cfg, node.scalar);
	if (result.isErr()) {
		return err(result.error.info(`While parsing feature expression at ${node.mark}.`));
	}

	const expr = result.value;
	if (expr.maxArgIdx >= 0) {
		const capture = ctx.activeCapture;
		if (capture.count === 0) {
			return fail(
				`Regular expression capture group ${expr.maxArgIdx} used at ${node.mark} but no regular expression is active.`,
			);
		}
		if (expr.maxArgIdx >= capture.count) {
			return fail(
				`Regular expression capture group ${expr.maxArgIdx} used at ${node.mark} but the maximum capture group is ${capture.count - 1} in the active regular expression from line ${capture.line}.`,
			);
		}
	}

	if (expr.ctxRef) {
		ctx.markCtxRef();
	}
	return ok(expr);
}

/** `[ base, { mod }, { mod }, ... ]`. Each modifier sees the chain's current type. */
export function parseExprWithMods(
	cfg: Config,
	ctx: ParseContext,
	node: CfgNode,
): Result<Expr, Errata> {
	const [baseNode, ...modNodes] = node.items();
	if (baseNode === undefined) {
		return ok(featureExpr(NIL_FEATURE));
	}
	const base = parseExpr(cfg, ctx, baseNode);
	if (base.isErr()) {
		return err(base.error.info(`While processing the expression at ${node.mark}.`));
	}

	let expr = base.value;
	for (const child of modNodes) {
		const mod = cfg.modifiers.load(cfg, ctx, child, expr.resultType);
		if (mod.isErr()) {
			return err(mod.error.info(`While parsing feature expression at ${child.mark}.`));
		}
		expr = withModifier(expr, mod.value);
	}
	return ok(expr);
}

/** Compile any expression node. */
export function parseExpr(cfg: Config, ctx: ParseContext, node: CfgNode): Result<Expr, Errata> {
	if (node.isNull()) {
		return ok(featureExpr(NIL_FEATURE));
	}

	const tag = node.tag;
	if (tag.toLowerCase() === LITERAL_TAG) {
		if (!node.isScalar()) {
			return fail(
				`"${LITERAL_TAG}" tag used on value at ${node.mark} which is not a string as required for a literal.`,
			);
		}
		return ok(featureExpr(stringFeature(cfg.localize(node.scalar), true)));
	}
	if (tag !== PLAIN_TAG && tag !== QUOTED_TAG) {
		return fail(`"${tag}" tag for extractor expression at ${node.mark} is not supported.`);
	}

	if (node.isScalar()) {
		return parseScalarExpr(cfg, ctx, node);
	}
	if (!node.isSequence()) {
		return fail(`Feature expression at ${node.mark} is not properly structured.`);
	}

	const items = node.items();
	const [first, second] = items;
	if (first === undefined) {
		return ok(featureExpr(NIL_FEATURE));
	}
	if (second === undefined) {
		return first.isScalar() || first.isNull()
			? parseScalarExpr(cfg, ctx, first)
			: parseExpr(cfg, ctx, first);
	}
	if (second.isMap()) {
		return parseExprWithMods(cfg, ctx, node);
	}

	const exprs: Expr[] = [];
	for (const child of items) {
		const x = parseExpr(cfg, ctx, child);
		if (x.isErr()) {
			return err(x.error.info(`While parsing feature expression list at ${node.mark}.`));
		}
		exprs.push(x.value);
	}
	return ok(listExpr(exprs));
}
