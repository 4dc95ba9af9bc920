/**
 * Compiled expressions.
 *
 * | kind        | payload                                   |
 * |-------------|-------------------------------------------|
 * | nil         | none (absent expression)                  |
 * | feature     | constant value computed at load time      |
 * | extractor   | one extractor or capture reference        |
 * | composite   | literal runs and references, as a string  |
 * | list        | sub-expressions (a tuple)                 |
 *
 * Every variant carries its result type, the largest capture group it
 * uses (-1 if none), whether it reads the live transaction, and the
 * modifiers applied to its value. Expressions are not mutated once built.
 */

import type { ExtractorSpec } from "./extractor.ts";
import type { Modifier } from "./modifier.ts";
import {
	ActiveType,
	type Feature,
	ValueKind,
	featureToString,
	featureType,
	textOf,
} from "./types.ts";

interface ExprBase {
	readonly resultType: ActiveType;
	readonly maxArgIdx: number;
	readonly ctxRef: boolean;
	readonly mods: readonly Modifier[];
}

export interface NilExpr extends ExprBase {
	readonly kind: "nil";
}

export interface FeatureExpr extends ExprBase {
	readonly kind: "feature";
	readonly feature: Feature;
}

export interface ExtractorExpr extends ExprBase {
	readonly kind: "extractor";
	readonly spec: ExtractorSpec;
}

export interface CompositeExpr extends ExprBase {
	readonly kind: "composite";
	readonly specs: readonly ExtractorSpec[];
}

export interface ListExpr extends ExprBase {
	readonly kind: "list";
	readonly exprs: readonly Expr[];
}

export type Expr = NilExpr | FeatureExpr | ExtractorExpr | CompositeExpr | ListExpr;

export function nilExpr(): NilExpr {
	return { kind: "nil", resultType: ActiveType.NONE, maxArgIdx: -1, ctxRef: false, mods: [] };
}

export function featureExpr(feature: Feature): FeatureExpr {
	return {
		kind: "feature",
		feature,
		resultType: featureType(feature),
		maxArgIdx: -1,
		ctxRef: false,
		mods: [],
	};
}

export function extractorExpr(spec: ExtractorSpec, resultType: ActiveType): ExtractorExpr {
	return {
		kind: "extractor",
		spec,
		resultType,
		maxArgIdx: spec.idx,
		ctxRef: spec.extractor?.hasCtxRef() ?? false,
		mods: [],
	};
}

export function compositeExpr(specs: readonly ExtractorSpec[]): CompositeExpr {
	let maxArgIdx = -1;
	let ctxRef = false;
	for (const s of specs) {
		maxArgIdx = Math.max(maxArgIdx, s.idx);
		if (s.extractor !== null) {
			ctxRef = ctxRef || s.extractor.hasCtxRef();
		}
	}
	return {
		kind: "composite",
		specs,
		resultType: ActiveType.of(ValueKind.STRING),
		maxArgIdx,
		ctxRef,
		mods: [],
	};
}

/** A tuple. The result is a list of the union of the element types. */
export function listExpr(exprs: readonly Expr[]): ListExpr {
	let elements = ActiveType.NONE;
	let maxArgIdx = -1;
	let ctxRef = false;
	for (const x of exprs) {
		elements = elements.union(x.resultType.baseTypes());
		maxArgIdx = Math.max(maxArgIdx, x.maxArgIdx);
		ctxRef = ctxRef || x.ctxRef;
	}
	return {
		kind: "list",
		exprs,
		resultType: ActiveType.list(elements),
		maxArgIdx,
		ctxRef,
		mods: [],
	};
}

/** Copy of `expr` with `mod` appended and the chain's new result type. */
export function withModifier<E extends Expr>(expr: E, mod: Modifier): E {
	return { ...expr, mods: [...expr.mods, mod], resultType: mod.resultType(expr.resultType) };
}

export function isConstant(expr: Expr): boolean {
	return expr.kind === "feature" && expr.mods.length === 0;
}

/** Direct sub-expressions. */
export function exprChildren(expr: Expr): readonly Expr[] {
	switch (expr.kind) {
		case "list":
			return expr.exprs;
		case "nil":
		case "feature":
		case "extractor":
		case "composite":
			return [];
	}
}

function describeSpec(spec: ExtractorSpec): string {
	if (spec.type === "literal") return textOf(spec.ext);
	let s = textOf(spec.name);
	if (spec.arg !== null) s += `<${textOf(spec.arg)}>`;
	const format = textOf(spec.format);
	const ext = textOf(spec.ext);
	if (format.length > 0 || ext.length > 0) s += `:${format}`;
	if (ext.length > 0) s += `:${ext}`;
	return `{${s}}`;
}

/** Source-like rendering for diagnostics. */
export function describeExpr(expr: Expr): string {
	let s: string;
	switch (expr.kind) {
		case "nil":
			s = "NIL";
			break;
		case "feature":
			s = featureToString(expr.feature);
			if (expr.feature.kind === "string") s = JSON.stringify(s);
			break;
		case "extractor":
			s = describeSpec(expr.spec);
			break;
		case "composite":
			s = JSON.stringify(expr.specs.map(describeSpec).join(""));
			break;
		case "list":
			s = `[ ${expr.exprs.map(describeExpr).join(", ")} ]`;
			break;
	}
	for (const mod of expr.mods) {
		s += ` | ${mod.name}`;
	}
	return s;
}
