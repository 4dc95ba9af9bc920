/**
 * Extractors: named producers of feature values.
 *
 * The compiler does not implement extractors. It resolves names against an
 * ExtractorRegistry and asks the extractor to validate each use, which
 * yields the static result type. Extractors whose result is constant at
 * load time are evaluated during compilation.
 *
 *   const registry = new ExtractorRegistryBuilder().extractor(new EnvExtractor()).build();
 *   const config = new Config({ extractors: registry, ... });
 */

import { type Result, ok } from "neverthrow";

import type { Config } from "./config.ts";
import { type Errata, fail } from "./errata.ts";
import type { SpecifierParts } from "./format.ts";
import type { ActiveType, Feature, Text } from "./types.ts";

export const ARG_PREFIX = "<";
export const ARG_SUFFIX = ">";

export interface Extractor {
	readonly name: string;

	/** Check a use of this extractor and report its result type. */
	validate(cfg: Config, spec: ExtractorSpec, arg: string | null): Result<ActiveType, Errata>;

	/** Produce the value. Called at load time only for constant results. */
	extract(cfg: Config, spec: ExtractorSpec): Feature;

	/** True if the value depends on the live transaction. */
	hasCtxRef(): boolean;
}

export type SpecType = "literal" | "extractor";

/**
 * A single feature reference in source text, or a literal run of a
 * composite expression (text in `ext`). Filled in while parsing, then
 * frozen into an Expr.
 */
export class ExtractorSpec {
	type: SpecType = "extractor";
	name: Text = "";
	/** Argument from `name<arg>`, set by validation. */
	arg: Text | null = null;
	format: Text = "";
	ext: Text = "";
	/** Capture group index; negative for a named extractor. */
	idx = -1;
	extractor: Extractor | null = null;

	static literal(text: Text): ExtractorSpec {
		const spec = new ExtractorSpec();
		spec.type = "literal";
		spec.ext = text;
		return spec;
	}

	static fromParts(parts: SpecifierParts): ExtractorSpec {
		const spec = new ExtractorSpec();
		spec.name = parts.name;
		spec.format = parts.format;
		spec.ext = parts.ext;
		spec.idx = parts.idx;
		return spec;
	}

	isCapture(): boolean {
		return this.idx >= 0;
	}
}

export interface NameWithArg {
	readonly name: string;
	readonly arg: string | null;
}

/**
 * Split `name<arg>` into name and argument. A key without `<` has no
 * argument; a `<` without a closing `>` is an error.
 */
export function parseArg(key: string): Result<NameWithArg, Errata> {
	const start = key.indexOf(ARG_PREFIX);
	if (start < 0) {
		return ok({ name: key, arg: null });
	}
	const name = key.slice(0, start);
	const rest = key.slice(start + 1);
	if (!rest.endsWith(ARG_SUFFIX)) {
		return fail(`Argument for "${name}" is not properly terminated with '${ARG_SUFFIX}'.`);
	}
	return ok({ name, arg: rest.slice(0, -1) });
}

// =====================================================================
// Registry
// =====================================================================

/** Thrown when an extractor name is registered twice. */
export class DuplicateExtractorError extends Error {
	constructor(readonly extractorName: string) {
		super(`extractor "${extractorName}" is already registered`);
		this.name = "DuplicateExtractorError";
	}
}

/** Collects extractors, then build() produces an immutable registry. */
export class ExtractorRegistryBuilder {
	private readonly extractors = new Map<string, Extractor>();

	extractor(ex: Extractor): this {
		if (this.extractors.has(ex.name)) {
			throw new DuplicateExtractorError(ex.name);
		}
		this.extractors.set(ex.name, ex);
		return this;
	}

	build(): ExtractorRegistry {
		return new ExtractorRegistry(new Map(this.extractors));
	}
}

export class ExtractorRegistry {
	static readonly EMPTY = new ExtractorRegistry(new Map());

	private readonly extractors: ReadonlyMap<string, Extractor>;

	constructor(extractors: Map<string, Extractor>) {
		this.extractors = extractors;
		Object.freeze(this);
	}

	find(name: string): Extractor | null {
		return this.extractors.get(name) ?? null;
	}

	get size(): number {
		return this.extractors.size;
	}

	/** Registered names, sorted. */
	names(): string[] {
		return [...this.extractors.keys()].sort();
	}
}
