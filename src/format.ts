/**
 * Format string tokenizer for composite expressions.
 *
 * Text alternates literal runs and `{...}` specifiers. `{{` and `}}` stand
 * for literal braces. A specifier is `name[:format[:extension]]`; a name of
 * only digits is a regular expression capture group reference.
 */

import { type Result, ok } from "neverthrow";

import { type Errata, fail } from "./errata.ts";

export interface SpecifierParts {
	readonly name: string;
	readonly format: string;
	readonly ext: string;
	/** Capture group index, or -1 for a named extractor. */
	readonly idx: number;
}

export type FormatPiece =
	| { readonly kind: "literal"; readonly text: string; readonly offset: number }
	| { readonly kind: "spec"; readonly spec: SpecifierParts; readonly offset: number };

const CAPTURE_INDEX = /^\d+$/;

/**
 * Split specifier text into its parts. Colons inside a `<...>` argument do
 * not separate parts. Returns null if there is no name, or if a numeric
 * name is too large to be a capture index.
 */
export function parseSpecifier(text: string): SpecifierParts | null {
	const cuts: number[] = [];
	let depth = 0;
	for (let i = 0; i < text.length && cuts.length < 2; i++) {
		const c = text[i];
		if (c === "<") depth++;
		else if (c === ">" && depth > 0) depth--;
		else if (c === ":" && depth === 0) cuts.push(i);
	}

	const [first, second] = cuts;
	const name = (first === undefined ? text : text.slice(0, first)).trim();
	if (name.length === 0) return null;

	let format = "";
	let ext = "";
	if (first !== undefined) {
		format = second === undefined ? text.slice(first + 1) : text.slice(first + 1, second);
		if (second !== undefined) ext = text.slice(second + 1);
	}

	const idx = CAPTURE_INDEX.test(name) ? Number.parseInt(name, 10) : -1;
	if (!Number.isSafeInteger(idx)) return null;
	return { name, format, ext, idx };
}

/** Tokenize a format string into literal and specifier pieces. */
export function parseFormat(text: string): Result<FormatPiece[], Errata> {
	const pieces: FormatPiece[] = [];
	let literal = "";
	let literalStart = 0;

	const flush = (): void => {
		if (literal.length > 0) {
			pieces.push({ kind: "literal", text: literal, offset: literalStart });
			literal = "";
		}
	};

	let i = 0;
	while (i < text.length) {
		const c = text[i];
		const next = text[i + 1];
		if (c === "{" && next === "{") {
			if (literal.length === 0) literalStart = i;
			literal += "{";
			i += 2;
		} else if (c === "}" && next === "}") {
			if (literal.length === 0) literalStart = i;
			literal += "}";
			i += 2;
		} else if (c === "{") {
			const close = text.indexOf("}", i + 1);
			if (close < 0) {
				return fail(`Specifier at offset ${i} is not terminated with '}'.`);
			}
			const spec = parseSpecifier(text.slice(i + 1, close));
			if (spec === null) {
				return fail(
					`Invalid specifier at offset ${i}; an extractor name or capture group index is required.`,
				);
			}
			flush();
			pieces.push({ kind: "spec", spec, offset: i });
			i = close + 1;
		} else if (c === "}") {
			return fail(`Unmatched '}' at offset ${i}; use '}}' for a literal brace.`);
		} else {
			if (literal.length === 0) literalStart = i;
			literal += c;
			i += 1;
		}
	}
	flush();
	return ok(pieces);
}
