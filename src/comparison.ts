/**
 * Comparisons used by `with` cases.
 *
 * Patterns are compiled once at load time. String comparisons pre-lowercase
 * their pattern when ignoring case. Regular expressions use RE2, so a
 * pattern that needs backtracking is rejected while loading.
 */

import { type Result, ok } from "neverthrow";
import { RE2JS } from "re2js";

import { type Errata, fail } from "./errata.ts";

/** Longest pattern accepted by `rxp`. */
export const MAX_PATTERN_LENGTH = 8192;

export const ANY_OF_KEY = "any-of";

export interface Comparison {
	/** Case key that produced this comparison. */
	readonly key: ComparisonKey | typeof ANY_OF_KEY;
	matches(value: string): boolean;
}

export const COMPARISON_KEYS = ["match", "prefix", "suffix", "contains", "rxp"] as const;
export type ComparisonKey = (typeof COMPARISON_KEYS)[number];
export type TextComparisonKey = Exclude<ComparisonKey, "rxp">;

export function isComparisonKey(key: string): key is ComparisonKey {
	return COMPARISON_KEYS.some((k) => k === key);
}

const TEXT_TESTS: Record<TextComparisonKey, (input: string, pattern: string) => boolean> = {
	match: (input, pattern) => input === pattern,
	prefix: (input, pattern) => input.startsWith(pattern),
	suffix: (input, pattern) => input.endsWith(pattern),
	contains: (input, pattern) => input.includes(pattern),
};

/** Literal text comparison; the pattern is lowercased once when ignoring case. */
export class TextComparison implements Comparison {
	private readonly cmpPattern: string;

	constructor(
		readonly key: TextComparisonKey,
		readonly pattern: string,
		readonly ignoreCase: boolean = false,
	) {
		this.cmpPattern = ignoreCase ? pattern.toLowerCase() : pattern;
	}

	matches(value: string): boolean {
		return TEXT_TESTS[this.key](this.ignoreCase ? value.toLowerCase() : value, this.cmpPattern);
	}
}

/**
 * Unanchored RE2 search. `groupCount` excludes group 0, so a case body may
 * use capture indices up to and including it.
 */
export class RegexComparison implements Comparison {
	readonly key = "rxp";
	readonly groupCount: number;
	private readonly compiled: RE2JS;

	private constructor(
		readonly pattern: string,
		readonly ignoreCase: boolean,
		compiled: RE2JS,
	) {
		this.compiled = compiled;
		this.groupCount = compiled.groupCount();
	}

	static compile(pattern: string, ignoreCase = false): Result<RegexComparison, Errata> {
		if (pattern.length > MAX_PATTERN_LENGTH) {
			return fail(
				`Regular expression is ${pattern.length} characters; the limit is ${MAX_PATTERN_LENGTH}.`,
			);
		}
		try {
			const compiled = RE2JS.compile(pattern, ignoreCase ? RE2JS.CASE_INSENSITIVE : 0);
			return ok(new RegexComparison(pattern, ignoreCase, compiled));
		} catch (e) {
			return fail(
				`Invalid regular expression "${pattern}": ${e instanceof Error ? e.message : String(e)}`,
			);
		}
	}

	matches(value: string): boolean {
		return this.compiled.matcher(value).find();
	}

	/** Capture groups of the first match, group 0 first; null if no match. */
	groups(value: string): (string | null)[] | null {
		const m = this.compiled.matcher(value);
		if (!m.find()) return null;
		const groups: (string | null)[] = [];
		for (let i = 0; i <= this.groupCount; i++) {
			groups.push(m.group(i));
		}
		return groups;
	}
}

/** Matches if any member matches, tried in order. */
export class AnyOfComparison implements Comparison {
	readonly key = ANY_OF_KEY;

	constructor(readonly members: readonly Comparison[]) {}

	matches(value: string): boolean {
		return this.members.some((m) => m.matches(value));
	}
}

/**
 * Capture groups, group 0 included, available to a case body whichever
 * member matched. Zero unless every path through the comparison is `rxp`.
 */
export function captureCount(comparison: Comparison): number {
	if (comparison instanceof RegexComparison) return comparison.groupCount + 1;
	if (comparison instanceof AnyOfComparison) {
		let count = Number.POSITIVE_INFINITY;
		for (const member of comparison.members) {
			count = Math.min(count, captureCount(member));
		}
		return Number.isFinite(count) ? count : 0;
	}
	return 0;
}

/** Build the comparison for a case key and its pattern text. */
export function compileComparison(
	key: ComparisonKey,
	pattern: string,
	ignoreCase: boolean,
): Result<Comparison, Errata> {
	if (key === "rxp") {
		return RegexComparison.compile(pattern, ignoreCase).map((rx): Comparison => rx);
	}
	return ok(new TextComparison(key, pattern, ignoreCase));
}
