/**
 * Tests for with-case comparisons (src/comparison.ts).
 */

import { describe, expect, it } from "vitest";

import {
	AnyOfComparison,
	MAX_PATTERN_LENGTH,
	RegexComparison,
	TextComparison,
	captureCount,
	compileComparison,
	isComparisonKey,
} from "../src/comparison.ts";
import { expectErr, expectOk } from "./helpers/config.ts";

describe("TextComparison", () => {
	it("matches the whole value", () => {
		expect(new TextComparison("match", "/").matches("/")).toBe(true);
		expect(new TextComparison("match", "/").matches("/a")).toBe(false);
	});

	it("is case-sensitive by default", () => {
		expect(new TextComparison("match", "Host").matches("host")).toBe(false);
		expect(new TextComparison("match", "Host", true).matches("HOST")).toBe(true);
	});

	it("matches a prefix", () => {
		expect(new TextComparison("prefix", "/api").matches("/api/users")).toBe(true);
		expect(new TextComparison("prefix", "/api").matches("/other")).toBe(false);
		expect(new TextComparison("prefix", "").matches("anything")).toBe(true);
	});

	it("matches a suffix", () => {
		expect(new TextComparison("suffix", ".json").matches("data.json")).toBe(true);
		expect(new TextComparison("suffix", ".JSON", true).matches("data.json")).toBe(true);
		expect(new TextComparison("suffix", ".json").matches("data.xml")).toBe(false);
	});

	it("matches a substring", () => {
		expect(new TextComparison("contains", "admin").matches("/x/admin/y")).toBe(true);
		expect(new TextComparison("contains", "ADMIN", true).matches("/x/admin/y")).toBe(true);
		expect(new TextComparison("contains", "admin").matches("/x/user/y")).toBe(false);
	});
});

describe("RegexComparison", () => {
	it("searches anywhere in the value", () => {
		const rx = expectOk(RegexComparison.compile("v\\d+"));
		expect(rx.matches("/api/v2/users")).toBe(true);
		expect(rx.matches("/api/users")).toBe(false);
	});

	it("counts capture groups", () => {
		expect(expectOk(RegexComparison.compile("^/(\\w+)/(\\d+)$")).groupCount).toBe(2);
		expect(expectOk(RegexComparison.compile("^/(?:\\w+)$")).groupCount).toBe(0);
	});

	it("returns the groups of the first match", () => {
		const rx = expectOk(RegexComparison.compile("^/(\\w+)/(\\d+)?"));
		expect(rx.groups("/users/42")).toEqual(["/users/42", "users", "42"]);
		expect(rx.groups("/users/")).toEqual(["/users/", "users", null]);
		expect(rx.groups("users")).toBeNull();
	});

	it("ignores case on request", () => {
		expect(expectOk(RegexComparison.compile("^/api", true)).matches("/API/x")).toBe(true);
	});

	it("rejects backreferences", () => {
		expect(expectErr(RegexComparison.compile("(a)\\1")).messages()[0]).toMatch(
			/^Invalid regular expression "\(a\)\\1": /,
		);
	});

	it("rejects overlong patterns", () => {
		const pattern = "a".repeat(MAX_PATTERN_LENGTH + 1);
		expect(expectErr(RegexComparison.compile(pattern)).messages()).toEqual([
			`Regular expression is ${MAX_PATTERN_LENGTH + 1} characters; the limit is ${MAX_PATTERN_LENGTH}.`,
		]);
	});
});

describe("AnyOfComparison", () => {
	it("matches when any member does", () => {
		const any = new AnyOfComparison([
			new TextComparison("match", "delain"),
			new TextComparison("prefix", "delain/"),
		]);
		expect(any.matches("delain")).toBe(true);
		expect(any.matches("delain/songs")).toBe(true);
		expect(any.matches("delainx")).toBe(false);
	});
});

describe("captureCount", () => {
	const rx = (pattern: string) => expectOk(RegexComparison.compile(pattern));

	it("counts group 0 for a regular expression", () => {
		expect(captureCount(rx("^/(a)/(b)"))).toBe(3);
		expect(captureCount(new TextComparison("prefix", "/"))).toBe(0);
	});

	it("takes the fewest groups across any-of members", () => {
		expect(captureCount(new AnyOfComparison([rx("(a)(b)"), rx("(c)")]))).toBe(2);
		expect(captureCount(new AnyOfComparison([rx("(a)"), new TextComparison("match", "b")]))).toBe(0);
		expect(captureCount(new AnyOfComparison([]))).toBe(0);
	});
});

describe("compileComparison", () => {
	it("builds the comparison for each key", () => {
		for (const key of ["match", "prefix", "suffix", "contains"] as const) {
			const cmp = expectOk(compileComparison(key, "a", false));
			expect(cmp).toBeInstanceOf(TextComparison);
			expect(cmp.key).toBe(key);
		}
		expect(expectOk(compileComparison("rxp", "a", false))).toBeInstanceOf(RegexComparison);
	});

	it("recognizes keys", () => {
		expect(isComparisonKey("rxp")).toBe(true);
		expect(isComparisonKey("equals")).toBe(false);
	});
});
