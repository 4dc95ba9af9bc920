/**
 * Tests for the built-in directives (src/directives/).
 */

import { describe, expect, it } from "vitest";

import { AnyOfComparison, RegexComparison, TextComparison } from "../src/comparison.ts";
import { ParseContext } from "../src/context.ts";
import { Debug, ProxyReply, When, With } from "../src/directives/index.ts";
import { describeExpr } from "../src/expr.ts";
import { Hook } from "../src/hook.ts";
import { expectErr, expectOk, makeConfig, yamlNode } from "./helpers/config.ts";

function load(text: string, hook: Hook = Hook.CREQ) {
	const cfg = makeConfig();
	return cfg.parseDirective(new ParseContext(hook), yamlNode(text));
}

describe("when", () => {
	it("resolves hook aliases", () => {
		const drtv = expectOk(load('when: preq\ndo:\n  debug: "x"\n', Hook.POST_LOAD));
		expect(drtv).toBeInstanceOf(When);
		expect(drtv instanceof When && drtv.hook).toBe(Hook.PREQ);
		expect(drtv.children()).toHaveLength(1);
	});

	it("requires a scalar hook name", () => {
		expect(expectErr(load("when: [ creq ]\ndo: { debug: 1 }\n")).messages()).toEqual([
			'Value for "when" at line 1, column 7 is not a hook name.',
		]);
	});
});

describe("with", () => {
	const rxp = (body: string) =>
		[
			"with: ua-req-path",
			"select:",
			'- match: "/"',
			"  do:",
			"    proxy-reply: 404",
			'- rxp: "^/v(\\\\d+)/(\\\\w+)"',
			"  do:",
			`    debug: ${body}`,
			"",
		].join("\n");

	it("compiles cases in order", () => {
		const drtv = expectOk(load(rxp('"{2}"')));
		expect(drtv).toBeInstanceOf(With);
		if (!(drtv instanceof With)) return;
		expect(describeExpr(drtv.expr)).toBe("{ua-req-path}");
		expect(drtv.ctxRef).toBe(true);
		expect(drtv.cases.map((c) => c.comparison?.key)).toEqual(["match", "rxp"]);
		expect(drtv.cases[0]?.comparison).toBeInstanceOf(TextComparison);
		expect(drtv.cases[0]?.directive).toBeInstanceOf(ProxyReply);
		const second = drtv.cases[1]?.comparison;
		expect(second instanceof RegexComparison && second.pattern).toBe("^/v(\\d+)/(\\w+)");
		expect(second instanceof RegexComparison && second.groupCount).toBe(2);
	});

	it("lets a case body use every group of its pattern", () => {
		const drtv = expectOk(load(rxp('"{0}-{1}-{2}"')));
		const body = drtv instanceof With ? drtv.cases[1]?.directive : undefined;
		expect(body).toBeInstanceOf(Debug);
		expect(body instanceof Debug && body.expr.maxArgIdx).toBe(2);
	});

	it("rejects a group the pattern does not have", () => {
		expect(expectErr(load(rxp('"{3}"'))).messages()).toEqual([
			"Regular expression capture group 3 used at line 8, column 12 but the maximum capture group is 2 in the active regular expression from line 6.",
		]);
	});

	it("counts group 0 when checking the limit", () => {
		const text = 'with: ua-req-path\nselect:\n- rxp: "^/(a)"\n  do:\n    debug: "{2}"\n';
		expect(expectErr(load(text)).messages()).toEqual([
			"Regular expression capture group 2 used at line 5, column 12 but the maximum capture group is 1 in the active regular expression from line 3.",
		]);
	});

	it("does not leak captures to other cases", () => {
		const text = [
			"with: ua-req-path",
			"select:",
			'- rxp: "^/(a)"',
			"- prefix: /b",
			"  do:",
			'    debug: "{1}"',
			"",
		].join("\n");
		expect(expectErr(load(text)).messages()).toEqual([
			"Regular expression capture group 1 used at line 6, column 12 but no regular expression is active.",
		]);
	});

	it("does not leak captures to the fallback", () => {
		const text = 'with: ua-req-path\nselect:\n- rxp: "(x)"\ndo:\n  debug: "{1}"\n';
		expect(expectErr(load(text)).messages()).toEqual([
			"Regular expression capture group 1 used at line 5, column 10 but no regular expression is active.",
		]);
	});

	it("compiles a fallback and catch-all case", () => {
		const drtv = expectOk(
			load('with: ua-req-path\nselect:\n- do: { debug: 1 }\ndo:\n  debug: "none"\n'),
		);
		expect(drtv instanceof With && drtv.cases[0]?.comparison).toBeNull();
		expect(drtv instanceof With && drtv.fallback).toBeInstanceOf(Debug);
		expect(drtv.children()).toHaveLength(2);
	});

	it("honors ignore-case", () => {
		const drtv = expectOk(
			load("with: ua-req-path\nselect:\n- prefix: /API\n  ignore-case: true\n  do: { debug: 1 }\n"),
		);
		const cmp = drtv instanceof With ? drtv.cases[0]?.comparison : undefined;
		expect(cmp?.matches("/api/users")).toBe(true);
	});

	it("requires a string value for string comparisons", () => {
		const errata = expectErr(load("with: ua-req-port\nselect:\n- match: 80\n"));
		expect(errata.messages()).toEqual([
			'Comparison "match" at line 3, column 3 requires a string but the value is integer.',
		]);
	});

	it("reports every bad case", () => {
		const errata = expectErr(
			load('with: ua-req-path\nselect:\n- equals: "/"\n- rxp: "(unclosed"\n- prefix: /\n'),
		);
		expect(errata.errorCount).toBe(2);
		expect(errata.messages()[0]).toBe(
			'Key "equals" at line 3, column 3 is not a comparison (expected one of match, prefix, suffix, contains, rxp, any-of).',
		);
		expect(errata.messages()[1]).toMatch(/^Invalid regular expression "\(unclosed": /);
	});

	it("compiles an any-of case", () => {
		const text = [
			"with: ua-req-path",
			"select:",
			"- any-of:",
			'  - match: "/"',
			"  - prefix: /index",
			"  do:",
			'    debug: "home"',
			"",
		].join("\n");
		const drtv = expectOk(load(text));
		const cmp = drtv instanceof With ? drtv.cases[0]?.comparison : undefined;
		expect(cmp).toBeInstanceOf(AnyOfComparison);
		expect(cmp instanceof AnyOfComparison && cmp.members.map((m) => m.key)).toEqual([
			"match",
			"prefix",
		]);
		expect(cmp?.matches("/index.html")).toBe(true);
		expect(cmp?.matches("/about")).toBe(false);
	});

	const anyOf = (second: string, body: string) =>
		[
			"with: ua-req-path",
			"select:",
			"- any-of:",
			'  - rxp: "^/(a)/(b)"',
			`  - ${second}`,
			"  do:",
			`    debug: ${body}`,
			"",
		].join("\n");

	it("limits any-of captures to the smallest member", () => {
		expectOk(load(anyOf('rxp: "^/(c)"', '"{1}"')));
		expect(expectErr(load(anyOf('rxp: "^/(c)"', '"{2}"'))).messages()[0]).toMatch(
			/^Regular expression capture group 2 used at line 7, column 12 but the maximum capture group is 1 in the active regular expression from line \d+\.$/,
		);
	});

	it("gives no captures to an any-of with a non-regex member", () => {
		expect(expectErr(load(anyOf("prefix: /c", '"{1}"'))).messages()).toEqual([
			"Regular expression capture group 1 used at line 7, column 12 but no regular expression is active.",
		]);
	});

	it("requires one comparison per any-of element", () => {
		const text = "with: ua-req-path\nselect:\n- any-of:\n  - prefix: /a\n    suffix: b\n";
		expect(expectErr(load(text)).messages()).toEqual([
			'Element of "any-of" at line 4, column 5 must be an object with exactly one comparison.',
		]);
	});

	it("rejects two comparisons in one case", () => {
		expect(expectErr(load("with: ua-req-path\nselect:\n- prefix: /a\n  suffix: b\n")).messages()).toEqual([
			"Case at line 3, column 3 has more than one comparison.",
		]);
	});

	it("needs cases or a fallback", () => {
		expect(expectErr(load("with: ua-req-path\n")).messages()).toEqual([
			'The "with" directive at line 1, column 1 has neither "select" nor "do".',
		]);
	});

	it("is not allowed on post-load", () => {
		expect(expectErr(load("with: ua-req-path\ndo: { debug: 1 }\n", Hook.POST_LOAD)).messages()).toEqual([
			'Directive "with" at line 1, column 1 is not allowed on hook "post-load".',
		]);
	});
});

describe("proxy-reply", () => {
	it("accepts a status", () => {
		const drtv = expectOk(load("proxy-reply: 503\n", Hook.PREQ));
		expect(drtv instanceof ProxyReply && describeExpr(drtv.expr)).toBe("503");
	});

	it("accepts a status and reason", () => {
		const drtv = expectOk(load('proxy-reply: [ 403, "Forbidden" ]\n', Hook.REMAP));
		expect(drtv instanceof ProxyReply && drtv.expr.resultType.toString()).toBe(
			"list[string|integer]",
		);
	});

	it("accepts a status computed per transaction", () => {
		expectOk(load("proxy-reply: ua-req-port\n"));
	});

	it("rejects other types", () => {
		expect(expectErr(load('proxy-reply: "{ua-req-path}"\n')).messages()).toEqual([
			'Value for "proxy-reply" at line 1, column 14 must be a status or a [ status, reason ] list, not string.',
		]);
	});

	it("rejects a status out of range", () => {
		expect(expectErr(load("proxy-reply: 99\n")).messages()).toEqual([
			'Status 99 for "proxy-reply" at line 1, column 14 is not in the range 100..599.',
		]);
		expect(expectErr(load('proxy-reply: [ 600, "Gone" ]\n')).messages()).toEqual([
			'Status 600 for "proxy-reply" at line 1, column 14 is not in the range 100..599.',
		]);
	});

	it("is limited to request hooks", () => {
		expect(expectErr(load("proxy-reply: 404\n", Hook.URSP)).messages()).toEqual([
			'Directive "proxy-reply" at line 1, column 1 is not allowed on hook "upstream-rsp".',
		]);
	});
});

describe("debug", () => {
	it("is allowed everywhere", () => {
		for (const hook of [Hook.POST_LOAD, Hook.TXN_START, Hook.MSG]) {
			expect(expectOk(load('debug: "{env<REGION>}"\n', hook))).toBeInstanceOf(Debug);
		}
	});
});
