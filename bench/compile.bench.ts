/**
 * Compile benchmarks.
 *
 * Measures expression compilation and whole-configuration loading at a few
 * rule counts.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";
import pino from "pino";

import {
	Config,
	Hook,
	ParseContext,
	type CfgNode,
	compileText,
	parseExpr,
	parseYamlText,
} from "../src/index.ts";
import { testExtractors, testModifiers } from "../src/testing.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const options = {
	extractors: testExtractors({ REGION: "bench-region" }),
	modifiers: testModifiers(),
	logger: pino({ level: "silent" }),
};

function node(text: string): CfgNode {
	const parsed = parseYamlText(text);
	if (parsed.isErr()) throw new Error(parsed.error.toString());
	return parsed.value;
}

function rules(n: number): string {
	const lines = ["txn_box:", "- when: ua-req", "  do:", "  - with: ua-req-path", "    select:"];
	for (let i = 0; i < n; i++) {
		lines.push(`    - rxp: "^/route/${i}/(\\\\d+)$"`);
		lines.push("      do:");
		lines.push(`      - debug: "route ${i} item {1} in {env<REGION>}"`);
	}
	return `${lines.join("\n")}\n`;
}

// ── Expressions ──────────────────────────────────────────────────────────────

const plain = node("ua-req-path");
const composite = node('"{ua-req-path}?region={env<REGION>}"');
const chained = node('[ "{ua-req-path}", { lower: }, { as-integer: 0 } ]');

summary(() => {
	const cfg = new Config(options);
	const ctx = new ParseContext(Hook.CREQ);
	bench("expr_extractor", () => parseExpr(cfg, ctx, plain));
	bench("expr_composite", () => parseExpr(cfg, ctx, composite));
	bench("expr_modifier_chain", () => parseExpr(cfg, ctx, chained));
});

// ── Whole configurations ─────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 50, 100]) {
		const text = rules(n);
		bench(`load_${n}_rxp_cases`, () => {
			const loaded = compileText(text, { keyPath: "txn_box" }, options);
			if (loaded.isErr()) throw new Error(loaded.error.toString());
			loaded.value.close();
		});
	}
});

await run();
