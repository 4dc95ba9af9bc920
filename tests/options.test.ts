/**
 * Tests for one-call loading (src/options.ts).
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ok } from "neverthrow";
import pino from "pino";
import { afterAll, describe, expect, it } from "vitest";

import { DirectiveRegistry, NilDirective } from "../src/directive.ts";
import { registerBuiltins } from "../src/directives/index.ts";
import { ALL_HOOKS, Hook } from "../src/hook.ts";
import { compileText, loadFile, resolveLoadOptions } from "../src/options.ts";
import { testExtractors, testModifiers } from "../src/testing.ts";
import { TEST_ENV, expectErr, expectOk } from "./helpers/config.ts";

const quiet = pino({ level: "silent" });
const configOptions = () => ({
	extractors: testExtractors(TEST_ENV),
	modifiers: testModifiers(),
	logger: quiet,
});

const CONFIG = [
	"txn_box:",
	"- when: ua-req",
	"  do:",
	'  - debug: "{ua-req-path}"',
	"  - proxy-reply: 404",
	"",
].join("\n");

describe("resolveLoadOptions", () => {
	it("fills in defaults", () => {
		expect(expectOk(resolveLoadOptions({}))).toEqual({
			keyPath: ".",
			hook: Hook.POST_LOAD,
			filename: null,
		});
	});

	it("resolves hook names", () => {
		expect(expectOk(resolveLoadOptions({ hook: "remap" })).hook).toBe(Hook.REMAP);
		expect(expectOk(resolveLoadOptions({ hook: "CREQ" })).hook).toBe(Hook.CREQ);
	});

	it("rejects an unknown hook", () => {
		expect(expectErr(resolveLoadOptions({ hook: "nowhere" })).messages()).toEqual([
			'Invalid load option "hook": unknown hook name (expected one of post-load, txn-open, ua-req, proxy-req, upstream-rsp, proxy-rsp, pre-remap, post-remap, txn-close, remap, msg).',
		]);
	});
});

describe("compileText", () => {
	it("compiles the directives at the key path", () => {
		const cfg = expectOk(compileText(CONFIG, { keyPath: "txn_box" }, configOptions()));
		expect(cfg.roots(Hook.CREQ)[0]?.children()).toHaveLength(2);
		expect(cfg.hasTopLevelDirective).toBe(true);
	});

	it("selects the remap loader", () => {
		const text = "- when: proxy-rsp\n  do:\n    debug: 1\n";
		const cfg = expectOk(compileText(text, { hook: "remap" }, configOptions()));
		expect(cfg.roots(Hook.REMAP)).toHaveLength(1);
		expect(cfg.roots(Hook.PRSP)).toHaveLength(0);
	});

	it("names the file in positions", () => {
		const errata = expectErr(
			compileText("when: creq\ndo:\n  debug: nope\n", { filename: "rules.yaml" }, configOptions()),
		);
		expect(errata.notes.map((n) => n.text)).toContain(
			"While parsing feature expression at rules.yaml line 3, column 10.",
		);
	});

	it("reports YAML syntax errors", () => {
		const errata = expectErr(compileText("txn_box: [\n", { filename: "broken.yaml" }, configOptions()));
		expect(errata.notes.at(-1)?.text).toBe("While parsing YAML in broken.yaml.");
	});

	it("closes the Config when loading fails", () => {
		const released: string[] = [];
		const directives = registerBuiltins(new DirectiveRegistry());
		directives.define(
			"tracked",
			ALL_HOOKS,
			() => ok(new NilDirective()),
			(cfg) => {
				cfg.markForCleanup(() => released.push("released"));
				return ok(undefined);
			},
		);
		const text = "- when: creq\n  do: { tracked: 1 }\n- when: creq\n  do: { debug: nope }\n";
		expectErr(compileText(text, {}, { ...configOptions(), directives }));
		expect(released).toEqual(["released"]);
	});
});

describe("loadFile", () => {
	const dir = mkdtempSync(join(tmpdir(), "tollbooth-"));
	afterAll(() => rmSync(dir, { recursive: true, force: true }));

	it("loads a file", () => {
		const path = join(dir, "txn_box.yaml");
		writeFileSync(path, CONFIG);
		const cfg = expectOk(loadFile(path, { keyPath: "txn_box" }, configOptions()));
		expect(cfg.roots(Hook.CREQ)).toHaveLength(1);
	});

	it("uses the path in positions", () => {
		const path = join(dir, "bad.yaml");
		writeFileSync(path, "when: creq\ndo:\n  debug: nope\n");
		const errata = expectErr(loadFile(path, {}, configOptions()));
		expect(errata.notes.map((n) => n.text)).toContain(
			`While parsing feature expression at ${path} line 3, column 10.`,
		);
	});

	it("reports a missing file", () => {
		const path = join(dir, "missing.yaml");
		const errata = expectErr(loadFile(path, {}, configOptions()));
		expect(errata.messages()[0]?.startsWith(`Unable to read "${path}": `)).toBe(true);
	});
});
