/**
 * Tests for the YAML node surface and Errata rendering.
 */

import { describe, expect, it } from "vitest";

import { Errata, Mark } from "../src/errata.ts";
import { PLAIN_TAG, QUOTED_TAG, parseYamlText } from "../src/node.ts";
import { expectErr, yamlNode } from "./helpers/config.ts";

describe("CfgNode", () => {
	it("keeps scalar text as written", () => {
		const root = yamlNode("port: 0x1F\nflag: yes\n");
		expect(root.get("port")?.scalar).toBe("0x1F");
		expect(root.get("flag")?.scalar).toBe("yes");
	});

	it("tags plain and quoted scalars differently", () => {
		const root = yamlNode("a: plain\nb: \"double\"\nc: 'single'\n");
		expect(root.get("a")?.tag).toBe(PLAIN_TAG);
		expect(root.get("b")?.tag).toBe(QUOTED_TAG);
		expect(root.get("c")?.tag).toBe(QUOTED_TAG);
	});

	it("reports explicit tags", () => {
		expect(yamlNode("!literal text").tag).toBe("!literal");
	});

	it("distinguishes missing keys from empty values", () => {
		const root = yamlNode("empty:\ntilde: ~\nquoted: \"\"\n");
		expect(root.get("missing")).toBeUndefined();
		expect(root.get("empty")?.isNull()).toBe(true);
		expect(root.get("tilde")?.isNull()).toBe(true);
		expect(root.get("quoted")?.isNull()).toBe(false);
		expect(root.get("quoted")?.isScalar()).toBe(true);
	});

	it("walks sequences and maps in source order", () => {
		const root = yamlNode("- b: 1\n  a: 2\n- c\n");
		expect(root.isSequence()).toBe(true);
		expect(root.size).toBe(2);
		expect(root.at(0)?.entries().map((e) => e.key)).toEqual(["b", "a"]);
		expect(root.at(1)?.scalar).toBe("c");
		expect(root.at(2)).toBeUndefined();
	});

	it("resolves aliases", () => {
		const root = yamlNode("base: &b ua-req-path\ncopy: *b\n");
		expect(root.get("copy")?.scalar).toBe("ua-req-path");
	});

	it("marks positions from 1", () => {
		const root = yamlNode("first: 1\nsecond:\n  inner: 2\n", "cfg.yaml");
		expect(root.mark.toString()).toBe("cfg.yaml line 1, column 1");
		expect(root.get("second")?.get("inner")?.mark.toString()).toBe("cfg.yaml line 3, column 10");
	});
});

describe("parseYamlText", () => {
	it("reports syntax errors with the file name", () => {
		const errata = expectErr(parseYamlText("key: [unclosed\n", "bad.yaml"));
		expect(errata.errorCount).toBeGreaterThan(0);
		expect(errata.notes.at(-1)).toEqual({ level: "info", text: "While parsing YAML in bad.yaml." });
	});

	it("does not warn about custom tags", () => {
		const parsed = parseYamlText("value: !literal text\n");
		expect(parsed.isOk() && parsed.value.source.warnings).toEqual([]);
	});
});

describe("Errata", () => {
	it("renders the failure first and context indented", () => {
		const errata = new Errata("Extractor \"nope\" not found.")
			.info("While parsing feature expression at line 2, column 5.")
			.info("While parsing directive at line 2, column 3.");
		expect(errata.toString()).toBe(
			[
				'Extractor "nope" not found.',
				"  While parsing feature expression at line 2, column 5.",
				"  While parsing directive at line 2, column 3.",
			].join("\n"),
		);
	});

	it("counts merged failures", () => {
		const errata = new Errata().note(new Errata("one").info("ctx")).note(new Errata("two"));
		expect(errata.errorCount).toBe(2);
		expect(errata.messages()).toEqual(["one", "two"]);
		expect(errata.isOk()).toBe(false);
		expect(new Errata().isOk()).toBe(true);
	});

	it("renders marks without a source", () => {
		expect(new Mark(4, 2).toString()).toBe("line 4, column 2");
	});
});
