import type { Result } from "neverthrow";

import { Config, type ConfigOptions } from "../../src/config.ts";
import type { Errata } from "../../src/errata.ts";
import { type CfgNode, parseYamlText } from "../../src/node.ts";
import { testExtractors, testModifiers } from "../../src/testing.ts";

export const TEST_ENV: Readonly<Record<string, string>> = {
	HOME: "/home/test",
	REGION: "test-region",
};

/** Root node of `text`; throws on YAML syntax errors. */
export function yamlNode(text: string, filename: string | null = null): CfgNode {
	const parsed = parseYamlText(text, filename);
	if (parsed.isErr()) {
		throw new Error(parsed.error.toString());
	}
	return parsed.value;
}

/** Config with the test extractors and modifiers. */
export function makeConfig(options: ConfigOptions = {}): Config {
	return new Config({
		extractors: testExtractors(TEST_ENV),
		modifiers: testModifiers(),
		...options,
	});
}

export function expectOk<T>(result: Result<T, Errata>): T {
	if (result.isErr()) {
		throw new Error(`expected success, got:\n${result.error.toString()}`);
	}
	return result.value;
}

export function expectErr<T>(result: Result<T, Errata>): Errata {
	if (result.isOk()) {
		throw new Error("expected failure, got success");
	}
	return result.error;
}
