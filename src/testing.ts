import { type Result, ok } from "neverthrow";

import type { Config } from "./config.ts";
import { type Errata, fail } from "./errata.ts";
import {
	type Extractor,
	ExtractorRegistryBuilder,
	type ExtractorRegistry,
	type ExtractorSpec,
} from "./extractor.ts";
import {
	type Modifier,
	type ModifierLoader,
	type ModifierRegistry,
	ModifierRegistryBuilder,
} from "./modifier.ts";
import {
	ActiveType,
	type Feature,
	NIL_FEATURE,
	ValueKind,
	parseIntegerLiteral,
	stringFeature,
	textOf,
} from "./types.ts";

/**
 * Extractor that reads the live transaction. Tests and examples only: it
 * has nothing to read at load time, so extract() yields NULL.
 */
export class TxnExtractor implements Extractor {
	constructor(
		readonly name: string,
		readonly kind: ValueKind,
		/** Whether `name<arg>` is required, forbidden, or either. */
		readonly argument: "required" | "forbidden" | "optional" = "forbidden",
	) {}

	validate(_cfg: Config, _spec: ExtractorSpec, arg: string | null): Result<ActiveType, Errata> {
		if (this.argument === "required" && arg === null) {
			return fail(`Extractor "${this.name}" requires an argument.`);
		}
		if (this.argument === "forbidden" && arg !== null) {
			return fail(`Extractor "${this.name}" does not take an argument.`);
		}
		return ok(ActiveType.of(this.kind));
	}

	extract(): Feature {
		return NIL_FEATURE;
	}

	hasCtxRef(): boolean {
		return true;
	}
}

/** `env<NAME>`: a variable from a fixed environment, constant at load time. */
export class EnvExtractor implements Extractor {
	readonly name = "env";

	constructor(private readonly env: Readonly<Record<string, string>>) {}

	validate(_cfg: Config, _spec: ExtractorSpec, arg: string | null): Result<ActiveType, Errata> {
		if (arg === null || arg.length === 0) {
			return fail(`Extractor "${this.name}" requires a variable name argument.`);
		}
		return ok(ActiveType.of(ValueKind.STRING).withCfgConst());
	}

	extract(_cfg: Config, spec: ExtractorSpec): Feature {
		const key = spec.arg !== null ? textOf(spec.arg) : "";
		return stringFeature(this.env[key] ?? "");
	}

	hasCtxRef(): boolean {
		return false;
	}
}

/** Lower-cases a string; rejects inputs that cannot be a string. */
export class LowerModifier implements Modifier {
	readonly name = "lower";

	resultType(input: ActiveType): ActiveType {
		return input;
	}
}

/** Converts to an integer, with a default for values that do not convert. */
export class AsIntegerModifier implements Modifier {
	readonly name = "as-integer";

	constructor(readonly defaultValue: number | null) {}

	resultType(input: ActiveType): ActiveType {
		return ActiveType.of(ValueKind.INTEGER).withCfgConst(input.isCfgConst());
	}
}

const loadLower: ModifierLoader = (_cfg, _ctx, { node, inputType }) => {
	if (!inputType.has(ValueKind.STRING)) {
		return fail(`Modifier "lower" at ${node.mark} requires a string but the value is ${inputType}.`);
	}
	return ok(new LowerModifier());
};

const loadAsInteger: ModifierLoader = (_cfg, _ctx, { node, value, inputType }) => {
	if (!inputType.hasAny(ValueKind.STRING | ValueKind.INTEGER)) {
		return fail(
			`Modifier "as-integer" at ${node.mark} requires a string or integer but the value is ${inputType}.`,
		);
	}
	if (value.isNull()) {
		return ok(new AsIntegerModifier(null));
	}
	const n = value.isScalar() ? parseIntegerLiteral(value.scalar) : null;
	if (n === null) {
		return fail(`Default for "as-integer" at ${value.mark} is not an integer.`);
	}
	return ok(new AsIntegerModifier(n));
};

/**
 * Register the test extractors:
 *
 * | name                  | type    | argument |
 * |-----------------------|---------|----------|
 * | ua-req-path           | string  | no       |
 * | ua-req-field<name>    | string  | required |
 * | ua-req-port           | integer | no       |
 * | inbound-addr-remote   | ip      | no       |
 * | env<NAME>             | string, constant | required |
 */
export function registerExtractors(
	builder: ExtractorRegistryBuilder,
	env: Readonly<Record<string, string>> = {},
): ExtractorRegistryBuilder {
	return builder
		.extractor(new TxnExtractor("ua-req-path", ValueKind.STRING))
		.extractor(new TxnExtractor("ua-req-field", ValueKind.STRING, "required"))
		.extractor(new TxnExtractor("ua-req-port", ValueKind.INTEGER))
		.extractor(new TxnExtractor("inbound-addr-remote", ValueKind.IP))
		.extractor(new EnvExtractor(env));
}

/** Register the test modifiers `lower` and `as-integer`. */
export function registerModifiers(builder: ModifierRegistryBuilder): ModifierRegistryBuilder {
	return builder.modifier("lower", loadLower).modifier("as-integer", loadAsInteger);
}

export function testExtractors(env: Readonly<Record<string, string>> = {}): ExtractorRegistry {
	return registerExtractors(new ExtractorRegistryBuilder(), env).build();
}

export function testModifiers(): ModifierRegistry {
	return registerModifiers(new ModifierRegistryBuilder()).build();
}
