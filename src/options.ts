/**
 * Loading a configuration from text or a file in one call.
 *
 *   const loaded = loadFile("txn_box.yaml", { keyPath: "txn_box" });
 *   if (loaded.isErr()) {
 *     console.error(loaded.error.toString());
 *     process.exit(1);
 *   }
 *   const cfg = loaded.value;
 */

import { readFileSync } from "node:fs";

import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import { Config, type ConfigOptions, ROOT_PATH } from "./config.ts";
import { Errata, fail } from "./errata.ts";
import { HookName } from "./hook.ts";
import { logger } from "./logger.ts";
import { parseYamlText } from "./node.ts";

export const LoadOptionsSchema = z.object({
	/** Dotted path of the node holding the directives. */
	keyPath: z.string().default(ROOT_PATH),
	/** `remap` selects the remap loader; any other hook the top level loader. */
	hook: z
		.string()
		.default("post-load")
		.refine((name) => HookName.has(name), {
			message: `unknown hook name (expected one of ${HookName.names().join(", ")})`,
		})
		.transform((name) => HookName.value(name)),
	/** Name used in diagnostics. */
	filename: z.string().nullable().default(null),
});

export type LoadOptions = z.input<typeof LoadOptionsSchema>;
export type ResolvedLoadOptions = z.output<typeof LoadOptionsSchema>;

export function resolveLoadOptions(options: LoadOptions): Result<ResolvedLoadOptions, Errata> {
	const parsed = LoadOptionsSchema.safeParse(options);
	if (!parsed.success) {
		const errata = new Errata();
		for (const issue of parsed.error.issues) {
			const at = issue.path.length > 0 ? issue.path.join(".") : "options";
			errata.note(new Errata(`Invalid load option "${at}": ${issue.message}.`));
		}
		return err(errata);
	}
	return ok(parsed.data);
}

/**
 * Compile YAML text into a new Config. On failure the Config is closed and
 * the diagnostics returned.
 */
export function compileText(
	text: string,
	options: LoadOptions = {},
	configOptions: ConfigOptions = {},
): Result<Config, Errata> {
	const resolved = resolveLoadOptions(options);
	if (resolved.isErr()) return err(resolved.error);
	const { keyPath, hook, filename } = resolved.value;

	const root = parseYamlText(text, filename);
	if (root.isErr()) return err(root.error);

	const log = configOptions.logger ?? logger;
	for (const warning of root.value.source.warnings) {
		log.warn({ filename }, warning);
	}

	const cfg = new Config(configOptions);
	const loaded = cfg.parseYaml(root.value, keyPath, hook);
	if (loaded.isOk()) {
		return ok(cfg);
	}

	const errata = loaded.error;
	try {
		cfg.close();
	} catch (e) {
		errata.info(`While releasing the configuration: ${e instanceof Error ? e.message : String(e)}`);
	}
	return err(errata);
}

/** Read `path` and compile it. The path is the default diagnostic filename. */
export function loadFile(
	path: string,
	options: LoadOptions = {},
	configOptions: ConfigOptions = {},
): Result<Config, Errata> {
	let text: string;
	try {
		text = readFileSync(path, "utf-8");
	} catch (e) {
		return fail(`Unable to read "${path}": ${e instanceof Error ? e.message : String(e)}`);
	}
	return compileText(text, { filename: path, ...options }, configOptions);
}
