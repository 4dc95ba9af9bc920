/**
 * Modifiers: post-processing steps chained onto an expression.
 *
 * A modifier is written as a single-key map after the base expression:
 *
 *   [ "{ua-req-path}", { suffix<.html>: }, { as-integer: 0 } ]
 *
 * Each loader sees the type the chain produces so far and rejects inputs it
 * cannot handle; the loaded modifier reports the type it produces.
 */

import { type Result, err } from "neverthrow";

import type { Config } from "./config.ts";
import type { ParseContext } from "./context.ts";
import { type Errata, fail } from "./errata.ts";
import { parseArg } from "./extractor.ts";
import type { CfgNode } from "./node.ts";
import type { ActiveType } from "./types.ts";

export interface Modifier {
	readonly name: string;
	resultType(input: ActiveType): ActiveType;
}

export interface ModifierLoad {
	/** The whole modifier map. */
	readonly node: CfgNode;
	readonly key: string;
	readonly arg: string | null;
	readonly value: CfgNode;
	/** Result type of the chain before this modifier. */
	readonly inputType: ActiveType;
}

export type ModifierLoader = (
	cfg: Config,
	ctx: ParseContext,
	load: ModifierLoad,
) => Result<Modifier, Errata>;

export class DuplicateModifierError extends Error {
	constructor(readonly modifierName: string) {
		super(`modifier "${modifierName}" is already registered`);
		this.name = "DuplicateModifierError";
	}
}

export class ModifierRegistryBuilder {
	private readonly loaders = new Map<string, ModifierLoader>();

	modifier(name: string, loader: ModifierLoader): this {
		if (this.loaders.has(name)) {
			throw new DuplicateModifierError(name);
		}
		this.loaders.set(name, loader);
		return this;
	}

	build(): ModifierRegistry {
		return new ModifierRegistry(new Map(this.loaders));
	}
}

export class ModifierRegistry {
	static readonly EMPTY = new ModifierRegistry(new Map());

	private readonly loaders: ReadonlyMap<string, ModifierLoader>;

	constructor(loaders: Map<string, ModifierLoader>) {
		this.loaders = loaders;
		Object.freeze(this);
	}

	get size(): number {
		return this.loaders.size;
	}

	names(): string[] {
		return [...this.loaders.keys()].sort();
	}

	/**
	 * Load the modifier described by `node`. The first key naming a
	 * registered modifier selects it.
	 */
	load(
		cfg: Config,
		ctx: ParseContext,
		node: CfgNode,
		inputType: ActiveType,
	): Result<Modifier, Errata> {
		if (!node.isMap()) {
			return fail(`Modifier at ${node.mark} is not an object as required.`);
		}
		for (const entry of node.entries()) {
			const parsed = parseArg(entry.key);
			if (parsed.isErr()) {
				return err(parsed.error.info(`While parsing modifier key at ${entry.keyNode.mark}.`));
			}
			const { name, arg } = parsed.value;
			const loader = this.loaders.get(name);
			if (loader === undefined) continue;

			const result = loader(cfg, ctx, { node, key: name, arg, value: entry.value, inputType });
			if (result.isErr()) {
				return err(result.error.info(`While loading modifier "${name}" at ${node.mark}.`));
			}
			return result;
		}
		const known = this.names();
		return fail(
			known.length > 0
				? `Modifier at ${node.mark} has no recognized key (registered: ${known.join(", ")}).`
				: `Modifier at ${node.mark} has no recognized key (no modifiers are registered).`,
		);
	}
}
