/**
 * Compiler instance for one configuration.
 *
 * A Config owns the arena that compiled strings live in, per-instance
 * runtime records for every registered directive type, and the root
 * directive lists per hook. Loading is a single synchronous pass; after it
 * the Config is only read.
 *
 *   const cfg = new Config({ directives, extractors, modifiers });
 *   const root = parseYamlText(text);
 *   const loaded = root.andThen((node) => cfg.parseYaml(node, "txn_box", Hook.POST_LOAD));
 *   if (loaded.isErr()) console.error(loaded.error.toString());
 *   cfg.roots(Hook.CREQ);
 */

import { type Result, err, ok } from "neverthrow";

import { Arena, ArenaView } from "./arena.ts";
import { ParseContext } from "./context.ts";
import {
	DO_KEY,
	type Directive,
	type DirectiveInfo,
	DirectiveList,
	type DirectiveRegistry,
	DirectiveRtti,
	NilDirective,
} from "./directive.ts";
import { WHEN_KEY, When, defaultDirectives } from "./directives/index.ts";
import { Errata, fail } from "./errata.ts";
import type { Expr } from "./expr.ts";
import { parseExpr } from "./expr-compiler.ts";
import { ExtractorRegistry, parseArg } from "./extractor.ts";
import { HOOKS, Hook, HookName, maskAllows } from "./hook.ts";
import { type Logger, logger } from "./logger.ts";
import { ModifierRegistry } from "./modifier.ts";
import type { CfgNode } from "./node.ts";
import { type Feature, listFeature, stringFeature } from "./types.ts";

/** Key path meaning "the root node itself". */
export const ROOT_PATH = ".";

export interface ConfigOptions {
	/** Directive types. Frozen by the constructor. Defaults to the built-ins. */
	readonly directives?: DirectiveRegistry;
	readonly extractors?: ExtractorRegistry;
	readonly modifiers?: ModifierRegistry;
	readonly logger?: Logger;
	readonly arenaChunkSize?: number;
}

type Finalizer = () => void;

export class Config {
	readonly directives: DirectiveRegistry;
	readonly extractors: ExtractorRegistry;
	readonly modifiers: ModifierRegistry;
	readonly arena: Arena;

	private readonly log: Logger;
	private readonly rtti: DirectiveRtti[];
	private readonly rootLists: Directive[][];
	private readonly finalizers: Finalizer[] = [];
	private topLevel = false;
	private closed = false;

	constructor(options: ConfigOptions = {}) {
		this.directives = options.directives ?? defaultDirectives();
		this.extractors = options.extractors ?? ExtractorRegistry.EMPTY;
		this.modifiers = options.modifiers ?? ModifierRegistry.EMPTY;
		this.arena = new Arena(options.arenaChunkSize);
		this.log = (options.logger ?? logger).child({ component: "config" });

		this.directives.freeze();
		this.rtti = this.directives.infos().map((info) => new DirectiveRtti(info));
		this.rootLists = HOOKS.map((): Directive[] => []);
	}

	// -- Interning -----------------------------------------------------------

	/** Copy text into the arena. */
	localize(text: string | ArenaView | Uint8Array): ArenaView;
	/** Intern every string in a feature. */
	localize(feature: Feature): Feature;
	localize(value: string | ArenaView | Uint8Array | Feature): ArenaView | Feature {
		if (typeof value === "string" || value instanceof Uint8Array) {
			return this.arena.localize(value);
		}
		if (value instanceof ArenaView) {
			return value.arena === this.arena && value.generation === this.arena.generation
				? value
				: this.arena.localize(value.bytes());
		}
		switch (value.kind) {
			case "string":
				return stringFeature(this.localize(value.text), value.literal);
			case "list":
				return listFeature(value.items.map((item) => this.localize(item)));
			case "nil":
			case "integer":
			case "boolean":
			case "ip":
				return value;
		}
	}

	// -- Directive type information -----------------------------------------

	/** This Config's record for a directive type. */
	drtvInfo(name: string): DirectiveRtti | undefined {
		const info = this.directives.find(name);
		return info !== undefined ? this.rtti[info.idx] : undefined;
	}

	/** Root directives attached to `hook`. */
	roots(hook: Hook): readonly Directive[] {
		return this.rootLists[hook] ?? [];
	}

	/** True if a directive was attached to any hook other than post-load. */
	get hasTopLevelDirective(): boolean {
		return this.topLevel;
	}

	// -- Compilation ---------------------------------------------------------

	parseExpr(ctx: ParseContext, node: CfgNode): Result<Expr, Errata> {
		return parseExpr(this, ctx, node);
	}

	/**
	 * Load a directive from a map. The first key that names a registered
	 * directive type selects the loader; other keys are left to it.
	 */
	loadDirective(ctx: ParseContext, node: CfgNode): Result<Directive, Errata> {
		if (!node.isMap()) {
			return fail(`Directive at ${node.mark} is not an object as required.`);
		}
		for (const entry of node.entries()) {
			const parsed = parseArg(entry.key);
			if (parsed.isErr()) {
				return err(parsed.error.info(`While parsing directive key at ${entry.keyNode.mark}.`));
			}
			const { name, arg } = parsed.value;
			if (name === DO_KEY) continue;

			const info = this.directives.find(name);
			if (info === undefined) continue;
			return this.invoke(ctx, node, info, name, arg, entry.value);
		}
		return fail(`Directive at ${node.mark} has no recognized tag.`);
	}

	/** Check the hook, initialize the type on first use, then load. */
	private invoke(
		ctx: ParseContext,
		node: CfgNode,
		info: DirectiveInfo,
		name: string,
		arg: string | null,
		value: CfgNode,
	): Result<Directive, Errata> {
		const rtti = this.rtti[info.idx];
		if (rtti === undefined) {
			return fail(`Directive "${name}" is not registered with this configuration.`);
		}

		if (!maskAllows(info.hookMask, ctx.hook)) {
			return fail(
				`Directive "${name}" at ${node.mark} is not allowed on hook "${HookName.name(ctx.hook)}".`,
			);
		}

		if (rtti.count === 0) {
			const init = info.typeInit(this);
			if (init.isErr()) {
				return err(init.error.info(`While initializing directive type "${name}".`));
			}
			this.log.debug({ directive: name }, "directive type initialized");
		}
		rtti.count += 1;

		const loaded = info.load(this, ctx, { node, key: name, arg, value });
		if (loaded.isErr()) {
			return err(loaded.error.info(`While parsing directive at ${node.mark}.`));
		}
		loaded.value.rtti = rtti;
		return ok(loaded.value);
	}

	/** Map, sequence of maps, or null. */
	parseDirective(ctx: ParseContext, node: CfgNode): Result<Directive, Errata> {
		if (node.isMap()) {
			return this.loadDirective(ctx, node);
		}
		if (node.isSequence()) {
			const list: Directive[] = [];
			for (const child of node.items()) {
				const loaded = this.loadDirective(ctx, child);
				if (loaded.isErr()) {
					return err(loaded.error.info(`While loading directives at ${node.mark}.`));
				}
				list.push(loaded.value);
			}
			return ok(new DirectiveList(list));
		}
		if (node.isNull()) {
			return ok(new NilDirective());
		}
		return fail(`Directive at ${node.mark} is not an object or a sequence as required.`);
	}

	/**
	 * Load the directives at `keyPath` under `root`.
	 *
	 * For every hook except remap each top level directive must be a `when`
	 * whose inner directive is attached to the hook it names. For remap the
	 * directives are attached to the remap hook as they are.
	 */
	parseYaml(
		root: CfgNode,
		keyPath: string = ROOT_PATH,
		hook: Hook = Hook.POST_LOAD,
	): Result<void, Errata> {
		let base = root;
		if (keyPath !== ROOT_PATH && keyPath !== "") {
			const segments = keyPath.split(".");
			for (const [i, key] of segments.entries()) {
				const next = base.get(key);
				if (next === undefined) {
					const missing = segments.slice(0, i + 1).join(".");
					return fail(`Key "${keyPath}" not found - no such key "${missing}".`);
				}
				base = next;
			}
		}

		const remap = hook === Hook.REMAP;
		const ctx = new ParseContext(remap ? Hook.REMAP : Hook.POST_LOAD);
		const loader = remap
			? (node: CfgNode) => this.loadRemapDirective(ctx, node)
			: (node: CfgNode) => this.loadTopLevelDirective(ctx, node);

		let result: Result<void, Errata>;
		if (base.isSequence()) {
			const errata = new Errata();
			for (const child of base.items()) {
				const loaded = loader(child);
				if (loaded.isErr()) errata.note(loaded.error);
			}
			result = errata.isOk()
				? ok(undefined)
				: err(
						errata.info(
							`While loading list of top level directives for "${keyPath}" at ${base.mark}.`,
						),
					);
		} else if (base.isMap()) {
			result = loader(base);
		} else if (base.isNull()) {
			result = ok(undefined);
		} else {
			result = fail(
				`Configuration at ${base.mark} for "${keyPath}" is not a directive or a list of directives.`,
			);
		}

		if (result.isOk()) {
			this.log.debug(
				{
					keyPath,
					hook: HookName.name(hook),
					roots: Object.fromEntries(
						HOOKS.filter((h) => this.roots(h).length > 0).map((h) => [
							HookName.name(h),
							this.roots(h).length,
						]),
					),
				},
				"configuration loaded",
			);
		}
		return result;
	}

	private loadTopLevelDirective(ctx: ParseContext, node: CfgNode): Result<void, Errata> {
		if (!node.isMap()) {
			return fail(`Top level directive at ${node.mark} is not an object as required.`);
		}
		const entry = node.entries().find((e) => e.key === WHEN_KEY);
		const info = this.directives.find(WHEN_KEY);
		if (entry === undefined || info === undefined) {
			return fail(
				`Top level directive at ${node.mark} is not a "${WHEN_KEY}" directive as required.`,
			);
		}
		const loaded = this.invoke(ctx, node, info, WHEN_KEY, null, entry.value);
		if (loaded.isErr()) return err(loaded.error);
		const when = loaded.value;
		if (!(when instanceof When)) {
			return fail(
				`Top level directive at ${node.mark} is not a "${WHEN_KEY}" directive as required.`,
			);
		}

		this.rootLists[when.hook]?.push(when.directive);
		if (when.hook !== Hook.POST_LOAD) {
			this.topLevel = true;
		}
		this.log.debug({ hook: HookName.name(when.hook), at: String(node.mark) }, "top level directive");
		return ok(undefined);
	}

	/** Remap directives keep any `when` for evaluation time. */
	private loadRemapDirective(ctx: ParseContext, node: CfgNode): Result<void, Errata> {
		if (!node.isMap()) {
			return fail(`Configuration at ${node.mark} is not a directive object as required.`);
		}
		const loaded = this.parseDirective(ctx, node);
		if (loaded.isErr()) return err(loaded.error);
		this.rootLists[Hook.REMAP]?.push(loaded.value);
		this.topLevel = true;
		return ok(undefined);
	}

	// -- Lifetime ------------------------------------------------------------

	/** Run `fn` when the Config is closed. Finalizers run in registration order. */
	markForCleanup(fn: Finalizer): void {
		if (this.closed) {
			throw new Error("cannot add a finalizer to a closed Config");
		}
		this.finalizers.push(fn);
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Run finalizers and release the arena. Every finalizer runs even if an
	 * earlier one throws; the failures are rethrown together afterwards.
	 */
	close(): void {
		if (this.closed) return;
		this.closed = true;

		const failures: unknown[] = [];
		for (const fn of this.finalizers) {
			try {
				fn();
			} catch (e) {
				failures.push(e);
			}
		}
		this.finalizers.length = 0;
		this.arena.clear();

		if (failures.length > 0) {
			throw new AggregateError(failures, `${failures.length} finalizer(s) failed`);
		}
	}
}
