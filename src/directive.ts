/**
 * Directive types and the process-wide directive registry.
 *
 * Every directive type is registered once, before any configuration is
 * compiled, with the hooks it may run on, a loader, and an optional type
 * initializer. The first Config constructed from a registry freezes it.
 *
 *   const directives = new DirectiveRegistry();
 *   directives.define("set-header", hookMask(Hook.CREQ, Hook.PREQ), loadSetHeader);
 *   registerBuiltins(directives);
 *   const config = new Config({ directives });
 */

import { type Result, ok } from "neverthrow";

import type { Config } from "./config.ts";
import type { ParseContext } from "./context.ts";
import type { Errata } from "./errata.ts";
import type { HookMask } from "./hook.ts";
import type { CfgNode } from "./node.ts";

/** Key ignored when looking for a directive's type; holds nested directives. */
export const DO_KEY = "do";

export interface DirectiveLoad {
	/** The whole directive map. */
	readonly node: CfgNode;
	/** Matched key, argument removed. */
	readonly key: string;
	readonly arg: string | null;
	/** Value of the matched key. */
	readonly value: CfgNode;
}

export type DirectiveLoader = (
	cfg: Config,
	ctx: ParseContext,
	load: DirectiveLoad,
) => Result<Directive, Errata>;

/** Called once per Config, the first time the directive type is used. */
export type TypeInitializer = (cfg: Config) => Result<void, Errata>;

export interface DirectiveDescriptor {
	readonly hookMask: HookMask;
	readonly load: DirectiveLoader;
	readonly typeInit?: TypeInitializer;
	/** Replace an existing registration of the same name, keeping its index. */
	readonly override?: boolean;
}

/** Registered directive type. Shared by every Config built from the registry. */
export interface DirectiveInfo {
	readonly name: string;
	readonly idx: number;
	readonly hookMask: HookMask;
	readonly load: DirectiveLoader;
	readonly typeInit: TypeInitializer;
}

/** Per-Config record for a directive type. */
export class DirectiveRtti {
	/** Instances loaded by this Config. */
	count = 0;

	constructor(readonly info: DirectiveInfo) {}
}

// =====================================================================
// Directive tree
// =====================================================================

export abstract class Directive {
	/** Set by the compiler after the loader returns. */
	rtti: DirectiveRtti | null = null;

	/** Directives nested inside this one. */
	children(): readonly Directive[] {
		return [];
	}

	/** Type name for diagnostics. */
	get typeName(): string {
		return this.rtti?.info.name ?? this.constructor.name;
	}
}

/** Ordered directives, run in sequence. */
export class DirectiveList extends Directive {
	constructor(readonly directives: readonly Directive[]) {
		super();
	}

	override children(): readonly Directive[] {
		return this.directives;
	}

	override get typeName(): string {
		return "list";
	}
}

/** Does nothing. Compiled from an explicit null. */
export class NilDirective extends Directive {
	override get typeName(): string {
		return "nil";
	}
}

/** Depth-first walk of a directive tree, `root` included. */
export function* walkDirectives(root: Directive): Generator<Directive> {
	yield root;
	for (const child of root.children()) {
		yield* walkDirectives(child);
	}
}

// =====================================================================
// Registry
// =====================================================================

export class RegistryError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RegistryError";
	}
}

/** A name was registered twice without `override`. */
export class DuplicateDirectiveError extends RegistryError {
	constructor(readonly directiveName: string) {
		super(`directive "${directiveName}" is already registered`);
		this.name = "DuplicateDirectiveError";
	}
}

/** Registration after a configuration was compiled. */
export class RegistryFrozenError extends RegistryError {
	constructor(readonly directiveName: string) {
		super(`cannot register directive "${directiveName}": registry is frozen`);
		this.name = "RegistryFrozenError";
	}
}

const noTypeInit: TypeInitializer = () => ok(undefined);

export class DirectiveRegistry {
	private readonly entries = new Map<string, DirectiveInfo>();
	private frozen = false;

	/** Register a directive type. */
	define(
		name: string,
		hookMask: HookMask,
		load: DirectiveLoader,
		typeInit: TypeInitializer = noTypeInit,
	): DirectiveInfo {
		return this.register(name, { hookMask, load, typeInit });
	}

	register(name: string, descriptor: DirectiveDescriptor): DirectiveInfo {
		if (this.frozen) {
			throw new RegistryFrozenError(name);
		}
		const existing = this.entries.get(name);
		if (existing !== undefined && descriptor.override !== true) {
			throw new DuplicateDirectiveError(name);
		}
		const info: DirectiveInfo = Object.freeze({
			name,
			idx: existing?.idx ?? this.entries.size,
			hookMask: descriptor.hookMask,
			load: descriptor.load,
			typeInit: descriptor.typeInit ?? noTypeInit,
		});
		this.entries.set(name, info);
		return info;
	}

	/** Disallow further registration. */
	freeze(): void {
		this.frozen = true;
	}

	get isFrozen(): boolean {
		return this.frozen;
	}

	find(name: string): DirectiveInfo | undefined {
		return this.entries.get(name);
	}

	get size(): number {
		return this.entries.size;
	}

	/** Registered names, sorted. */
	names(): string[] {
		return [...this.entries.keys()].sort();
	}

	/** Entries in index order. */
	infos(): DirectiveInfo[] {
		return [...this.entries.values()].sort((a, b) => a.idx - b.idx);
	}
}
