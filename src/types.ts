import ipaddr from "ipaddr.js";

import type { ArenaView } from "./arena.ts";
import { Lexicon } from "./lexicon.ts";

/** Base value kinds, one bit each so a set of kinds is a plain mask. */
export const ValueKind = {
	NIL: 1 << 0,
	STRING: 1 << 1,
	INTEGER: 1 << 2,
	BOOLEAN: 1 << 3,
	IP: 1 << 4,
	LIST: 1 << 5,
	TUPLE: 1 << 6,
} as const;

export type ValueKind = (typeof ValueKind)[keyof typeof ValueKind];

/** A set of ValueKind bits. */
export type ValueMask = number;

const KIND_NAMES: readonly (readonly [ValueKind, string])[] = [
	[ValueKind.NIL, "nil"],
	[ValueKind.STRING, "string"],
	[ValueKind.INTEGER, "integer"],
	[ValueKind.BOOLEAN, "boolean"],
	[ValueKind.IP, "ip"],
	[ValueKind.LIST, "list"],
	[ValueKind.TUPLE, "tuple"],
];

function maskNames(mask: ValueMask): string {
	const names = KIND_NAMES.filter(([k]) => (mask & k) !== 0).map(([, n]) => n);
	return names.length > 0 ? names.join("|") : "none";
}

/**
 * Statically inferred result type of an expression.
 *
 * A set of base kinds, the element kinds when the set includes LIST, and
 * whether the value is known at config load time. Instances are immutable;
 * union() returns a new type.
 */
export class ActiveType {
	static readonly NONE = new ActiveType(0);

	constructor(
		readonly base: ValueMask,
		readonly listTypes: ValueMask = 0,
		readonly cfgConst: boolean = false,
	) {}

	static of(...kinds: ValueKind[]): ActiveType {
		return new ActiveType(kinds.reduce((mask, k) => mask | k, 0));
	}

	/** A list whose elements may be any kind in `elements`. */
	static list(elements: ActiveType, cfgConst = false): ActiveType {
		return new ActiveType(ValueKind.LIST, elements.base, cfgConst);
	}

	isCfgConst(): boolean {
		return this.cfgConst;
	}

	has(kind: ValueKind): boolean {
		return (this.base & kind) !== 0;
	}

	/** True if any kind in `mask` is possible. */
	hasAny(mask: ValueMask): boolean {
		return (this.base & mask) !== 0;
	}

	/** The kinds only, without constness. */
	baseTypes(): ActiveType {
		return this.cfgConst ? new ActiveType(this.base, this.listTypes) : this;
	}

	withCfgConst(cfgConst = true): ActiveType {
		return new ActiveType(this.base, this.listTypes, cfgConst);
	}

	/** `this |= other`. Constant only if both sides are. */
	union(other: ActiveType): ActiveType {
		return new ActiveType(
			this.base | other.base,
			this.listTypes | other.listTypes,
			this.cfgConst && other.cfgConst,
		);
	}

	equals(other: ActiveType): boolean {
		return (
			this.base === other.base &&
			this.listTypes === other.listTypes &&
			this.cfgConst === other.cfgConst
		);
	}

	toString(): string {
		let s = maskNames(this.base & ~ValueKind.LIST);
		if (this.has(ValueKind.LIST)) {
			const list = `list[${maskNames(this.listTypes)}]`;
			s = this.base === ValueKind.LIST ? list : `${s}|${list}`;
		}
		return this.cfgConst ? `${s} (const)` : s;
	}
}

/** Text that is either interned in a compiler arena or borrowed. */
export type Text = ArenaView | string;

export type IpAddress = ipaddr.IPv4 | ipaddr.IPv6;

export interface NilFeature {
	readonly kind: "nil";
}

export interface StringFeature {
	readonly kind: "string";
	readonly text: Text;
	/** Came from an explicit literal and must not be reinterpreted. */
	readonly literal: boolean;
}

export interface IntegerFeature {
	readonly kind: "integer";
	readonly value: number;
}

export interface BooleanFeature {
	readonly kind: "boolean";
	readonly value: boolean;
}

export interface IpFeature {
	readonly kind: "ip";
	readonly value: IpAddress;
}

export interface ListFeature {
	readonly kind: "list";
	readonly items: readonly Feature[];
}

/** A concrete value. */
export type Feature =
	| NilFeature
	| StringFeature
	| IntegerFeature
	| BooleanFeature
	| IpFeature
	| ListFeature;

export const NIL_FEATURE: NilFeature = Object.freeze({ kind: "nil" });

export function stringFeature(text: Text, literal = false): StringFeature {
	return { kind: "string", text, literal };
}

export function integerFeature(value: number): IntegerFeature {
	return { kind: "integer", value };
}

export function booleanFeature(value: boolean): BooleanFeature {
	return { kind: "boolean", value };
}

export function ipFeature(value: IpAddress): IpFeature {
	return { kind: "ip", value };
}

export function listFeature(items: readonly Feature[]): ListFeature {
	return { kind: "list", items };
}

export function textOf(text: Text): string {
	return typeof text === "string" ? text : text.text();
}

/** Constant type describing an already materialized feature. */
export function featureType(feature: Feature): ActiveType {
	switch (feature.kind) {
		case "nil":
			return new ActiveType(ValueKind.NIL, 0, true);
		case "string":
			return new ActiveType(ValueKind.STRING, 0, true);
		case "integer":
			return new ActiveType(ValueKind.INTEGER, 0, true);
		case "boolean":
			return new ActiveType(ValueKind.BOOLEAN, 0, true);
		case "ip":
			return new ActiveType(ValueKind.IP, 0, true);
		case "list": {
			const elements = feature.items.reduce(
				(mask, item) => mask | featureType(item).base,
				0,
			);
			return new ActiveType(ValueKind.LIST, elements, true);
		}
	}
}

export function featureToString(feature: Feature): string {
	switch (feature.kind) {
		case "nil":
			return "NULL";
		case "string":
			return textOf(feature.text);
		case "integer":
			return String(feature.value);
		case "boolean":
			return feature.value ? "true" : "false";
		case "ip":
			return feature.value.toString();
		case "list":
			return `[ ${feature.items.map(featureToString).join(", ")} ]`;
	}
}

// =====================================================================
// Literal recognition
// =====================================================================

export const BoolTag = {
	INVALID: -1,
	FALSE: 0,
	TRUE: 1,
} as const;

export type BoolTag = (typeof BoolTag)[keyof typeof BoolTag];

export const BoolNames = new Lexicon<BoolTag>(
	[
		[BoolTag.TRUE, ["true", "1", "on", "enable", "Y", "yes"]],
		[BoolTag.FALSE, ["false", "0", "off", "disable", "N", "no"]],
	],
	BoolTag.INVALID,
);

const INTEGER_LITERAL = /^([-+]?)(0[xX][0-9a-fA-F]+|0[bB][01]+|0[0-7]*|[1-9][0-9]*)$/;

/**
 * Parse an integer literal that spans all of `text`.
 *
 * Radix follows the prefix: `0x` hex, `0b` binary, a leading `0` octal,
 * otherwise decimal. Returns null if any text is left over or the value is
 * not a safe integer.
 */
export function parseIntegerLiteral(text: string): number | null {
	const m = INTEGER_LITERAL.exec(text);
	if (m === null) return null;
	const sign = m[1] === "-" ? -1 : 1;
	const digits = m[2] ?? "";
	let n: number;
	if (/^0[xX]/.test(digits)) {
		n = Number.parseInt(digits.slice(2), 16);
	} else if (/^0[bB]/.test(digits)) {
		n = Number.parseInt(digits.slice(2), 2);
	} else if (digits.startsWith("0")) {
		n = digits.length === 1 ? 0 : Number.parseInt(digits.slice(1), 8);
	} else {
		n = Number.parseInt(digits, 10);
	}
	if (sign < 0 && n !== 0) n = -n;
	return Number.isSafeInteger(n) ? n : null;
}

/** Parse a dotted quad IPv4 or an IPv6 address. */
export function parseIpLiteral(text: string): IpAddress | null {
	if (ipaddr.IPv4.isValidFourPartDecimal(text)) {
		return ipaddr.IPv4.parse(text);
	}
	if (text.includes(":") && ipaddr.IPv6.isValid(text)) {
		return ipaddr.IPv6.parse(text);
	}
	return null;
}
