/**
 * YAML node surface used by the compiler.
 *
 * Wraps the `yaml` package's document nodes and exposes what compilation
 * needs: node shape, the scalar text as written, a tag that distinguishes
 * plain from quoted scalars, and a source Mark for diagnostics.
 *
 * Documents are parsed with the failsafe schema so every scalar keeps its
 * source text; integer, boolean and address recognition is done by the
 * expression compiler, not by the YAML layer.
 */

import { type Result, err, ok } from "neverthrow";
import {
	type Document,
	LineCounter,
	type Node,
	Scalar,
	isAlias,
	isMap,
	isNode,
	isScalar,
	isSeq,
	parseDocument,
} from "yaml";

import { Errata, Mark } from "./errata.ts";

/** Tag reported for an untagged plain scalar or collection. */
export const PLAIN_TAG = "?";
/** Tag reported for an untagged quoted or block scalar. */
export const QUOTED_TAG = "!";

const NULL_TAG = "tag:yaml.org,2002:null";
const NULL_TEXT = new Set(["", "~", "null", "Null", "NULL"]);

/** A parsed YAML source shared by all nodes taken from it. */
export class YamlSource {
	constructor(
		readonly doc: Document.Parsed,
		readonly lineCounter: LineCounter,
		readonly filename: string | null,
		readonly warnings: readonly string[],
	) {}

	mark(offset: number): Mark {
		const { line, col } = this.lineCounter.linePos(offset);
		return new Mark(line, col, this.filename);
	}
}

export interface CfgEntry {
	readonly key: string;
	readonly keyNode: CfgNode;
	readonly value: CfgNode;
}

/**
 * A YAML node, or the null node. Missing keys are reported as `undefined`
 * by lookups, an explicit empty value as a null CfgNode.
 */
export class CfgNode {
	private readonly raw: Node | null;

	constructor(
		raw: Node | null,
		readonly source: YamlSource,
		private readonly offset: number = 0,
	) {
		this.raw = raw !== null && isAlias(raw) ? (raw.resolve(source.doc) ?? null) : raw;
	}

	isNull(): boolean {
		const raw = this.raw;
		if (raw === null) return true;
		if (!isScalar(raw)) return false;
		if (raw.value === null || raw.tag === NULL_TAG) return true;
		return (
			raw.tag === undefined &&
			raw.type === Scalar.PLAIN &&
			typeof raw.value === "string" &&
			NULL_TEXT.has(raw.value)
		);
	}

	isScalar(): boolean {
		return this.raw !== null && isScalar(this.raw) && !this.isNull();
	}

	isSequence(): boolean {
		return this.raw !== null && isSeq(this.raw);
	}

	isMap(): boolean {
		return this.raw !== null && isMap(this.raw);
	}

	/**
	 * `?` for untagged plain scalars and collections, `!` for untagged
	 * quoted or block scalars, otherwise the explicit tag as resolved.
	 */
	get tag(): string {
		const raw = this.raw;
		if (raw === null) return PLAIN_TAG;
		if (raw.tag !== undefined) return raw.tag;
		if (isScalar(raw) && raw.type !== undefined && raw.type !== Scalar.PLAIN) {
			return QUOTED_TAG;
		}
		return PLAIN_TAG;
	}

	/** Scalar text as written (after YAML unquoting), or "" for other shapes. */
	get scalar(): string {
		const raw = this.raw;
		if (raw === null || !isScalar(raw) || raw.value === null || raw.value === undefined) {
			return "";
		}
		return String(raw.value);
	}

	get mark(): Mark {
		const start = this.raw?.range?.[0] ?? this.offset;
		return this.source.mark(start);
	}

	/** Number of items in a sequence or pairs in a map. */
	get size(): number {
		const raw = this.raw;
		if (raw !== null && (isSeq(raw) || isMap(raw))) return raw.items.length;
		return 0;
	}

	/** Sequence element at `index`. */
	at(index: number): CfgNode | undefined {
		return this.items()[index];
	}

	items(): CfgNode[] {
		const raw = this.raw;
		if (raw === null || !isSeq(raw)) return [];
		const end = raw.range?.[1] ?? this.offset;
		return raw.items.map((item) => this.wrap(item, end));
	}

	/** Map pairs in source order. */
	entries(): CfgEntry[] {
		const raw = this.raw;
		if (raw === null || !isMap(raw)) return [];
		return raw.items.map((pair) => {
			const keyNode = this.wrap(pair.key, this.raw?.range?.[0] ?? this.offset);
			const keyEnd = isNode(pair.key) ? (pair.key.range?.[1] ?? this.offset) : this.offset;
			return { key: keyNode.scalar, keyNode, value: this.wrap(pair.value, keyEnd) };
		});
	}

	/** Value for `key`, or undefined if the key is absent. */
	get(key: string): CfgNode | undefined {
		return this.entries().find((e) => e.key === key)?.value;
	}

	has(key: string): boolean {
		return this.get(key) !== undefined;
	}

	private wrap(value: unknown, fallbackOffset: number): CfgNode {
		return new CfgNode(isNode(value) ? value : null, this.source, fallbackOffset);
	}
}

/**
 * Parse YAML text into a root node.
 *
 * Syntax errors are reported as one note each, with their position.
 */
export function parseYamlText(
	text: string,
	filename: string | null = null,
): Result<CfgNode, Errata> {
	const lineCounter = new LineCounter();
	const doc = parseDocument(text, { schema: "failsafe", lineCounter });

	if (doc.errors.length > 0) {
		const errata = new Errata();
		for (const e of doc.errors) {
			errata.note(new Errata(e.message));
		}
		errata.info(`While parsing YAML${filename !== null ? ` in ${filename}` : ""}.`);
		return err(errata);
	}

	// Custom tags such as !literal are expected; the compiler checks them.
	const warnings = doc.warnings.filter((w) => w.code !== "TAG_RESOLVE_FAILED").map((w) => w.message);
	const source = new YamlSource(doc, lineCounter, filename, warnings);
	return ok(new CfgNode(doc.contents, source));
}
