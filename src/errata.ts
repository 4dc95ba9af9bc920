/**
 * Diagnostics for configuration compilation.
 *
 * An Errata is a chain of notes. The failure itself comes first, and every
 * caller that propagates it appends a context note ("While parsing ... at
 * line N"), so the rendered text reads from the defect outwards. Loaders that
 * accumulate failures merge several chains into one Errata.
 */

import { type Result, err } from "neverthrow";

/** Position in YAML source. Line and column are 1-based. */
export class Mark {
	constructor(
		readonly line: number,
		readonly column: number,
		readonly source: string | null = null,
	) {}

	toString(): string {
		const at = `line ${this.line}, column ${this.column}`;
		return this.source !== null ? `${this.source} ${at}` : at;
	}
}

export type NoteLevel = "error" | "info";

export interface Note {
	readonly level: NoteLevel;
	readonly text: string;
}

export class Errata {
	private readonly list: Note[] = [];

	constructor(message?: string) {
		if (message !== undefined) {
			this.list.push({ level: "error", text: message });
		}
	}

	get notes(): readonly Note[] {
		return this.list;
	}

	/** Number of distinct failures, not counting context notes. */
	get errorCount(): number {
		return this.list.filter((n) => n.level === "error").length;
	}

	isOk(): boolean {
		return this.errorCount === 0;
	}

	/** Append a context note. */
	info(text: string): this {
		this.list.push({ level: "info", text });
		return this;
	}

	/** Append every note of `other`. */
	note(other: Errata): this {
		this.list.push(...other.list);
		return this;
	}

	/** Error notes only, in order. */
	messages(): string[] {
		return this.list.filter((n) => n.level === "error").map((n) => n.text);
	}

	toString(): string {
		return this.list.map((n) => (n.level === "info" ? `  ${n.text}` : n.text)).join("\n");
	}
}

/** Shorthand for a failed result with a single message. */
export function fail<T>(message: string): Result<T, Errata> {
	return err(new Errata(message));
}
