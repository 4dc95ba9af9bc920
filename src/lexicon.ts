/**
 * Bidirectional name <-> value table.
 *
 * Each value has a primary name and any number of aliases. Name lookup is
 * case-insensitive and falls back to the default value instead of throwing,
 * so callers compare against their own invalid sentinel.
 */
export class Lexicon<V> {
	private readonly byName = new Map<string, V>();
	private readonly byValue = new Map<V, string>();

	constructor(
		entries: readonly (readonly [V, readonly string[]])[],
		readonly defaultValue: V,
		readonly defaultName: string = "INVALID",
	) {
		for (const [value, names] of entries) {
			const [primary] = names;
			if (primary === undefined) {
				throw new Error(`lexicon entry for ${String(value)} has no names`);
			}
			if (!this.byValue.has(value)) {
				this.byValue.set(value, primary);
			}
			for (const name of names) {
				this.byName.set(name.toLowerCase(), value);
			}
		}
	}

	/** Value for `name`, or the default value if unknown. */
	value(name: string): V {
		return this.byName.get(name.toLowerCase()) ?? this.defaultValue;
	}

	/** Primary name for `value`, or the default name if unknown. */
	name(value: V): string {
		return this.byValue.get(value) ?? this.defaultName;
	}

	has(name: string): boolean {
		return this.byName.has(name.toLowerCase());
	}

	/** All primary names, in definition order. */
	names(): string[] {
		return [...this.byValue.values()];
	}
}
