/**
 * Bump allocated byte storage owned by a compiler instance.
 *
 * Text copied into the arena is addressed by an ArenaView handle
 * (arena, chunk, offset, length) rather than by the source string, so the
 * compiled tree does not depend on the YAML buffer it was parsed from.
 * Nothing is reclaimed until the arena is cleared as a whole.
 */

export const DEFAULT_CHUNK_SIZE = 4096;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

let nextArenaId = 1;

/** Thrown when a view is read after its arena was released. */
export class ArenaReleasedError extends Error {
	constructor(arenaId: number) {
		super(`arena ${arenaId} was released; view is no longer valid`);
		this.name = "ArenaReleasedError";
	}
}

/** Read-only handle to bytes owned by an Arena. */
export class ArenaView {
	constructor(
		readonly arena: Arena,
		readonly generation: number,
		readonly chunk: number,
		readonly offset: number,
		readonly length: number,
	) {}

	/** The owned bytes. The returned array aliases arena storage. */
	bytes(): Uint8Array {
		return this.arena.read(this);
	}

	text(): string {
		return decoder.decode(this.bytes());
	}

	toString(): string {
		return this.text();
	}
}

export class Arena {
	readonly id = nextArenaId++;
	private chunks: Uint8Array[] = [];
	private used = 0;
	private allocatedBytes = 0;
	private gen = 0;

	constructor(readonly chunkSize: number = DEFAULT_CHUNK_SIZE) {
		if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
			throw new RangeError(`arena chunk size must be a positive integer, got ${chunkSize}`);
		}
	}

	/** Bytes handed out so far. */
	get size(): number {
		return this.allocatedBytes;
	}

	/** Bytes reserved in chunks, including unused tails. */
	get reserved(): number {
		return this.chunks.reduce((sum, c) => sum + c.length, 0);
	}

	get generation(): number {
		return this.gen;
	}

	/** Copy `source` into the arena and return a view of the copy. */
	localize(source: string | Uint8Array): ArenaView {
		const bytes = typeof source === "string" ? encoder.encode(source) : source;
		const [chunk, offset] = this.alloc(bytes.length);
		const target = this.chunks[chunk];
		if (target === undefined) {
			throw new Error(`arena ${this.id} chunk ${chunk} missing after allocation`);
		}
		target.set(bytes, offset);
		return new ArenaView(this, this.gen, chunk, offset, bytes.length);
	}

	read(view: ArenaView): Uint8Array {
		if (view.arena !== this || view.generation !== this.gen) {
			throw new ArenaReleasedError(this.id);
		}
		const chunk = this.chunks[view.chunk];
		if (chunk === undefined) {
			throw new ArenaReleasedError(this.id);
		}
		return chunk.subarray(view.offset, view.offset + view.length);
	}

	/** Release all storage. Views created before this call become invalid. */
	clear(): void {
		this.chunks = [];
		this.used = 0;
		this.allocatedBytes = 0;
		this.gen += 1;
	}

	private alloc(n: number): [number, number] {
		let last = this.chunks.length - 1;
		const current = this.chunks[last];
		if (current === undefined || current.length - this.used < n) {
			this.chunks.push(new Uint8Array(Math.max(this.chunkSize, n)));
			last = this.chunks.length - 1;
			this.used = 0;
		}
		const offset = this.used;
		this.used += n;
		this.allocatedBytes += n;
		return [last, offset];
	}
}
