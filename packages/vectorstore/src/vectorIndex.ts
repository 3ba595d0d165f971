import type { Chunk, ChunkId, EmbeddedChunk, SearchHit } from "@docqa/core";

function norm(v: Float32Array, offset: number, dim: number): number {
  let sum = 0;
  for (let i = 0; i < dim; i++) {
    const x = v[offset + i] ?? 0;
    sum += x * x;
  }
  return Math.sqrt(sum);
}

/**
 * Immutable exact nearest-neighbour index under cosine similarity.
 *
 * Vectors live in one row-major Float32Array in chunk order; the chunk at row
 * `i` owns `vectors[i * dimension .. (i + 1) * dimension)`. Nothing here is
 * mutated after construction, so a reference can be shared freely between
 * concurrent queries.
 */
export class VectorIndex {
  readonly dimension: number;
  private readonly chunks: readonly Chunk[];
  private readonly vectors: Float32Array;
  private readonly norms: Float32Array;
  private readonly rowById: ReadonlyMap<ChunkId, number>;

  private constructor(chunks: readonly Chunk[], vectors: Float32Array, dimension: number) {
    this.chunks = chunks;
    this.vectors = vectors;
    this.dimension = dimension;

    const norms = new Float32Array(chunks.length);
    const rowById = new Map<ChunkId, number>();
    chunks.forEach((chunk, row) => {
      if (rowById.has(chunk.id)) throw new Error(`Duplicate chunk id ${chunk.id}`);
      rowById.set(chunk.id, row);
      norms[row] = norm(vectors, row * dimension, dimension);
    });
    this.norms = norms;
    this.rowById = rowById;
  }

  static empty(): VectorIndex {
    return new VectorIndex([], new Float32Array(0), 0);
  }

  /** Build from embedded chunks, keeping their order as row order. */
  static fromEmbedded(items: readonly EmbeddedChunk[]): VectorIndex {
    const first = items[0];
    if (!first) return VectorIndex.empty();

    const dimension = first.vector.length;
    if (dimension === 0) throw new Error("Embedding vectors must not be empty");

    const vectors = new Float32Array(items.length * dimension);
    items.forEach((item, row) => {
      if (item.vector.length !== dimension) {
        throw new Error(
          `Inconsistent embedding dimension for chunk ${item.chunk.id}: expected ${dimension}, got ${item.vector.length}`
        );
      }
      vectors.set(Array.from(item.vector), row * dimension);
    });

    return new VectorIndex(
      items.map((item) => item.chunk),
      vectors,
      dimension
    );
  }

  /** Wrap rows loaded from disk. `vectors` is used as-is, not copied. */
  static fromRows(chunks: readonly Chunk[], vectors: Float32Array, dimension: number): VectorIndex {
    if (chunks.length === 0) return VectorIndex.empty();
    if (vectors.length !== chunks.length * dimension) {
      throw new Error(
        `Vector data holds ${vectors.length} values, expected ${chunks.length} x ${dimension}`
      );
    }
    return new VectorIndex(chunks, vectors, dimension);
  }

  get size(): number {
    return this.chunks.length;
  }

  get(id: ChunkId): Chunk | undefined {
    const row = this.rowById.get(id);
    return row === undefined ? undefined : this.chunks[row];
  }

  /** Chunks in row order. */
  listChunks(): readonly Chunk[] {
    return this.chunks;
  }

  /** Row-major vector data; callers must not write to it. */
  rawVectors(): Float32Array {
    return this.vectors;
  }

  /**
   * Top-k rows by descending cosine similarity, ties broken by ascending chunk
   * id. `k` is clamped to the index size.
   */
  search(query: ArrayLike<number>, k: number): SearchHit[] {
    const limit = Math.min(Math.floor(k), this.size);
    if (!(limit > 0)) return [];
    if (query.length !== this.dimension) {
      throw new RangeError(
        `Query vector has dimension ${query.length}, index expects ${this.dimension}`
      );
    }

    let qNormSq = 0;
    for (let i = 0; i < query.length; i++) {
      const x = query[i] ?? 0;
      qNormSq += x * x;
    }
    const qNorm = Math.sqrt(qNormSq);

    const hits: SearchHit[] = this.chunks.map((chunk, row) => {
      const rowNorm = this.norms[row] ?? 0;
      if (qNorm === 0 || rowNorm === 0) return { chunkId: chunk.id, score: 0 };

      let dot = 0;
      const base = row * this.dimension;
      for (let i = 0; i < this.dimension; i++) {
        dot += (query[i] ?? 0) * (this.vectors[base + i] ?? 0);
      }
      return { chunkId: chunk.id, score: dot / (qNorm * rowNorm) };
    });

    hits.sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score;
      return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
    });
    return hits.slice(0, limit);
  }
}
