import { describe, it, expect } from "vitest";
import type { Chunk, EmbeddedChunk } from "@docqa/core";
import { VectorIndex } from "../vectorIndex.js";
import { IndexHandle } from "../indexHandle.js";

function chunk(id: string, sourcePath = "doc.md", ordinal = 0): Chunk {
  return {
    id,
    text: `text of ${id}`,
    metadata: {
      sourcePath,
      sectionHeading: "",
      sectionPath: "",
      ordinal,
      startOffset: 0,
      endOffset: 0,
    },
  };
}

function embedded(id: string, vector: number[]): EmbeddedChunk {
  return { chunk: chunk(id), vector };
}

describe("VectorIndex.search", () => {
  const index = VectorIndex.fromEmbedded([
    embedded("a", [1, 0]),
    embedded("b", [0, 1]),
    embedded("c", [1, 1]),
  ]);

  it("orders hits by descending cosine similarity", () => {
    const hits = index.search([1, 0], 3);

    expect(hits.map((h) => h.chunkId)).toEqual(["a", "c", "b"]);
    expect(hits[0]?.score).toBeCloseTo(1, 6);
    expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2, 6);
    expect(hits[2]?.score).toBeCloseTo(0, 6);
  });

  it("ignores vector magnitude", () => {
    const hits = index.search([5, 0], 1);

    expect(hits).toHaveLength(1);
    expect(hits[0]?.chunkId).toBe("a");
    expect(hits[0]?.score).toBeCloseTo(1, 6);
  });

  it("breaks ties by ascending chunk id", () => {
    const tied = VectorIndex.fromEmbedded([embedded("y", [1, 0]), embedded("x", [2, 0])]);

    expect(tied.search([1, 0], 2).map((h) => h.chunkId)).toEqual(["x", "y"]);
  });

  it("clamps k to the index size", () => {
    expect(index.search([0, 1], 10)).toHaveLength(3);
    expect(index.search([0, 1], 0)).toEqual([]);
  });

  it("returns nothing from an empty index", () => {
    expect(VectorIndex.empty().search([1, 2, 3], 5)).toEqual([]);
  });

  it("scores a zero vector as 0", () => {
    const hits = index.search([0, 0], 3);

    expect(hits.map((h) => h.score)).toEqual([0, 0, 0]);
    expect(hits.map((h) => h.chunkId)).toEqual(["a", "b", "c"]);
  });

  it("rejects a query of the wrong dimension", () => {
    expect(() => index.search([1, 0, 0], 2)).toThrow(RangeError);
  });
});

describe("VectorIndex construction", () => {
  it("rejects inconsistent dimensions", () => {
    expect(() => VectorIndex.fromEmbedded([embedded("a", [1, 0]), embedded("b", [1])])).toThrow(
      /Inconsistent embedding dimension/
    );
  });

  it("rejects duplicate chunk ids", () => {
    expect(() => VectorIndex.fromEmbedded([embedded("a", [1]), embedded("a", [2])])).toThrow(/Duplicate/);
  });

  it("looks chunks up by id", () => {
    const index = VectorIndex.fromEmbedded([embedded("a", [1]), embedded("b", [2])]);

    expect(index.size).toBe(2);
    expect(index.dimension).toBe(1);
    expect(index.get("b")?.text).toBe("text of b");
    expect(index.get("zzz")).toBeUndefined();
  });
});

describe("IndexHandle", () => {
  it("starts empty and swaps in new indexes", () => {
    const handle = new IndexHandle();
    expect(handle.current().size).toBe(0);
    expect(handle.generation).toBe(0);

    const snapshot = handle.current();
    const next = VectorIndex.fromEmbedded([embedded("a", [1])]);
    const previous = handle.swap(next);

    expect(previous).toBe(snapshot);
    expect(handle.current()).toBe(next);
    expect(handle.generation).toBe(1);
    // an earlier snapshot is unaffected
    expect(snapshot.size).toBe(0);
  });
});
