import { describe, it, expect } from "vitest";
import type { Chunk } from "@docqa/core";
import { hitAtK, parseEvalCases, recallAtK, relevantChunkIds, sourceMatchesNeedle } from "../evaluation.js";

function chunk(id: string, sourcePath: string, sectionPath: string): Chunk {
  return {
    id,
    text: "text",
    metadata: {
      sourcePath,
      sectionHeading: sectionPath.split(" > ").pop() ?? "",
      sectionPath,
      ordinal: 0,
      startOffset: 0,
      endOffset: 4,
    },
  };
}

describe("parseEvalCases", () => {
  it("reads one case per non-blank line", () => {
    const raw = [
      '{"id":"auth","q":"How do clients authenticate?","mustContain":["authentication.md"]}',
      "",
      '{"q":"How is it deployed?","mustContain":["deployment.md#Deployment"]}',
    ].join("\n");

    expect(parseEvalCases(raw)).toEqual([
      { id: "auth", q: "How do clients authenticate?", mustContain: ["authentication.md"] },
      { q: "How is it deployed?", mustContain: ["deployment.md#Deployment"] },
    ]);
  });

  it("names the line of an invalid case", () => {
    expect(() => parseEvalCases('{"q":"ok","mustContain":["a.md"]}\n{"q":"","mustContain":[]}')).toThrow(/^line 2:/);
    expect(() => parseEvalCases("not json")).toThrow("line 1: invalid JSON");
  });
});

describe("hitAtK", () => {
  const sources = ["guide.md#Setup", "api/auth.md#Tokens > JWT", "faq.md"];

  it("matches by path, path prefix or section needle", () => {
    expect(sourceMatchesNeedle("api/auth.md#Tokens > JWT", "api/")).toBe(true);
    expect(sourceMatchesNeedle("api/auth.md#Tokens > JWT", "api/auth.md#Tokens")).toBe(true);
    expect(sourceMatchesNeedle("guide.md#Setup", "faq.md")).toBe(false);
  });

  it("only looks at the first k sources", () => {
    expect(hitAtK(sources, ["api/auth.md"], 1)).toBe(false);
    expect(hitAtK(sources, ["api/auth.md"], 2)).toBe(true);
    expect(hitAtK(sources, ["missing.md", "faq.md"], 3)).toBe(true);
    expect(hitAtK([], ["faq.md"], 5)).toBe(false);
  });
});

describe("recallAtK", () => {
  it("is true when a relevant id is among the first k", () => {
    expect(recallAtK(["c1", "c2", "c3"], ["c3"], 3)).toBe(true);
    expect(recallAtK(["c1", "c2", "c3"], ["c3"], 2)).toBe(false);
    expect(recallAtK(["c1"], [], 5)).toBe(false);
  });
});

describe("relevantChunkIds", () => {
  const chunks = [
    chunk("c1", "guide.md", "Setup"),
    chunk("c2", "api/auth.md", "Tokens > JWT"),
    chunk("c3", "api/auth.md", "Sessions"),
    chunk("c4", "faq.md", ""),
  ];

  it("collects every chunk whose file a needle names, in index order", () => {
    expect(relevantChunkIds(chunks, ["api/auth.md#Tokens"])).toEqual(["c2", "c3"]);
    expect(relevantChunkIds(chunks, ["faq.md", "api/"])).toEqual(["c2", "c3", "c4"]);
    expect(relevantChunkIds(chunks, ["missing.md"])).toEqual([]);
  });

  it("feeds recallAtK with chunk ids", () => {
    const relevant = relevantChunkIds(chunks, ["faq.md"]);

    expect(recallAtK(["c2", "c4"], relevant, 1)).toBe(false);
    expect(recallAtK(["c2", "c4"], relevant, 2)).toBe(true);
  });
});
