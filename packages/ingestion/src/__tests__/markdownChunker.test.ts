import { describe, it, expect } from "vitest";
import { chunkIdFor, type CleanedDocument } from "@docqa/core";
import { chunkMarkdownDocument, embeddingInput } from "../markdownChunker.js";
import { extractHeadings } from "../markdownCleaner.js";

function doc(text: string, sourcePath = "guide.md"): CleanedDocument {
  return { sourcePath, text, headings: extractHeadings(text) };
}

function chunks(text: string, maxChars?: number) {
  const opts = maxChars === undefined ? undefined : { maxChars };
  return [...chunkMarkdownDocument(doc(text), opts)];
}

describe("chunkMarkdownDocument", () => {
  it("starts a new chunk at every heading", () => {
    const text = "# Intro\n\nHello world.\n\n## Setup\n\nRun it.";
    const out = chunks(text);

    expect(out.map((c) => c.text)).toEqual([
      "# Intro\n\nHello world.\n\n",
      "## Setup\n\nRun it.",
    ]);
    expect(out[0]?.metadata.sectionHeading).toBe("Intro");
    expect(out[1]?.metadata.sectionHeading).toBe("Setup");
    expect(out[1]?.metadata.sectionPath).toBe("Intro > Setup");
  });

  it("keeps text before the first heading in its own chunk with an empty heading", () => {
    const out = chunks("Preface text.\n\n# A\n\nBody");

    expect(out.map((c) => c.text)).toEqual(["Preface text.\n\n", "# A\n\nBody"]);
    expect(out[0]?.metadata.sectionHeading).toBe("");
    expect(out[0]?.metadata.sectionPath).toBe("");
  });

  it("yields one chunk for a document without headings", () => {
    const out = chunks("Just a paragraph of text.");

    expect(out).toHaveLength(1);
    expect(out[0]?.text).toBe("Just a paragraph of text.");
    expect(out[0]?.metadata.sectionHeading).toBe("");
  });

  it("yields one empty chunk for an empty document", () => {
    const out = chunks("");

    expect(out).toHaveLength(1);
    expect(out[0]?.text).toBe("");
    expect(out[0]?.metadata.startOffset).toBe(0);
    expect(out[0]?.metadata.endOffset).toBe(0);
  });

  it("splits long sections after a paragraph break", () => {
    const text = "# T\n\nalpha beta gamma.\n\ndelta epsilon zeta eta.\n\ntheta";
    const out = chunks(text, 40);

    expect(out.map((c) => c.text)).toEqual([
      "# T\n\nalpha beta gamma.\n\n",
      "delta epsilon zeta eta.\n\ntheta",
    ]);
    expect(out.every((c) => c.metadata.sectionHeading === "T")).toBe(true);
  });

  it("falls back to sentence boundaries when there is no paragraph break", () => {
    const out = chunks("One two three. Four five six. Seven eight nine.", 30);

    expect(out.map((c) => c.text)).toEqual([
      "One two three. Four five six. ",
      "Seven eight nine.",
    ]);
  });

  it("hard-cuts text without any boundary", () => {
    const out = chunks("x".repeat(25), 10);

    expect(out.map((c) => c.text.length)).toEqual([10, 10, 5]);
  });

  it("never cuts inside a heading line", () => {
    const heading = `# ${"H".repeat(20)}`;
    const out = chunks(`${heading}\n\nbody`, 10);

    expect(out.map((c) => c.text)).toEqual([heading, "\n\nbody"]);
  });

  it("covers the whole document with no gaps or overlaps", () => {
    const text = [
      "Intro line before anything.",
      "# Guide",
      "First paragraph. ".repeat(30).trim(),
      "## Install",
      "Run the installer, then restart. ".repeat(40).trim(),
      "```",
      "# not a heading inside code",
      "```",
      "## Usage",
      "wordwithoutanyspaces".repeat(20),
    ].join("\n\n");

    const out = chunks(text, 200);

    expect(out.map((c) => c.text).join("")).toBe(text);
    for (let i = 1; i < out.length; i++) {
      expect(out[i]?.metadata.startOffset).toBe(out[i - 1]?.metadata.endOffset);
    }
    expect(out.at(-1)?.metadata.endOffset).toBe(Buffer.byteLength(text));
    expect(out.every((c) => c.text.length <= 200)).toBe(true);
    expect(out.map((c) => c.metadata.ordinal)).toEqual(out.map((_, i) => i));
  });

  it("reports offsets in utf-8 bytes", () => {
    const out = chunks("# Café\n\nnaïve");

    expect(out).toHaveLength(1);
    expect(out[0]?.metadata.endOffset).toBe(15);
  });

  it("derives ids from the source path and ordinal", () => {
    const out = [...chunkMarkdownDocument(doc("# A\n\nx\n\n# B\n\ny", "docs/a.md"))];

    expect(out.map((c) => c.id)).toEqual([chunkIdFor("docs/a.md", 0), chunkIdFor("docs/a.md", 1)]);
  });

  it("can be iterated more than once with the same result", () => {
    const iterable = chunkMarkdownDocument(doc("# A\n\nx\n\n# B\n\ny"));

    expect([...iterable]).toEqual([...iterable]);
  });

  it("rejects a non-positive maxChars", () => {
    expect(() => chunkMarkdownDocument(doc("x"), { maxChars: 0 })).toThrow(RangeError);
  });
});

describe("embeddingInput", () => {
  it("prepends the section path to continuation chunks", () => {
    const [first, second] = chunks("# T\n\nalpha beta gamma.\n\ndelta epsilon zeta eta.\n\ntheta", 40);
    if (!first || !second) throw new Error("expected two chunks");

    expect(embeddingInput(first)).toBe("# T\n\nalpha beta gamma.");
    expect(embeddingInput(second)).toBe("T\n\ndelta epsilon zeta eta.\n\ntheta");
  });
});
