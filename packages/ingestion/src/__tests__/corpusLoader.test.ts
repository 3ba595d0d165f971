import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { IngestionError, sha256 } from "@docqa/core";
import { loadCorpusDocuments } from "../corpusLoader.js";
import { isIgnoredDir, isMarkdownFile } from "../ignore.js";

describe("loadCorpusDocuments", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), "docqa-corpus-"));
    writeFileSync(path.join(root, "b.md"), "# B\n");
    writeFileSync(path.join(root, "a.md"), "# A\n");
    writeFileSync(path.join(root, "notes.txt"), "not markdown");
    mkdirSync(path.join(root, "sub"));
    writeFileSync(path.join(root, "sub", "c.markdown"), "# C\n");
    mkdirSync(path.join(root, "node_modules"));
    writeFileSync(path.join(root, "node_modules", "x.md"), "# ignored\n");
    writeFileSync(path.join(root, "bad.md"), Buffer.from([0xff, 0xfe, 0x41]));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("loads markdown files sorted by relative path", async () => {
    const { documents } = await loadCorpusDocuments({ corpusPath: root });

    expect(documents.map((d) => d.path)).toEqual(["a.md", "b.md", "sub/c.markdown"]);
    expect(documents[0]).toEqual({ id: sha256("a.md"), path: "a.md", content: "# A\n" });
  });

  it("skips files that are not valid UTF-8", async () => {
    const { skipped } = await loadCorpusDocuments({ corpusPath: root });

    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toBeInstanceOf(IngestionError);
    expect(skipped[0]?.path).toBe("bad.md");
  });

  it("fails when the corpus directory does not exist", async () => {
    await expect(
      loadCorpusDocuments({ corpusPath: path.join(root, "missing") })
    ).rejects.toBeInstanceOf(IngestionError);
  });
});

describe("ignore rules", () => {
  it("matches Markdown extensions case-insensitively", () => {
    expect(isMarkdownFile("README.MD")).toBe(true);
    expect(isMarkdownFile("guide.markdown")).toBe(true);
    expect(isMarkdownFile("notes.txt")).toBe(false);
    expect(isMarkdownFile("md")).toBe(false);
  });

  it("skips tool and build directories", () => {
    expect(isIgnoredDir("node_modules")).toBe(true);
    expect(isIgnoredDir(".git")).toBe(true);
    expect(isIgnoredDir("guides")).toBe(false);
  });
});
