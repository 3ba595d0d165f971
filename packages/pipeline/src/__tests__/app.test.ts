import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "@docqa/core";
import { createDocQa } from "../app.js";
import { AUTH_DOC, DEPLOY_DOC, KeywordEmbedder, MemoryIndexStore, ScriptedGenerator } from "./fakes.js";

describe("createDocQa", () => {
  let corpus: string;

  beforeEach(() => {
    corpus = mkdtempSync(path.join(os.tmpdir(), "docqa-app-"));
    writeFileSync(path.join(corpus, AUTH_DOC.path), AUTH_DOC.content);
    writeFileSync(path.join(corpus, DEPLOY_DOC.path), DEPLOY_DOC.content);
  });

  afterEach(() => {
    rmSync(corpus, { recursive: true, force: true });
  });

  it("refuses until a rebuild publishes an index, then answers", async () => {
    const config = loadConfig({ CORPUS_DIR: corpus, BUILD_CONCURRENCY: "2" });
    const app = await createDocQa(config, {
      embedder: new KeywordEmbedder(),
      generator: new ScriptedGenerator(),
      store: new MemoryIndexStore(),
    });

    const before = await app.pipeline.query("Which authentication method is mentioned?");
    expect(before.refusalReason).toBe("empty_index");

    const rebuilt = await app.builder.rebuild(config.corpusDir);
    expect(rebuilt.status).toBe("success");

    const after = await app.pipeline.query("Which authentication method is mentioned?");
    expect(after.refused).toBe(false);
    expect(after.sources).toEqual(["authentication.md"]);
  });

  it("serves a previously saved index on start", async () => {
    const store = new MemoryIndexStore();
    const config = loadConfig({ CORPUS_DIR: corpus });
    const first = await createDocQa(config, { embedder: new KeywordEmbedder(), store });
    await first.builder.rebuild(corpus);

    const second = await createDocQa(config, { embedder: new KeywordEmbedder(), store });

    expect(second.handle.current().size).toBe(2);
  });
});
