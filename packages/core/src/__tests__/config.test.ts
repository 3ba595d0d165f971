import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("fills every setting with its default", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      corpusDir: "data/raw",
      indexDir: "data/processed",
      ollama: {
        baseUrl: "http://localhost:11434",
        embeddingModel: "nomic-embed-text:latest",
        generationModel: "llama3.1:8b",
        embedTimeoutMs: 30_000,
        generateTimeoutMs: 120_000,
      },
      embeddingPrefixes: { query: "search_query: ", passage: "search_document: " },
      chunking: { maxChars: 3000 },
      retrieval: { topK: 3, similarityThreshold: 0.55, contextMaxChars: 6000 },
      logging: { level: "info", pretty: false },
      build: { embedRetries: 2, retryBaseDelayMs: 500, maxFailureRatio: 0.1 },
    });
    expect(config.build.concurrency).toBeGreaterThanOrEqual(1);
    expect(config.build.concurrency).toBeLessThanOrEqual(4);
    expect(config.refusalPatterns).toHaveLength(1);
    expect(config.refusalPatterns[0]?.test("That is NOT MENTIONED anywhere.")).toBe(true);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ TOP_K: "", CORPUS_DIR: "   ", SIMILARITY_THRESHOLD: " " });

    expect(config.retrieval.topK).toBe(3);
    expect(config.corpusDir).toBe("data/raw");
    expect(config.retrieval.similarityThreshold).toBe(0.55);
  });

  it("keeps embedding prefixes exactly as given", () => {
    const config = loadConfig({ EMBEDDING_QUERY_PREFIX: "query: ", EMBEDDING_PASSAGE_PREFIX: "" });

    expect(config.embeddingPrefixes).toEqual({ query: "query: ", passage: "" });
  });

  it("coerces numbers and trims values", () => {
    const config = loadConfig({
      TOP_K: " 7 ",
      SIMILARITY_THRESHOLD: "0.4",
      BUILD_CONCURRENCY: "2",
      BUILD_MAX_FAILURE_RATIO: "0",
      OLLAMA_BASE_URL: "http://ollama.internal:11434/",
    });

    expect(config.retrieval.topK).toBe(7);
    expect(config.retrieval.similarityThreshold).toBe(0.4);
    expect(config.build.concurrency).toBe(2);
    expect(config.build.maxFailureRatio).toBe(0);
    expect(config.ollama.baseUrl).toBe("http://ollama.internal:11434");
  });

  it("compiles the refusal pattern case-insensitively", () => {
    const [pattern] = loadConfig({ REFUSAL_PATTERN: "no answer" }).refusalPatterns;

    expect(pattern?.test("NO ANSWER here")).toBe(true);
    expect(pattern?.test("The answer is 42.")).toBe(false);
  });

  it("reads logging settings", () => {
    expect(loadConfig({ LOG_LEVEL: "DEBUG", LOG_PRETTY: "yes" }).logging).toEqual({ level: "debug", pretty: true });
    expect(loadConfig({ LOG_PRETTY: "off" }).logging.pretty).toBe(false);
  });

  it.each([
    ["REFUSAL_PATTERN", "("],
    ["SIMILARITY_THRESHOLD", "2"],
    ["TOP_K", "many"],
    ["CHUNK_MAX_CHARS", "50"],
    ["OLLAMA_BASE_URL", "not a url"],
    ["LOG_LEVEL", "loud"],
    ["LOG_PRETTY", "maybe"],
  ])("rejects an invalid %s", (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigError);
    expect(() => loadConfig({ [key]: value })).toThrow(new RegExp(`^Invalid configuration: ${key}: `));
  });
});
