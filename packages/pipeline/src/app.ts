import { createLogger, type AppConfig } from "@docqa/core";
import {
  OllamaEmbeddingGateway,
  OllamaGenerationGateway,
  type EmbeddingGateway,
  type GenerationGateway,
} from "@docqa/models";
import { FileIndexStore, IndexHandle, type IndexStore } from "@docqa/vectorstore";
import { IndexBuilder } from "./indexBuilder.js";
import { QueryPipeline } from "./queryPipeline.js";
import { RefusalPolicy } from "./refusalPolicy.js";
import { Retriever } from "./retriever.js";

const log = createLogger("pipeline");

export interface DocQa {
  config: AppConfig;
  handle: IndexHandle;
  retriever: Retriever;
  pipeline: QueryPipeline;
  builder: IndexBuilder;
}

export interface DocQaOptions {
  embedder?: EmbeddingGateway;
  generator?: GenerationGateway;
  store?: IndexStore;
  /** Load the persisted index on start (default true). */
  loadIndex?: boolean;
}

/**
 * Wire gateways, store and pipeline from configuration and load the
 * persisted index, if there is one. Options can replace the Ollama gateways
 * or the on-disk store.
 */
export async function createDocQa(config: AppConfig, options: DocQaOptions = {}): Promise<DocQa> {
  const embedder =
    options.embedder ??
    new OllamaEmbeddingGateway({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.embeddingModel,
      timeoutMs: config.ollama.embedTimeoutMs,
      prefixes: config.embeddingPrefixes,
    });
  const generator =
    options.generator ??
    new OllamaGenerationGateway({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.generationModel,
      timeoutMs: config.ollama.generateTimeoutMs,
    });
  const store = options.store ?? new FileIndexStore(config.indexDir);

  const persisted = options.loadIndex === false ? null : await store.load();
  const handle = new IndexHandle(persisted ?? undefined);
  if (!persisted && options.loadIndex !== false) {
    log.warn({ indexDir: config.indexDir }, "no persisted index found; queries will be refused");
  }

  const retriever = new Retriever(embedder, handle);
  const policy = new RefusalPolicy({
    threshold: config.retrieval.similarityThreshold,
    patterns: config.refusalPatterns,
  });

  return {
    config,
    handle,
    retriever,
    pipeline: new QueryPipeline({
      handle,
      retriever,
      generator,
      policy,
      topK: config.retrieval.topK,
      contextMaxChars: config.retrieval.contextMaxChars,
    }),
    builder: new IndexBuilder({
      embedder,
      store,
      handle,
      maxChars: config.chunking.maxChars,
      concurrency: config.build.concurrency,
      embedRetries: config.build.embedRetries,
      retryBaseDelayMs: config.build.retryBaseDelayMs,
      maxFailureRatio: config.build.maxFailureRatio,
    }),
  };
}
