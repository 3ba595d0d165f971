import {
  BuildFailed,
  DocQaError,
  EmbeddingUnavailable,
  createLogger,
  errorMessage,
  type Chunk,
  type EmbeddedChunk,
  type RawDocument,
} from "@docqa/core";
import { chunkMarkdownDocument, embeddingInput, loadCorpusDocuments, prepareDocument } from "@docqa/ingestion";
import type { EmbeddingGateway } from "@docqa/models";
import { VectorIndex, type IndexHandle, type IndexStore } from "@docqa/vectorstore";
import { Mutex, mapPool, withRetry } from "./concurrency.js";

const log = createLogger("builder");

export interface IndexBuilderOptions {
  embedder: EmbeddingGateway;
  store: IndexStore;
  handle: IndexHandle;
  maxChars: number;
  concurrency: number;
  embedRetries: number;
  retryBaseDelayMs: number;
  /** Fraction of chunks allowed to fail embedding before the build is abandoned. */
  maxFailureRatio: number;
}

export interface BuildStats {
  documents: number;
  chunks: number;
  embedded: number;
  dropped: number;
  /** Whitespace-only chunks, kept out of the index. */
  blank: number;
  dimension: number;
}

export interface BuildReport extends BuildStats {
  buildId: string;
  embeddingModel: string;
  skippedFiles: string[];
  durationMs: number;
}

export type RebuildResult =
  | { status: "success"; report: BuildReport }
  | { status: "failure"; error: DocQaError };

export class IndexBuilder {
  private readonly writer = new Mutex();

  constructor(private readonly opts: IndexBuilderOptions) {}

  /** Chunk and embed `documents` into a fresh index. Nothing is persisted or swapped. */
  async build(documents: readonly RawDocument[]): Promise<VectorIndex> {
    const { index } = await this.compile(documents);
    return index;
  }

  /**
   * Load the corpus, build, persist a new generation and swap it in.
   * Concurrent calls run one after another; the served index only changes
   * once the new one is on disk.
   */
  rebuild(corpusPath: string): Promise<RebuildResult> {
    return this.writer.runExclusive(async () => {
      const startedAt = Date.now();
      log.info({ corpusPath, embeddingModel: this.opts.embedder.model }, "rebuild started");

      try {
        const corpus = await loadCorpusDocuments({ corpusPath });
        const { index, stats } = await this.compile(corpus.documents);
        const manifest = await this.opts.store.save(index, { embeddingModel: this.opts.embedder.model });
        this.opts.handle.swap(index);

        const report: BuildReport = {
          ...stats,
          buildId: manifest.buildId,
          embeddingModel: manifest.embeddingModel,
          skippedFiles: corpus.skipped.map((e) => e.path),
          durationMs: Date.now() - startedAt,
        };
        log.info(report, "rebuild finished, index swapped");
        return { status: "success", report };
      } catch (err) {
        const error =
          err instanceof DocQaError
            ? err
            : new BuildFailed(`Rebuild failed: ${errorMessage(err)}`, { cause: err });
        log.error({ code: error.code, err: error.message }, "rebuild failed, keeping current index");
        return { status: "failure", error };
      }
    });
  }

  private *chunkStream(documents: readonly RawDocument[], stats: BuildStats): Generator<Chunk> {
    for (const doc of documents) {
      stats.documents++;
      let produced = 0;
      for (const chunk of chunkMarkdownDocument(prepareDocument(doc), { maxChars: this.opts.maxChars })) {
        produced++;
        if (chunk.text.trim() === "") {
          stats.blank++;
          continue;
        }
        stats.chunks++;
        yield chunk;
      }
      log.debug({ sourcePath: doc.path, chunks: produced }, "document chunked");
    }
  }

  private async embedChunk(chunk: Chunk): Promise<EmbeddedChunk | null> {
    const { embedder, embedRetries, retryBaseDelayMs } = this.opts;
    try {
      const vector = await withRetry(() => embedder.embed(embeddingInput(chunk), "passage"), {
        retries: embedRetries,
        baseDelayMs: retryBaseDelayMs,
        shouldRetry: (err) => err instanceof EmbeddingUnavailable,
        onRetry: ({ attempt, delayMs, error }) =>
          log.warn({ chunkId: chunk.id, attempt, delayMs, err: errorMessage(error) }, "embedding retry"),
      });
      return { chunk, vector };
    } catch (err) {
      log.warn(
        {
          chunkId: chunk.id,
          sourcePath: chunk.metadata.sourcePath,
          ordinal: chunk.metadata.ordinal,
          err: errorMessage(err),
        },
        "chunk dropped: embedding failed"
      );
      return null;
    }
  }

  private async compile(documents: readonly RawDocument[]): Promise<{ index: VectorIndex; stats: BuildStats }> {
    const stats: BuildStats = { documents: 0, chunks: 0, embedded: 0, dropped: 0, blank: 0, dimension: 0 };

    const results = await mapPool(this.chunkStream(documents, stats), this.opts.concurrency, (chunk) =>
      this.embedChunk(chunk)
    );
    const embedded = results.filter((r): r is EmbeddedChunk => r !== null);
    stats.embedded = embedded.length;
    stats.dropped = stats.chunks - embedded.length;

    if (stats.chunks === 0) {
      throw new BuildFailed(`Corpus produced no chunks (${stats.documents} documents)`);
    }
    const failureRatio = stats.dropped / stats.chunks;
    if (embedded.length === 0 || failureRatio > this.opts.maxFailureRatio) {
      throw new BuildFailed(
        `${stats.dropped} of ${stats.chunks} chunks failed to embed (limit ${this.opts.maxFailureRatio})`
      );
    }

    let index: VectorIndex;
    try {
      index = VectorIndex.fromEmbedded(embedded);
    } catch (err) {
      throw new BuildFailed(errorMessage(err), { cause: err });
    }
    stats.dimension = index.dimension;

    log.info(
      {
        documents: stats.documents,
        chunks: stats.chunks,
        dropped: stats.dropped,
        blank: stats.blank,
        dimension: stats.dimension,
      },
      "index built"
    );
    return { index, stats };
  }
}
