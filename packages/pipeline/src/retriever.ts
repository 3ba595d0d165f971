import {
  EmptyIndex,
  RetrievalFailed,
  createLogger,
  errorMessage,
  preview,
  type RetrievedChunk,
  type SearchHit,
} from "@docqa/core";
import type { EmbeddingGateway } from "@docqa/models";
import type { IndexHandle, VectorIndex } from "@docqa/vectorstore";

const log = createLogger("retriever");

export interface RetrieveOptions {
  signal?: AbortSignal | undefined;
  /** Search this snapshot instead of the handle's current index. */
  index?: VectorIndex | undefined;
}

export class Retriever {
  constructor(
    private readonly embedder: EmbeddingGateway,
    private readonly handle: IndexHandle
  ) {}

  /**
   * Embed the question as a query and return the top `k` chunks in search
   * order. An index with no entries raises EmptyIndex before anything is
   * embedded; any other failure surfaces as RetrievalFailed. There are no
   * partial results.
   */
  async retrieve(question: string, k: number, opts?: RetrieveOptions): Promise<RetrievedChunk[]> {
    const index = opts?.index ?? this.handle.current();
    if (index.size === 0) throw new EmptyIndex();

    let vector: number[];
    try {
      vector = await this.embedder.embed(question, "query", { signal: opts?.signal });
    } catch (err) {
      throw new RetrievalFailed(`Could not embed question: ${errorMessage(err)}`, { cause: err });
    }

    let hits: SearchHit[];
    try {
      hits = index.search(vector, k);
    } catch (err) {
      throw new RetrievalFailed(`Search failed: ${errorMessage(err)}`, { cause: err });
    }

    const retrieved: RetrievedChunk[] = [];
    for (const hit of hits) {
      const chunk = index.get(hit.chunkId);
      if (chunk) retrieved.push({ chunk, similarity: hit.score });
    }

    log.debug(
      { question: preview(question), k, hits: retrieved.length, topScore: retrieved[0]?.similarity },
      "retrieved"
    );
    return retrieved;
  }
}
