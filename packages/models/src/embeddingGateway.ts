import { EmbeddingUnavailable, errorMessage, type EmbeddingRole } from "@docqa/core";
import { ollamaEmbedOne } from "./ollama.js";

const DEFAULT_MODEL = "nomic-embed-text:latest";

/**
 * Narrow capability the pipeline needs from an embedding model. Queries and
 * passages are embedded differently by asymmetric models, so every call
 * names its role.
 */
export interface EmbeddingGateway {
  readonly model: string;
  embed(text: string, role: EmbeddingRole, opts?: { signal?: AbortSignal | undefined }): Promise<number[]>;
}

export type EmbeddingPrefixes = Record<EmbeddingRole, string>;

/** nomic-embed-text task prefixes. */
export const NOMIC_PREFIXES: EmbeddingPrefixes = {
  query: "search_query: ",
  passage: "search_document: ",
};

/** E5 family prefixes. */
export const E5_PREFIXES: EmbeddingPrefixes = {
  query: "query: ",
  passage: "passage: ",
};

export function applyRolePrefix(text: string, role: EmbeddingRole, prefixes: EmbeddingPrefixes): string {
  return `${prefixes[role]}${text}`;
}

/** Reject vectors a similarity search cannot use. */
export function assertUsableVector(vector: number[], model: string): number[] {
  if (vector.length === 0) {
    throw new EmbeddingUnavailable(`Model ${model} returned an empty embedding.`);
  }
  if (!vector.every((v) => Number.isFinite(v))) {
    throw new EmbeddingUnavailable(`Model ${model} returned a non-finite embedding value.`);
  }
  return vector;
}

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model?: string;
  timeoutMs: number;
  prefixes?: EmbeddingPrefixes;
}

export class OllamaEmbeddingGateway implements EmbeddingGateway {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly prefixes: EmbeddingPrefixes;

  constructor(opts: OllamaEmbeddingOptions) {
    this.baseUrl = opts.baseUrl;
    this.model = opts.model?.trim() || DEFAULT_MODEL;
    this.timeoutMs = opts.timeoutMs;
    this.prefixes = opts.prefixes ?? NOMIC_PREFIXES;
  }

  async embed(text: string, role: EmbeddingRole, opts?: { signal?: AbortSignal | undefined }): Promise<number[]> {
    let vector: number[];
    try {
      vector = await ollamaEmbedOne({
        baseUrl: this.baseUrl,
        timeoutMs: this.timeoutMs,
        signal: opts?.signal,
        model: this.model,
        text: applyRolePrefix(text, role, this.prefixes),
      });
    } catch (err) {
      throw new EmbeddingUnavailable(`Embedding with ${this.model} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return assertUsableVector(vector, this.model);
  }
}
