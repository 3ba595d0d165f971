import { GenerationUnavailable, errorMessage } from "@docqa/core";
import { ollamaGenerate, type GenerateOptions } from "./ollama.js";
import { SYSTEM_PROMPT, buildGroundedPrompt } from "./prompt.js";

const DEFAULT_MODEL = "llama3.1:8b";

export interface GenerationGateway {
  readonly model: string;
  /** One call per query; equal inputs must give equal output. */
  generate(question: string, context: string, opts?: { signal?: AbortSignal | undefined }): Promise<string>;
}

// greedy decoding with a pinned seed
export const DETERMINISTIC_DECODING: GenerateOptions = {
  temperature: 0,
  top_k: 1,
  seed: 42,
  num_predict: 256,
};

export interface OllamaGenerationOptions {
  baseUrl: string;
  model?: string;
  timeoutMs: number;
}

export class OllamaGenerationGateway implements GenerationGateway {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts: OllamaGenerationOptions) {
    this.baseUrl = opts.baseUrl;
    this.model = opts.model?.trim() || DEFAULT_MODEL;
    this.timeoutMs = opts.timeoutMs;
  }

  async generate(question: string, context: string, opts?: { signal?: AbortSignal | undefined }): Promise<string> {
    try {
      const text = await ollamaGenerate({
        baseUrl: this.baseUrl,
        timeoutMs: this.timeoutMs,
        signal: opts?.signal,
        model: this.model,
        system: SYSTEM_PROMPT,
        prompt: buildGroundedPrompt(question, context),
        options: DETERMINISTIC_DECODING,
      });
      return text.trim();
    } catch (err) {
      throw new GenerationUnavailable(`Generation with ${this.model} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
