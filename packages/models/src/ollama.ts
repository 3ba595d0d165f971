import { z } from "zod";

export class OllamaError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "OllamaError";
    this.timedOut = options?.timedOut ?? false;
  }
}

export interface OllamaCallOptions {
  baseUrl: string;
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

const generateResponseSchema = z.object({
  response: z.string(),
});

function normalizeModelName(model: string): string {
  return model.trim();
}

/**
 * One abort signal fed by both the caller and a timer. `release` must run once
 * the request settles so the timer does not outlive it.
 */
function linkSignal(timeoutMs: number, parent?: AbortSignal): {
  signal: AbortSignal;
  timedOut: () => boolean;
  release: () => void;
} {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    release: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

async function postJson(path: string, body: unknown, opts: OllamaCallOptions): Promise<unknown> {
  const url = `${opts.baseUrl}${path}`;
  const link = linkSignal(opts.timeoutMs, opts.signal);

  try {
    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: link.signal,
      });
    } catch (err) {
      if (link.timedOut()) {
        throw new OllamaError(`Ollama request to ${path} timed out after ${opts.timeoutMs}ms`, {
          cause: err,
          timedOut: true,
        });
      }
      throw new OllamaError(`Ollama request to ${path} failed`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new OllamaError(`Ollama ${path} failed: ${res.status} ${res.statusText}\n${text}`.trim());
    }

    try {
      return await res.json();
    } catch (err) {
      throw new OllamaError(`Ollama ${path} returned invalid JSON`, { cause: err });
    }
  } finally {
    link.release();
  }
}

export async function ollamaEmbedOne(
  args: { model: string; text: string } & OllamaCallOptions
): Promise<number[]> {
  const data = await postJson(
    "/api/embeddings",
    { model: normalizeModelName(args.model), prompt: args.text },
    args
  );

  const parsed = embeddingResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new OllamaError("Ollama embeddings response missing `embedding` array.");
  }
  return parsed.data.embedding;
}

export interface GenerateOptions {
  temperature: number;
  top_k?: number;
  seed?: number;
  num_predict?: number;
}

export async function ollamaGenerate(
  args: { model: string; system: string; prompt: string; options: GenerateOptions } & OllamaCallOptions
): Promise<string> {
  const data = await postJson(
    "/api/generate",
    {
      model: normalizeModelName(args.model),
      system: args.system,
      prompt: args.prompt,
      stream: false,
      options: args.options,
    },
    args
  );

  const parsed = generateResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new OllamaError("Ollama generate response missing `response` text.");
  }
  return parsed.data.response;
}
