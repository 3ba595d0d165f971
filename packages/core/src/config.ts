import os from "node:os";
import { z } from "zod";
import { loadDotenv } from "./env.js";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, parseBooleanFlag, type LogLevel } from "./logger.js";

const DEFAULT_REFUSAL_PATTERN =
  "not found|not mentioned|no information|does not (?:contain|mention)";

const regexSource = z.string().refine(
  (s) => {
    try {
      new RegExp(s, "i");
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" }
);

const configSchema = z.object({
  CORPUS_DIR: z.string().min(1).default("data/raw"),
  INDEX_DIR: z.string().min(1).default("data/processed"),

  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text:latest"),
  EMBEDDING_QUERY_PREFIX: z.string().default("search_query: "),
  EMBEDDING_PASSAGE_PREFIX: z.string().default("search_document: "),
  GENERATION_MODEL: z.string().min(1).default("llama3.1:8b"),

  CHUNK_MAX_CHARS: z.coerce.number().int().min(200).default(3000),
  TOP_K: z.coerce.number().int().min(1).default(3),
  SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.55),
  CONTEXT_MAX_CHARS: z.coerce.number().int().min(200).default(6000),
  REFUSAL_PATTERN: regexSource.default(DEFAULT_REFUSAL_PATTERN),

  EMBED_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GENERATE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  BUILD_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(() => Math.min(4, os.availableParallelism())),
  EMBED_RETRIES: z.coerce.number().int().min(0).default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  BUILD_MAX_FAILURE_RATIO: z.coerce.number().min(0).max(1).default(0.1),

  LOG_LEVEL: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  LOG_PRETTY: z
    .string()
    .refine((s) => parseBooleanFlag(s) !== undefined, { message: "must be true or false" })
    .transform((s) => parseBooleanFlag(s) === true)
    .default("false"),
});

export type RawConfig = z.infer<typeof configSchema>;

export interface AppConfig {
  corpusDir: string;
  indexDir: string;
  ollama: {
    baseUrl: string;
    embeddingModel: string;
    generationModel: string;
    embedTimeoutMs: number;
    generateTimeoutMs: number;
  };
  embeddingPrefixes: { query: string; passage: string };
  chunking: { maxChars: number };
  retrieval: { topK: number; similarityThreshold: number; contextMaxChars: number };
  refusalPatterns: RegExp[];
  logging: { level: LogLevel; pretty: boolean };
  build: {
    concurrency: number;
    embedRetries: number;
    retryBaseDelayMs: number;
    maxFailureRatio: number;
  };
}

/**
 * Parse and validate configuration from the environment (plus `.env`).
 * Empty strings count as unset so that `FOO=` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) loadDotenv();

  const input: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") input[key] = value.trim();
  }
  // prefixes keep their trailing space
  for (const key of ["EMBEDDING_QUERY_PREFIX", "EMBEDDING_PASSAGE_PREFIX"]) {
    const value = env[key];
    if (value !== undefined) input[key] = value;
  }

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const c = parsed.data;
  return {
    corpusDir: c.CORPUS_DIR,
    indexDir: c.INDEX_DIR,
    ollama: {
      baseUrl: c.OLLAMA_BASE_URL.replace(/\/+$/, ""),
      embeddingModel: c.EMBEDDING_MODEL,
      generationModel: c.GENERATION_MODEL,
      embedTimeoutMs: c.EMBED_TIMEOUT_MS,
      generateTimeoutMs: c.GENERATE_TIMEOUT_MS,
    },
    embeddingPrefixes: {
      query: c.EMBEDDING_QUERY_PREFIX,
      passage: c.EMBEDDING_PASSAGE_PREFIX,
    },
    chunking: { maxChars: c.CHUNK_MAX_CHARS },
    retrieval: {
      topK: c.TOP_K,
      similarityThreshold: c.SIMILARITY_THRESHOLD,
      contextMaxChars: c.CONTEXT_MAX_CHARS,
    },
    refusalPatterns: [new RegExp(c.REFUSAL_PATTERN, "i")],
    logging: { level: c.LOG_LEVEL, pretty: c.LOG_PRETTY },
    build: {
      concurrency: c.BUILD_CONCURRENCY,
      embedRetries: c.EMBED_RETRIES,
      retryBaseDelayMs: c.RETRY_BASE_DELAY_MS,
      maxFailureRatio: c.BUILD_MAX_FAILURE_RATIO,
    },
  };
}
