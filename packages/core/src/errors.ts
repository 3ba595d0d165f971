export type ErrorCode =
  | "INGESTION_ERROR"
  | "EMBEDDING_UNAVAILABLE"
  | "GENERATION_UNAVAILABLE"
  | "RETRIEVAL_FAILED"
  | "BUILD_FAILED"
  | "EMPTY_INDEX"
  | "INDEX_CORRUPT"
  | "QUERY_CANCELLED"
  | "CONFIG_ERROR";

/** Base class for every failure the pipeline raises on purpose. */
export class DocQaError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocQaError";
    this.code = code;
  }
}

/** A document could not be read or decoded; the build skips it. */
export class IngestionError extends DocQaError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("INGESTION_ERROR", `${path}: ${message}`, options);
    this.name = "IngestionError";
    this.path = path;
  }
}

export class EmbeddingUnavailable extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_UNAVAILABLE", message, options);
    this.name = "EmbeddingUnavailable";
  }
}

export class GenerationUnavailable extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_UNAVAILABLE", message, options);
    this.name = "GenerationUnavailable";
  }
}

export class RetrievalFailed extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL_FAILED", message, options);
    this.name = "RetrievalFailed";
  }
}

export class BuildFailed extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BUILD_FAILED", message, options);
    this.name = "BuildFailed";
  }
}

export class EmptyIndex extends DocQaError {
  constructor(message = "No index has been built yet.") {
    super("EMPTY_INDEX", message);
    this.name = "EmptyIndex";
  }
}

export class IndexCorrupt extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_CORRUPT", message, options);
    this.name = "IndexCorrupt";
  }
}

export class QueryCancelled extends DocQaError {
  constructor(options?: { cause?: unknown }) {
    super("QUERY_CANCELLED", "Query was cancelled by the caller.", options);
    this.name = "QueryCancelled";
  }
}

export class ConfigError extends DocQaError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
