export type ChunkId = string;
export type DocumentId = string;

export interface RawDocument {
  id: DocumentId;
  /** Path relative to the corpus root, always "/"-separated. */
  path: string;
  content: string;
}

export interface Heading {
  level: number;
  title: string;
  /** Character offsets of the heading line (newline excluded) in the cleaned text. */
  start: number;
  end: number;
}

export interface CleanedDocument {
  sourcePath: string;
  text: string;
  headings: Heading[];
}

export interface ChunkMetadata {
  sourcePath: string;
  sectionHeading: string; // "" when the chunk precedes any heading
  sectionPath: string; // "Title > Sub"
  ordinal: number;
  startOffset: number; // utf-8 bytes
  endOffset: number;
}

export interface Chunk {
  id: ChunkId;
  text: string;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk {
  chunk: Chunk;
  vector: ArrayLike<number>;
}

export type EmbeddingRole = "query" | "passage";

export interface RetrievedChunk {
  chunk: Chunk;
  similarity: number;
}

export interface SearchHit {
  chunkId: ChunkId;
  score: number;
}

export interface QueryOptions {
  k?: number;
  threshold?: number;
  contextBudget?: number;
  signal?: AbortSignal;
}

export type RefusalReason =
  | "empty_index"
  | "retrieval_failed"
  | "no_relevant_context"
  | "generation_failed"
  | "model_detected_absence";

export type AnswerDecision =
  | { state: "ANSWERED"; answer: string }
  | { state: "REFUSED"; reason: RefusalReason };

export interface QueryResult {
  answer: string;
  refused: boolean;
  refusalReason?: RefusalReason;
  sources: string[];
  retrieved: RetrievedChunk[];
  /** Assembled context handed to generation; "" when generation was skipped. */
  context: string;
}
