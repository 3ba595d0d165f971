import type { AnswerDecision, Chunk, ChunkId } from "@docqa/core";

/**
 * Distinct source paths of the chunks that made it into the context, in the
 * order they first appear there. A refusal cites nothing.
 */
export function resolveSources(
  decision: AnswerDecision,
  contextChunkIds: readonly ChunkId[],
  lookup: (id: ChunkId) => Chunk | undefined
): string[] {
  if (decision.state === "REFUSED") return [];

  const sources: string[] = [];
  const seen = new Set<string>();
  for (const id of contextChunkIds) {
    const sourcePath = lookup(id)?.metadata.sourcePath;
    if (sourcePath === undefined || seen.has(sourcePath)) continue;
    seen.add(sourcePath);
    sources.push(sourcePath);
  }
  return sources;
}
