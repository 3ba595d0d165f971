import { z } from "zod";
import type { Chunk, ChunkId, RetrievedChunk } from "@docqa/core";

export const evalCaseSchema = z.object({
  id: z.string().optional(),
  q: z.string().min(1),
  /** Source paths (or path prefixes, or "path#section" needles) that count as a hit. */
  mustContain: z.array(z.string().min(1)).min(1),
});

export type EvalCase = z.infer<typeof evalCaseSchema>;

/** Parse a JSONL case file. Blank lines are ignored; errors name the line. */
export function parseEvalCases(raw: string): EvalCase[] {
  const cases: EvalCase[] = [];
  raw.split("\n").forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed.length === 0) return;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (err) {
      throw new Error(`line ${i + 1}: invalid JSON`, { cause: err });
    }
    const parsed = evalCaseSchema.safeParse(json);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((p) => `${p.path.join(".") || "(root)"}: ${p.message}`);
      throw new Error(`line ${i + 1}: ${problems.join("; ")}`);
    }
    cases.push(parsed.data);
  });
  return cases;
}

/** "path#Section > Sub" label used when matching needles. */
export function chunkLabel(chunk: Chunk): string {
  const md = chunk.metadata;
  return md.sectionPath ? `${md.sourcePath}#${md.sectionPath}` : md.sourcePath;
}

export function sourceLabel(r: RetrievedChunk): string {
  return chunkLabel(r.chunk);
}

function pathOnly(s: string): string {
  const idx = s.indexOf("#");
  return idx === -1 ? s : s.slice(0, idx);
}

export function sourceMatchesNeedle(source: string, needle: string): boolean {
  const sPath = pathOnly(source);
  const nPath = pathOnly(needle);
  return sPath === nPath || sPath.startsWith(nPath) || source.includes(needle);
}

/** True when any of the first `k` sources matches any expected needle. */
export function hitAtK(sources: readonly string[], mustContain: readonly string[], k: number): boolean {
  const top = sources.slice(0, k);
  return mustContain.some((needle) => top.some((s) => sourceMatchesNeedle(s, needle)));
}

/** True when the first `k` retrieved ids include at least one relevant id. */
export function recallAtK(
  retrievedIds: readonly ChunkId[],
  relevantIds: readonly ChunkId[],
  k = 5
): boolean {
  const relevant = new Set(relevantIds);
  return retrievedIds.slice(0, k).some((id) => relevant.has(id));
}

/** Ids of the indexed chunks a case's needles point at, in index order. */
export function relevantChunkIds(chunks: Iterable<Chunk>, mustContain: readonly string[]): ChunkId[] {
  const ids: ChunkId[] = [];
  for (const chunk of chunks) {
    const label = chunkLabel(chunk);
    if (mustContain.some((needle) => sourceMatchesNeedle(label, needle))) ids.push(chunk.id);
  }
  return ids;
}
