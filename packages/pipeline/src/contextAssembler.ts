import type { ChunkId, RetrievedChunk } from "@docqa/core";

export interface ContextBlock {
  /** "S1", "S2", ... in emission order. */
  label: string;
  sourcePath: string;
  heading: string;
  chunkIds: ChunkId[];
  /** Rendered block, header line included. */
  text: string;
  truncated: boolean;
}

export interface AssembledContext {
  context: string;
  /** Chunks that made it into `context`, in the order they appear. */
  chunkIds: ChunkId[];
  blocks: ContextBlock[];
}

const BLOCK_SEPARATOR = "\n\n";

// Run of contiguous chunks from one document, ranked by its best member.
type Group = {
  sourcePath: string;
  first: number;
  last: number;
  members: RetrievedChunk[];
};

function dedupe(ranked: readonly RetrievedChunk[]): RetrievedChunk[] {
  const seen = new Set<ChunkId>();
  return ranked.filter((r) => {
    if (seen.has(r.chunk.id)) return false;
    seen.add(r.chunk.id);
    return true;
  });
}

function groupContiguous(ranked: readonly RetrievedChunk[]): Group[] {
  const groups: Group[] = [];

  for (const r of ranked) {
    const { sourcePath, ordinal } = r.chunk.metadata;
    const touching = groups.filter(
      (g) => g.sourcePath === sourcePath && (ordinal === g.last + 1 || ordinal === g.first - 1)
    );

    const [target, ...others] = touching;
    if (!target) {
      groups.push({ sourcePath, first: ordinal, last: ordinal, members: [r] });
      continue;
    }

    // a chunk can bridge two runs; fold the later-ranked one into the earlier
    target.members.push(r);
    for (const other of others) {
      target.members.push(...other.members);
      groups.splice(groups.indexOf(other), 1);
    }
    target.members.sort((a, b) => a.chunk.metadata.ordinal - b.chunk.metadata.ordinal);
    target.first = Math.min(target.first, ordinal, ...others.map((g) => g.first));
    target.last = Math.max(target.last, ordinal, ...others.map((g) => g.last));
  }

  return groups;
}

function headingOf(group: Group): string {
  return group.members[0]?.chunk.metadata.sectionPath ?? "";
}

function headerLine(n: number, group: Group): string {
  const heading = headingOf(group);
  return `[S${n}] ${group.sourcePath}${heading ? ` > ${heading}` : ""}`;
}

function bodyOf(group: Group): string {
  return group.members.map((m) => m.chunk.text).join("").trim();
}

function toBlock(n: number, group: Group): ContextBlock {
  return {
    label: `S${n}`,
    sourcePath: group.sourcePath,
    heading: headingOf(group),
    chunkIds: group.members.map((m) => m.chunk.id),
    text: `${headerLine(n, group)}\n${bodyOf(group)}`,
    truncated: false,
  };
}

/** Cut a block down to `maxChars`, keeping only the chunks whose text survives. */
function truncateBlock(n: number, group: Group, maxChars: number): ContextBlock | null {
  const head = `${headerLine(n, group)}\n`;
  const room = maxChars - head.length;
  if (room < 1) return null;

  const raw = group.members.map((m) => m.chunk.text).join("");
  const body = raw.trim();
  let keep = room > 1 ? room - 1 : room;
  const last = body.charCodeAt(keep - 1);
  if (last >= 0xd800 && last <= 0xdbff) keep -= 1;
  const kept = room > 1 ? `${body.slice(0, keep).trimEnd()}…` : body.slice(0, keep);

  const lead = raw.length - raw.trimStart().length;
  const chunkIds: ChunkId[] = [];
  let start = -lead;
  for (const m of group.members) {
    if (start < keep) chunkIds.push(m.chunk.id);
    start += m.chunk.text.length;
  }

  return {
    label: `S${n}`,
    sourcePath: group.sourcePath,
    heading: headingOf(group),
    chunkIds,
    text: `${head}${kept}`,
    truncated: true,
  };
}

function finish(blocks: ContextBlock[]): AssembledContext {
  return {
    context: blocks.map((b) => b.text).join(BLOCK_SEPARATOR),
    chunkIds: blocks.flatMap((b) => b.chunkIds),
    blocks,
  };
}

/**
 * Turn ranked retrieval results into a labelled context of at most
 * `maxChars` characters.
 *
 * Contiguous chunks of one document are merged into a single block. When
 * every block fits they are all emitted in rank order. Otherwise only the
 * best-ranked block of each document is considered, and blocks are emitted
 * in rank order until the next one would overflow; the first block is
 * truncated if it cannot fit on its own.
 */
export function assembleContext(
  ranked: readonly RetrievedChunk[],
  opts: { maxChars: number }
): AssembledContext {
  const { maxChars } = opts;
  const groups = groupContiguous(dedupe(ranked));
  if (groups.length === 0 || maxChars <= 0) return finish([]);

  const all = groups.map((g, i) => toBlock(i + 1, g));
  const full = finish(all);
  if (full.context.length <= maxChars) return full;

  const seenDocs = new Set<string>();
  const candidates = groups.filter((g) => {
    if (seenDocs.has(g.sourcePath)) return false;
    seenDocs.add(g.sourcePath);
    return true;
  });

  const blocks: ContextBlock[] = [];
  let used = 0;
  for (const group of candidates) {
    const n = blocks.length + 1;
    const block = toBlock(n, group);
    const cost = (blocks.length > 0 ? BLOCK_SEPARATOR.length : 0) + block.text.length;
    if (used + cost <= maxChars) {
      blocks.push(block);
      used += cost;
      continue;
    }
    if (blocks.length === 0) {
      const cut = truncateBlock(n, group, maxChars);
      if (cut) blocks.push(cut);
    }
    break;
  }

  return finish(blocks);
}
