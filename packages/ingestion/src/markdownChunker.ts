import { chunkIdFor, type Chunk, type CleanedDocument } from "@docqa/core";

export const DEFAULT_MAX_CHARS = 3000;

type MdSection = {
  start: number;
  end: number;
  heading: string; // nearest enclosing heading, "" before the first one
  sectionPath: string; // "Title > Sub"
  headingEnd: number; // no cut may fall before this offset
};

function splitSections(doc: CleanedDocument): MdSection[] {
  const { text, headings } = doc;
  const sections: MdSection[] = [];
  const headerStack: { level: number; title: string }[] = [];

  const first = headings[0];
  if (!first || first.start > 0) {
    sections.push({
      start: 0,
      end: first ? first.start : text.length,
      heading: "",
      sectionPath: "",
      headingEnd: 0,
    });
  }

  headings.forEach((h, i) => {
    while (headerStack.length > 0 && (headerStack[headerStack.length - 1]?.level ?? 0) >= h.level) {
      headerStack.pop();
    }
    headerStack.push({ level: h.level, title: h.title });

    sections.push({
      start: h.start,
      end: headings[i + 1]?.start ?? text.length,
      heading: h.title,
      sectionPath: headerStack.map((s) => s.title).join(" > "),
      headingEnd: h.end,
    });
  });

  return sections;
}

const SENTENCE_END_RE = /[.!?]["')\]]?\s+/g;

function lastMatchEnd(window: string, re: RegExp): number {
  let end = -1;
  for (const m of window.matchAll(re)) end = (m.index ?? 0) + m[0].length;
  return end;
}

/**
 * Best cut position in [floor, limit]: after a paragraph break, else after a
 * sentence end, else after a line break, else after whitespace. -1 if the
 * window has none of these.
 */
function findCut(text: string, floor: number, limit: number): number {
  if (floor >= limit) return -1;
  const window = text.slice(floor, limit);

  const para = window.lastIndexOf("\n\n");
  if (para !== -1) return floor + para + 2;

  const sentence = lastMatchEnd(window, SENTENCE_END_RE);
  if (sentence > 0) return floor + sentence;

  const line = window.lastIndexOf("\n");
  if (line !== -1) return floor + line + 1;

  const space = lastMatchEnd(window, /\s+/g);
  if (space > 0) return floor + space;

  return -1;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function* splitSection(text: string, sec: MdSection, maxChars: number): Generator<[number, number]> {
  let pos = sec.start;

  while (sec.end - pos > maxChars) {
    const limit = pos + maxChars;
    const floor = Math.max(pos + Math.floor(maxChars / 2), sec.headingEnd);

    let cut = findCut(text, floor, limit);
    if (cut === -1) {
      cut = Math.max(limit, sec.headingEnd);
      if (cut > pos + 1 && isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
    }
    if (cut >= sec.end) break;

    yield [pos, cut];
    pos = cut;
  }

  yield [pos, sec.end];
}

function* generateChunks(doc: CleanedDocument, maxChars: number): Generator<Chunk> {
  const { text, sourcePath } = doc;
  let ordinal = 0;
  let byteOffset = 0;

  for (const sec of splitSections(doc)) {
    for (const [start, end] of splitSection(text, sec, maxChars)) {
      const piece = text.slice(start, end);
      const startOffset = byteOffset;
      byteOffset += Buffer.byteLength(piece, "utf8");

      yield {
        id: chunkIdFor(sourcePath, ordinal),
        text: piece,
        metadata: {
          sourcePath,
          sectionHeading: sec.heading,
          sectionPath: sec.sectionPath,
          ordinal,
          startOffset,
          endOffset: byteOffset,
        },
      };
      ordinal++;
    }
  }
}

/**
 * Split a cleaned document into passages. Every heading opens a new chunk and
 * long sections are cut near `maxChars` at the nicest boundary available.
 * The chunks tile the text exactly: joining their `text` in order gives back
 * `doc.text`. The returned iterable is lazy and can be iterated again.
 */
export function chunkMarkdownDocument(
  doc: CleanedDocument,
  opts?: { maxChars?: number }
): Iterable<Chunk> {
  const maxChars = opts?.maxChars ?? DEFAULT_MAX_CHARS;
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
  }
  return { [Symbol.iterator]: () => generateChunks(doc, maxChars) };
}

/**
 * Text sent to the embedding model for a chunk. Continuation chunks of a
 * long section do not start with their heading, so it is prepended here.
 */
export function embeddingInput(chunk: Chunk): string {
  const { sectionPath } = chunk.metadata;
  const body = chunk.text.trim();
  if (!sectionPath || body.startsWith("#")) return body;
  return `${sectionPath}\n\n${body}`;
}
