import type { CleanedDocument, Heading, RawDocument } from "@docqa/core";

/**
 * Strip artifacts left behind by HTML → Markdown conversion. This is
 * deliberately light: embedding models cope with Markdown, they do not cope
 * with anchor ids and permalink text glued onto every heading.
 */
export function cleanMarkdown(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .replace(/\{#[^}\n]*\}/g, "")
    .replace(/headerlink/gi, "")
    .replace(/[ \t]+/g, " ")
    .replace(/ +\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

const HEADING_RE = /^(#{1,6})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE_RE = /^(```|~~~)/;

/** ATX headings of an already cleaned text, ignoring fenced code blocks. */
export function extractHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  let fence: string | null = null;
  let offset = 0;

  for (const line of text.split("\n")) {
    const start = offset;
    offset += line.length + 1;

    const fenceMatch = FENCE_RE.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1] ?? "";
      if (fence === null) fence = marker;
      else if (fence === marker) fence = null;
      continue;
    }
    if (fence !== null) continue;

    const m = HEADING_RE.exec(line);
    if (!m) continue;
    headings.push({
      level: (m[1] ?? "#").length,
      title: (m[2] ?? "").trim(),
      start,
      end: start + line.length,
    });
  }

  return headings;
}

export function prepareDocument(doc: RawDocument): CleanedDocument {
  const text = cleanMarkdown(doc.content);
  return { sourcePath: doc.path, text, headings: extractHeadings(text) };
}
