import { promises as fs } from "node:fs";
import path from "node:path";
import { IngestionError, createLogger, errorMessage, sha256, type RawDocument } from "@docqa/core";
import { isIgnoredDir, isMarkdownFile } from "./ignore.js";

const log = createLogger("ingest");

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const ent of entries) {
    if (ent.isDirectory()) {
      if (isIgnoredDir(ent.name)) continue;
      await walk(path.join(dir, ent.name), out);
    } else if (ent.isFile()) {
      if (!isMarkdownFile(ent.name)) continue;
      out.push(path.join(dir, ent.name));
    }
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export async function readMarkdownFile(absPath: string, relPath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(absPath);
  } catch (err) {
    throw new IngestionError(relPath, `unreadable: ${errorMessage(err)}`, { cause: err });
  }
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new IngestionError(relPath, "not valid UTF-8", { cause: err });
  }
}

export interface LoadedCorpus {
  documents: RawDocument[];
  skipped: IngestionError[];
}

/**
 * Load every Markdown file under `corpusPath`, ordered by relative path so
 * repeated loads of an unchanged corpus return the same sequence. Files that
 * cannot be read are reported in `skipped` instead of failing the load.
 */
export async function loadCorpusDocuments(params: { corpusPath: string }): Promise<LoadedCorpus> {
  const root = path.resolve(params.corpusPath);
  const files: string[] = [];
  try {
    await walk(root, files);
  } catch (err) {
    throw new IngestionError(params.corpusPath, `cannot list corpus: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const byRelPath = files
    .map((absPath) => ({
      absPath,
      relPath: path.relative(root, absPath).replaceAll("\\", "/"),
    }))
    .sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));

  const documents: RawDocument[] = [];
  const skipped: IngestionError[] = [];
  for (const { absPath, relPath } of byRelPath) {
    try {
      const content = await readMarkdownFile(absPath, relPath);
      documents.push({ id: sha256(relPath), path: relPath, content });
    } catch (err) {
      if (!(err instanceof IngestionError)) throw err;
      log.warn({ path: relPath, err: err.message }, "skipping document");
      skipped.push(err);
    }
  }

  log.info({ root, documents: documents.length, skipped: skipped.length }, "corpus loaded");
  return { documents, skipped };
}
