// packages/vectorstore/src/sqliteSidecar.ts

import Database from "better-sqlite3";
import type { Chunk } from "@docqa/core";

export interface IndexManifest {
  buildId: string;
  dimension: number;
  count: number;
  embeddingModel: string;
  createdAt: string;
}

type ChunkRow = {
  row_idx: number;
  chunk_id: string;
  source_path: string;
  section_heading: string;
  section_path: string;
  ordinal: number;
  start_offset: number;
  end_offset: number;
  text: string;
};

type MetaRow = { key: string; value: string };

/**
 * Metadata half of a persisted index: one SQLite row per vector row, holding
 * everything needed to turn a search hit back into a chunk.
 */
export class SqliteSidecar {
  private db: Database.Database;

  constructor(private readonly dbPath: string, opts?: { readonly?: boolean }) {
    this.db = opts?.readonly
      ? new Database(dbPath, { readonly: true, fileMustExist: true })
      : new Database(dbPath);
  }

  init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        row_idx INTEGER PRIMARY KEY,
        chunk_id TEXT NOT NULL UNIQUE,
        source_path TEXT NOT NULL,
        section_heading TEXT NOT NULL,
        section_path TEXT NOT NULL,
        ordinal INTEGER NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        text TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  writeChunks(chunks: readonly Chunk[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO chunks (
        row_idx, chunk_id, source_path, section_heading, section_path,
        ordinal, start_offset, end_offset, text
      )
      VALUES (
        @row_idx, @chunk_id, @source_path, @section_heading, @section_path,
        @ordinal, @start_offset, @end_offset, @text
      );
    `);

    const tx = this.db.transaction((items: readonly Chunk[]) => {
      items.forEach((chunk, row) => {
        const md = chunk.metadata;
        stmt.run({
          row_idx: row,
          chunk_id: chunk.id,
          source_path: md.sourcePath,
          section_heading: md.sectionHeading,
          section_path: md.sectionPath,
          ordinal: md.ordinal,
          start_offset: md.startOffset,
          end_offset: md.endOffset,
          text: chunk.text,
        });
      });
    });

    tx(chunks);
  }

  writeManifest(manifest: IndexManifest): void {
    const stmt = this.db.prepare(`
      INSERT INTO meta (key, value) VALUES (@key, @value)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value;
    `);
    const tx = this.db.transaction((entries: [string, string][]) => {
      for (const [key, value] of entries) stmt.run({ key, value });
    });
    tx([
      ["build_id", manifest.buildId],
      ["dimension", String(manifest.dimension)],
      ["count", String(manifest.count)],
      ["embedding_model", manifest.embeddingModel],
      ["created_at", manifest.createdAt],
    ]);
  }

  readManifest(): IndexManifest {
    const rows = this.db.prepare<[], MetaRow>(`SELECT key, value FROM meta`).all();
    const meta = new Map(rows.map((r): [string, string] => [r.key, r.value]));
    const required = (key: string): string => {
      const v = meta.get(key);
      if (v === undefined) throw new Error(`metadata key "${key}" missing in ${this.dbPath}`);
      return v;
    };
    const count = (key: string): number => {
      const n = Number(required(key));
      if (!Number.isInteger(n) || n < 0) throw new Error(`metadata key "${key}" is not a count in ${this.dbPath}`);
      return n;
    };

    return {
      buildId: required("build_id"),
      dimension: count("dimension"),
      count: count("count"),
      embeddingModel: required("embedding_model"),
      createdAt: required("created_at"),
    };
  }

  /** All chunks in row order. */
  readChunks(): Chunk[] {
    const rows = this.db
      .prepare<[], ChunkRow>(
        `
        SELECT row_idx, chunk_id, source_path, section_heading, section_path,
               ordinal, start_offset, end_offset, text
        FROM chunks
        ORDER BY row_idx
      `
      )
      .all();

    return rows.map((row, i) => {
      if (row.row_idx !== i) throw new Error(`row ${i} missing in ${this.dbPath}`);
      return {
        id: row.chunk_id,
        text: row.text,
        metadata: {
          sourcePath: row.source_path,
          sectionHeading: row.section_heading,
          sectionPath: row.section_path,
          ordinal: row.ordinal,
          startOffset: row.start_offset,
          endOffset: row.end_offset,
        },
      };
    });
  }

  close(): void {
    this.db.close();
  }
}
