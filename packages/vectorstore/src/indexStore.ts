import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { IndexCorrupt, createLogger, errorMessage, type Chunk } from "@docqa/core";
import { SqliteSidecar, type IndexManifest } from "./sqliteSidecar.js";
import { VectorIndex } from "./vectorIndex.js";

const log = createLogger("store");

const CURRENT_FILE = "CURRENT";
const VECTORS_FILE = "vectors.f32";
const METADATA_FILE = "metadata.sqlite";
const GENERATION_PREFIX = "gen-";
const STAGING_PREFIX = ".tmp-";
const BYTES_PER_FLOAT = 4;

export interface IndexStore {
  /** Live index, or null when nothing has been published yet. */
  load(): Promise<VectorIndex | null>;
  /** Persist a new generation and make it the live one. */
  save(index: VectorIndex, info: { embeddingModel: string }): Promise<IndexManifest>;
}

export function encodeVectors(vectors: Float32Array): Buffer {
  const buf = Buffer.alloc(vectors.length * BYTES_PER_FLOAT);
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  vectors.forEach((v, i) => view.setFloat32(i * BYTES_PER_FLOAT, v, true));
  return buf;
}

export function decodeVectors(buf: Uint8Array): Float32Array {
  if (buf.byteLength % BYTES_PER_FLOAT !== 0) {
    throw new IndexCorrupt(`Vector file length ${buf.byteLength} is not a multiple of ${BYTES_PER_FLOAT}`);
  }
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  const out = new Float32Array(buf.byteLength / BYTES_PER_FLOAT);
  for (let i = 0; i < out.length; i++) {
    out[i] = view.getFloat32(i * BYTES_PER_FLOAT, true);
  }
  return out;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Index persisted as generation directories under `indexDir`, with a
 * `CURRENT` file naming the live one. A generation is fully written before
 * `CURRENT` is replaced, so readers never see a half-written index.
 */
export class FileIndexStore implements IndexStore {
  constructor(private readonly indexDir: string) {}

  async load(): Promise<VectorIndex | null> {
    let generation: string;
    try {
      generation = (await fs.readFile(path.join(this.indexDir, CURRENT_FILE), "utf8")).trim();
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    if (!generation.startsWith(GENERATION_PREFIX) || generation.includes("/")) {
      throw new IndexCorrupt(`CURRENT names an invalid generation "${generation}"`);
    }

    const genDir = path.join(this.indexDir, generation);
    let manifest: IndexManifest;
    let chunks: Chunk[];
    let sidecar: SqliteSidecar | undefined;
    try {
      sidecar = new SqliteSidecar(path.join(genDir, METADATA_FILE), { readonly: true });
      manifest = sidecar.readManifest();
      chunks = sidecar.readChunks();
    } catch (err) {
      throw new IndexCorrupt(`Cannot read metadata for ${generation}: ${errorMessage(err)}`, { cause: err });
    } finally {
      sidecar?.close();
    }

    let raw: Buffer;
    try {
      raw = await fs.readFile(path.join(genDir, VECTORS_FILE));
    } catch (err) {
      throw new IndexCorrupt(`Cannot read vectors for ${generation}: ${errorMessage(err)}`, { cause: err });
    }
    const vectors = decodeVectors(raw);

    if (chunks.length !== manifest.count) {
      throw new IndexCorrupt(`${generation}: manifest counts ${manifest.count} chunks, found ${chunks.length}`);
    }
    if (vectors.length !== manifest.count * manifest.dimension) {
      throw new IndexCorrupt(
        `${generation}: expected ${manifest.count} x ${manifest.dimension} vector values, found ${vectors.length}`
      );
    }

    log.info({ generation, count: manifest.count, dimension: manifest.dimension }, "index loaded");
    return VectorIndex.fromRows(chunks, vectors, manifest.dimension);
  }

  async save(index: VectorIndex, info: { embeddingModel: string }): Promise<IndexManifest> {
    const buildId = `${new Date().toISOString().replace(/[-:.]/g, "")}-${randomUUID().slice(0, 8)}`;
    const generation = `${GENERATION_PREFIX}${buildId}`;
    const manifest: IndexManifest = {
      buildId,
      dimension: index.dimension,
      count: index.size,
      embeddingModel: info.embeddingModel,
      createdAt: new Date().toISOString(),
    };

    await fs.mkdir(this.indexDir, { recursive: true });
    const tmpDir = path.join(this.indexDir, `${STAGING_PREFIX}${buildId}`);
    await fs.mkdir(tmpDir);

    try {
      await fs.writeFile(path.join(tmpDir, VECTORS_FILE), encodeVectors(index.rawVectors()));

      const sidecar = new SqliteSidecar(path.join(tmpDir, METADATA_FILE));
      try {
        sidecar.init();
        sidecar.writeChunks(index.listChunks());
        sidecar.writeManifest(manifest);
      } finally {
        sidecar.close();
      }

      await fs.rename(tmpDir, path.join(this.indexDir, generation));
    } catch (err) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      throw err;
    }

    const pointerTmp = path.join(this.indexDir, `${CURRENT_FILE}.tmp`);
    await fs.writeFile(pointerTmp, `${generation}\n`, "utf8");
    await fs.rename(pointerTmp, path.join(this.indexDir, CURRENT_FILE));
    log.info({ generation, count: manifest.count }, "index published");

    await this.pruneGenerations(generation);
    return manifest;
  }

  private async pruneGenerations(keep: string): Promise<void> {
    const entries = await fs.readdir(this.indexDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name === keep) continue;
      // older generations, and staging dirs of an interrupted save
      const stale = entry.name.startsWith(GENERATION_PREFIX) || entry.name.startsWith(STAGING_PREFIX);
      if (!stale) continue;
      try {
        await fs.rm(path.join(this.indexDir, entry.name), { recursive: true, force: true });
      } catch (err) {
        log.warn({ generation: entry.name, err: errorMessage(err) }, "could not remove old generation");
      }
    }
  }
}
