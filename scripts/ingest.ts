import { createLogger, loadConfig } from "@docqa/core";
import { createDocQa } from "@docqa/pipeline";
import { readArgs } from "./cliArgs.js";

const log = createLogger("cli", { command: "ingest" });

const config = loadConfig();
const corpusPath = readArgs().string("corpus") ?? config.corpusDir;

log.info({ corpusPath, indexDir: config.indexDir, embeddingModel: config.ollama.embeddingModel }, "start");

// an unreadable old index must not block a rebuild
const app = await createDocQa(config, { loadIndex: false });
const result = await app.builder.rebuild(corpusPath);

if (result.status === "failure") {
  console.error(`[ingest] failed: ${result.error.message}`);
  process.exit(1);
}

const { report } = result;
console.log("[ingest] done", {
  buildId: report.buildId,
  documents: report.documents,
  chunks: report.chunks,
  dropped: report.dropped,
  skippedFiles: report.skippedFiles,
  dimension: report.dimension,
  durationMs: report.durationMs,
});
