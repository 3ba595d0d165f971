import { EmptyIndex, createLogger, loadConfig, type RetrievedChunk } from "@docqa/core";
import { createDocQa } from "@docqa/pipeline";
import { readArgs } from "./cliArgs.js";

const log = createLogger("cli", { command: "query" });

const config = loadConfig();
const args = readArgs();
const q = args.string("q");
const topK = args.number("topK", 8);

if (!q) {
  console.error("Usage: npm run query -- --q <question> [--topK 8]");
  process.exit(1);
}

const app = await createDocQa(config);
log.info({ topK, indexSize: app.handle.current().size }, "start");

let results: RetrievedChunk[];
try {
  results = await app.retriever.retrieve(q, topK);
} catch (err) {
  if (err instanceof EmptyIndex) {
    console.error("[query] no index yet, run `npm run ingest` first");
    process.exit(1);
  }
  throw err;
}

console.log("[query] results:", results.length);

for (const r of results) {
  const md = r.chunk.metadata;

  console.log("—".repeat(80));
  console.log(`similarity: ${r.similarity.toFixed(4)}`);
  console.log(`source: ${md.sourcePath}${md.sectionPath ? `  >  ${md.sectionPath}` : ""}`);
  console.log(`bytes: ${md.startOffset}-${md.endOffset}`);
  console.log("");
  console.log(r.chunk.text.slice(0, 600));
  if (r.chunk.text.length > 600) console.log("…");
}

console.log("—".repeat(80));
