import { QueryCancelled, createLogger, loadConfig, type QueryResult } from "@docqa/core";
import { createDocQa } from "@docqa/pipeline";
import { readArgs } from "./cliArgs.js";

const log = createLogger("cli", { command: "ask" });

function formatSource(r: QueryResult["retrieved"][number]): string {
  const md = r.chunk.metadata;
  const section = md.sectionPath ? `#${md.sectionPath}` : "";
  return `${md.sourcePath}${section}`;
}

const config = loadConfig();
const args = readArgs();

const q = args.string("q");
const k = args.number("k", config.retrieval.topK);
const threshold = args.number("threshold", config.retrieval.similarityThreshold);
const contextBudget = args.number("budget", config.retrieval.contextMaxChars);
const debug = args.flag("debug");
const asJson = args.flag("json");

if (!q) {
  console.error(`Usage:
npm run ask -- --q "..." \\
  [--k 3] \\
  [--threshold 0.55] \\
  [--budget 6000] \\
  [--json] \\
  [--debug]`);
  process.exit(1);
}

log.info({ k, threshold, contextBudget, model: config.ollama.generationModel }, "start");

const app = await createDocQa(config);

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

let result: QueryResult;
try {
  result = await app.pipeline.query(q, { k, threshold, contextBudget, signal: controller.signal });
} catch (err) {
  if (err instanceof QueryCancelled) {
    console.error("[ask] cancelled");
    process.exit(130);
  }
  throw err;
}

if (asJson) {
  console.log(JSON.stringify(result, null, 2));
  process.exit(0);
}

if (debug) {
  console.log("\n=== RETRIEVED ===\n");
  result.retrieved.forEach((r, i) => {
    console.log(`${i + 1}. ${formatSource(r)} (similarity=${r.similarity.toFixed(4)})`);
  });
  console.log("\n=== CONTEXT (debug) ===\n");
  console.log(result.context || "(generation skipped)");
}

console.log("\n=== ANSWER ===\n");
console.log(result.answer);

if (result.refused) {
  console.log(`\n(refused: ${result.refusalReason ?? "unknown"})`);
} else {
  console.log("\n=== SOURCES ===\n");
  result.sources.forEach((s) => console.log(`- ${s}`));
}
