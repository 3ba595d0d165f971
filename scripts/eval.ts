import { readFileSync } from "node:fs";
import { createLogger, loadConfig } from "@docqa/core";
import { createDocQa, hitAtK, parseEvalCases, recallAtK, relevantChunkIds, sourceLabel } from "@docqa/pipeline";
import { readArgs } from "./cliArgs.js";

const log = createLogger("cli", { command: "eval" });

const args = readArgs();
const evalPath = args.string("evalPath") ?? "eval/sample.jsonl";
const topK = args.number("topK", 5);
const ks = [1, 3, 5].filter((x) => x <= topK);
const debugMisses = args.flag("debugMisses");

const config = loadConfig();

const cases = parseEvalCases(readFileSync(evalPath, "utf8"));
if (cases.length === 0) {
  console.error("[eval] no cases found in", evalPath);
  process.exit(1);
}

const app = await createDocQa(config);
const index = app.handle.current();
if (index.size === 0) {
  console.error("[eval] no index yet, run `npm run ingest` first");
  process.exit(1);
}
log.info({ evalPath, cases: cases.length, topK, ks, indexSize: index.size }, "start");

let total = 0;
const hits: Record<number, number> = Object.fromEntries(ks.map((k) => [k, 0]));
const recalls: Record<number, number> = Object.fromEntries(ks.map((k) => [k, 0]));

for (const c of cases) {
  total++;

  const retrieved = await app.retriever.retrieve(c.q, topK, { index });
  const sources = retrieved.map(sourceLabel);
  const retrievedIds = retrieved.map((r) => r.chunk.id);
  const relevantIds = relevantChunkIds(index.listChunks(), c.mustContain);

  for (const k of ks) {
    if (hitAtK(sources, c.mustContain, k)) {
      hits[k] = (hits[k] ?? 0) + 1;
    }
    if (recallAtK(retrievedIds, relevantIds, k)) {
      recalls[k] = (recalls[k] ?? 0) + 1;
    }
  }

  const ok3 = hitAtK(sources, c.mustContain, 3);
  const best = sources[0] ?? "(none)";
  const top = retrieved[0]?.similarity.toFixed(4) ?? "-";

  console.log(`[case ${c.id ?? total}] hit@3=${ok3 ? "yes" : "no"} best=${best} top=${top} q="${c.q}"`);

  if (!ok3 && debugMisses) {
    console.log("  mustContain:", c.mustContain);
    console.log("  top sources:");
    for (const s of sources) console.log(`   - ${s}`);
  }
}

console.log("\n=== RESULTS ===");
for (const k of ks) {
  const hitCount = hits[k] ?? 0;
  const rate = total === 0 ? 0 : hitCount / total;
  console.log(`hit@${k}: ${hitCount}/${total} = ${(rate * 100).toFixed(1)}%`);
}
for (const k of ks) {
  const recallCount = recalls[k] ?? 0;
  const rate = total === 0 ? 0 : recallCount / total;
  console.log(`recall@${k} (chunk ids): ${recallCount}/${total} = ${(rate * 100).toFixed(1)}%`);
}
