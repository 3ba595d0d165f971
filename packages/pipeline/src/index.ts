export { mapPool, withRetry, Mutex, sleep, type RetryOptions } from "./concurrency.js";
export {
  IndexBuilder,
  type IndexBuilderOptions,
  type BuildStats,
  type BuildReport,
  type RebuildResult,
} from "./indexBuilder.js";
export { Retriever, type RetrieveOptions } from "./retriever.js";
export { assembleContext, type AssembledContext, type ContextBlock } from "./contextAssembler.js";
export { RefusalPolicy, REFUSAL_MESSAGES, refuse, type RefusalPolicyOptions } from "./refusalPolicy.js";
export { resolveSources } from "./citations.js";
export { QueryPipeline, type QueryPipelineOptions } from "./queryPipeline.js";
export {
  parseEvalCases,
  evalCaseSchema,
  chunkLabel,
  sourceLabel,
  sourceMatchesNeedle,
  hitAtK,
  recallAtK,
  relevantChunkIds,
  type EvalCase,
} from "./evaluation.js";
export { createDocQa, type DocQa, type DocQaOptions } from "./app.js";
