import {
  EmptyIndex,
  QueryCancelled,
  createLogger,
  errorMessage,
  preview,
  type AnswerDecision,
  type QueryOptions,
  type QueryResult,
  type RetrievedChunk,
} from "@docqa/core";
import type { GenerationGateway } from "@docqa/models";
import type { IndexHandle } from "@docqa/vectorstore";
import { resolveSources } from "./citations.js";
import { assembleContext } from "./contextAssembler.js";
import { REFUSAL_MESSAGES, refuse, type RefusalPolicy } from "./refusalPolicy.js";
import type { Retriever } from "./retriever.js";

const log = createLogger("pipeline");

export interface QueryPipelineOptions {
  handle: IndexHandle;
  retriever: Retriever;
  generator: GenerationGateway;
  policy: RefusalPolicy;
  topK: number;
  contextMaxChars: number;
}

function toResult(
  decision: AnswerDecision,
  retrieved: RetrievedChunk[],
  context: string,
  sources: string[]
): QueryResult {
  if (decision.state === "ANSWERED") {
    return { answer: decision.answer, refused: false, sources, retrieved, context };
  }
  return {
    answer: REFUSAL_MESSAGES[decision.reason],
    refused: true,
    refusalReason: decision.reason,
    sources: [],
    retrieved,
    context,
  };
}

/**
 * One question in, one QueryResult out: retrieve, gate on similarity,
 * assemble context, generate, judge the answer, cite sources. Holds no
 * state between queries.
 */
export class QueryPipeline {
  constructor(private readonly opts: QueryPipelineOptions) {}

  async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
    const { signal } = options;
    const k = options.k ?? this.opts.topK;
    const threshold = options.threshold ?? this.opts.policy.threshold;
    const budget = options.contextBudget ?? this.opts.contextMaxChars;

    const throwIfCancelled = (cause?: unknown): void => {
      if (signal?.aborted) throw new QueryCancelled({ cause: cause ?? signal.reason });
    };
    throwIfCancelled();

    const index = this.opts.handle.current();

    let retrieved: RetrievedChunk[];
    try {
      retrieved = await this.opts.retriever.retrieve(question, k, { signal, index });
    } catch (err) {
      if (err instanceof EmptyIndex) {
        log.info({ question: preview(question) }, "refused: index is empty");
        return toResult(refuse("empty_index"), [], "", []);
      }
      throwIfCancelled(err);
      log.warn({ question: preview(question), err: errorMessage(err) }, "refused: retrieval failed");
      return toResult(refuse("retrieval_failed"), [], "", []);
    }

    const topScore = retrieved[0]?.similarity;
    const gated = this.opts.policy.gate(retrieved, threshold);
    if (gated) {
      log.info(
        { question: preview(question), retrieved: retrieved.length, topScore, threshold },
        "refused: below threshold"
      );
      return toResult(gated, retrieved, "", []);
    }

    // chunks under the threshold are not grounding material
    const grounded = retrieved.filter((r) => r.similarity >= threshold);
    const assembled = assembleContext(grounded, { maxChars: budget });
    if (assembled.chunkIds.length === 0) {
      log.info({ question: preview(question), budget }, "refused: no context fits the budget");
      return toResult(refuse("no_relevant_context"), retrieved, "", []);
    }

    let generated: string;
    try {
      generated = await this.opts.generator.generate(question, assembled.context, { signal });
    } catch (err) {
      throwIfCancelled(err);
      log.warn({ question: preview(question), err: errorMessage(err) }, "refused: generation failed");
      return toResult(refuse("generation_failed"), retrieved, assembled.context, []);
    }
    throwIfCancelled();

    const decision = this.opts.policy.judge(generated);
    const sources = resolveSources(decision, assembled.chunkIds, (id) => index.get(id));

    log.info(
      {
        question: preview(question),
        retrieved: retrieved.length,
        topScore,
        blocks: assembled.blocks.length,
        outcome: decision.state,
        ...(decision.state === "REFUSED" ? { reason: decision.reason } : {}),
      },
      "query finished"
    );
    return toResult(decision, retrieved, assembled.context, sources);
  }
}
