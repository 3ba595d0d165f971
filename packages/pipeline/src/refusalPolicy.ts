import type { AnswerDecision, RefusalReason, RetrievedChunk } from "@docqa/core";
import { NOT_FOUND_ANSWER } from "@docqa/models";

/** Answer text shown to the caller for each refusal reason. */
export const REFUSAL_MESSAGES: Record<RefusalReason, string> = {
  empty_index: "The documentation index is empty. Build it before asking questions.",
  retrieval_failed: "The documentation could not be searched right now. Please try again.",
  no_relevant_context: NOT_FOUND_ANSWER,
  generation_failed: "An answer could not be generated right now. Please try again.",
  model_detected_absence: NOT_FOUND_ANSWER,
};

export interface RefusalPolicyOptions {
  /** Minimum top similarity needed before generation is attempted. */
  threshold: number;
  /** Phrasings that mean the model found nothing in the context. */
  patterns: readonly RegExp[];
}

export function refuse(reason: RefusalReason): AnswerDecision {
  return { state: "REFUSED", reason };
}

/**
 * Two gates decide between ANSWERED and REFUSED: a similarity gate before
 * generation, and a check of the generated text after it.
 */
export class RefusalPolicy {
  constructor(private readonly opts: RefusalPolicyOptions) {}

  get threshold(): number {
    return this.opts.threshold;
  }

  /**
   * Similarity gate. Returns a refusal when nothing was retrieved or the top
   * score is below the threshold, or null when generation may proceed.
   */
  gate(retrieved: readonly RetrievedChunk[], threshold = this.opts.threshold): AnswerDecision | null {
    const top = retrieved[0];
    if (!top || top.similarity < threshold) return refuse("no_relevant_context");
    return null;
  }

  /** Judge the generated text. Blank output counts as absence. */
  judge(generated: string): AnswerDecision {
    const answer = generated.trim();
    if (answer === "") return refuse("model_detected_absence");
    if (this.opts.patterns.some((p) => matches(p, answer))) return refuse("model_detected_absence");
    return { state: "ANSWERED", answer };
  }
}

// global/sticky regexes keep lastIndex between calls
function matches(pattern: RegExp, text: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(text);
}
