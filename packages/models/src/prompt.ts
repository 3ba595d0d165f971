/** The exact reply the model is told to give when the context has no answer. */
export const NOT_FOUND_ANSWER = "Not found in the documentation.";

export const SYSTEM_PROMPT = [
  "You are an internal documentation assistant for a software engineering team.",
  "Answer ONLY using the documentation context you are given.",
  "Do not use prior knowledge and do not guess.",
  `If the context does not contain the answer, reply exactly: "${NOT_FOUND_ANSWER}"`,
].join(" ");

export function buildGroundedPrompt(question: string, context: string): string {
  return [
    `Documentation context:\n${context}\n`,
    `Question:\n${question}\n`,
    "Write a short, factual answer based only on the context above. Answer:",
  ].join("\n");
}
