export { ollamaEmbedOne, ollamaGenerate, OllamaError, type OllamaCallOptions, type GenerateOptions } from "./ollama.js";
export {
  OllamaEmbeddingGateway,
  NOMIC_PREFIXES,
  E5_PREFIXES,
  applyRolePrefix,
  assertUsableVector,
  type EmbeddingGateway,
  type EmbeddingPrefixes,
  type OllamaEmbeddingOptions,
} from "./embeddingGateway.js";
export {
  OllamaGenerationGateway,
  DETERMINISTIC_DECODING,
  type GenerationGateway,
  type OllamaGenerationOptions,
} from "./generationGateway.js";
export { NOT_FOUND_ANSWER, SYSTEM_PROMPT, buildGroundedPrompt } from "./prompt.js";
