export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./hash.js";
export { loadDotenv } from "./env.js";
