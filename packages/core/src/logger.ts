/**
 * Pino-based logging.
 *
 * Logs go to stderr so the CLI scripts keep stdout for answers. Set
 * LOG_PRETTY=true for human-readable output during development.
 */

import pino, { type Logger, type LoggerOptions } from "pino";
import { loadDotenv } from "./env.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const TRUTHY = ["1", "true", "yes", "on"];
const FALSY = ["0", "false", "no", "off"];

/** "true"/"false" style switch; undefined when the text is neither. */
export function parseBooleanFlag(value: string): boolean | undefined {
  const v = value.trim().toLowerCase();
  if (TRUTHY.includes(v)) return true;
  if (FALSY.includes(v)) return false;
  return undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level and output mode from LOG_LEVEL / LOG_PRETTY. Unknown values fall back
 * to "info" and JSON output; loadConfig reports them as errors.
 */
export function resolveLogSettings(env: NodeJS.ProcessEnv): { level: LogLevel; pretty: boolean } {
  const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
  return {
    level: isLogLevel(level) ? level : "info",
    pretty: parseBooleanFlag(env.LOG_PRETTY ?? "") === true,
  };
}

// the root logger is built on import, so .env has to be read first
loadDotenv();
const settings = resolveLogSettings(process.env);

const options: LoggerOptions = {
  level: settings.level,
  base: null,
  timestamp: pino.stdTimeFunctions.isoTime,
};

function createRoot(): Logger {
  if (settings.pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino(
    {
      ...options,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2)
  );
}

export const logger: Logger = createRoot();

export type Scope =
  | "ingest"
  | "chunker"
  | "models"
  | "store"
  | "builder"
  | "retriever"
  | "pipeline"
  | "cli";

/** Child logger tagged with the pipeline stage it belongs to. */
export function createLogger(scope: Scope, bindings?: Record<string, unknown>): Logger {
  return logger.child({ scope, ...bindings });
}

const MAX_TEXT_LENGTH = 120;

/** Shorten free text (questions, chunk previews) before it lands in a log line. */
export function preview(text: string, maxLength = MAX_TEXT_LENGTH): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxLength) return flat;
  return `${flat.slice(0, maxLength)}… (${flat.length} chars)`;
}

export type { Logger };
