import path from "node:path";

// Build output and tool caches, never documentation.
export const DEFAULT_IGNORE_DIRS = new Set([
  ".git",
  "node_modules",
  "dist",
  "build",
  ".next",
  ".cache",
  "coverage",
]);

export const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown"]);

export function isIgnoredDir(name: string): boolean {
  return DEFAULT_IGNORE_DIRS.has(name);
}

export function isMarkdownFile(name: string): boolean {
  return MARKDOWN_EXTENSIONS.has(path.extname(name).toLowerCase());
}
