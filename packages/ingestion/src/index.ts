export { loadCorpusDocuments, readMarkdownFile, type LoadedCorpus } from "./corpusLoader.js";
export { cleanMarkdown, extractHeadings, prepareDocument } from "./markdownCleaner.js";
export { chunkMarkdownDocument, embeddingInput, DEFAULT_MAX_CHARS } from "./markdownChunker.js";
export { DEFAULT_IGNORE_DIRS, MARKDOWN_EXTENSIONS, isIgnoredDir, isMarkdownFile } from "./ignore.js";
