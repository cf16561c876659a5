/**
 * Library entry: the two pipeline stages and their building blocks
 */

export * from "./types.js";
export {
  DEFAULT_EXTRACT_OPTIONS,
  DEFAULT_MAX_PASSAGE_LENGTH,
  DEFAULT_SECTIONS_TO_IGNORE,
  initializeConfig,
  loadConfig,
} from "./config.js";
export * from "./lib/parser/index.js";
export { groupPassages } from "./lib/passages/grouper.js";
export { JsonLinesWriter, readJsonLines } from "./lib/io/jsonl.js";
export { ErrorCode, PipelineError } from "./lib/utils/errors.js";
export { normalizeText } from "./lib/utils/text.js";
export { runExtractParagraphs } from "./stages/extract-paragraphs.js";
export { runMakePassages } from "./stages/make-passages.js";
