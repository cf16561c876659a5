/**
 * Parser module exports
 */

export { walkSections } from "./html-parser.js";
export { extractParagraphs, isKeptParagraph } from "./paragraphs.js";
export { EMPTY_CONTEXT, contextKey, enterSection, withHeading } from "./heading-context.js";
export { parseTagKinds } from "./tags.js";
export { splitSection, planChunks, splitSentences } from "./chunker.js";
export { createSentenceSplitter } from "./sentence-splitter.js";
