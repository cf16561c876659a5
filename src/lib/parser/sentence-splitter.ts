/**
 * Sentence splitting backed by the ICU sentence segmenter
 */

import type { SentenceSplitter } from "../../types.js";

/**
 * Build a splitter for a locale. Segments keep their trailing whitespace,
 * so the sentences of a line concatenate back to the line.
 */
export function createSentenceSplitter(locale: string): SentenceSplitter {
  const segmenter = new Intl.Segmenter(locale, { granularity: "sentence" });
  return (line: string): string[] =>
    Array.from(segmenter.segment(line), (part) => part.segment);
}
