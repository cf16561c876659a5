/**
 * Section chunker: splits the joined text of one heading group into passages
 * of similar length, cutting only between sentences
 */

import { DEFAULT_MAX_PASSAGE_LENGTH } from "../../config.js";
import type { SentenceSplitter } from "../../types.js";
import { PipelineError, internalError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { codePointLength } from "../utils/text.js";

/**
 * Plan the number of chunks and the per-chunk target length.
 * Starts from the rounded ratio and adds chunks until the average fits.
 */
export function planChunks(totalLength: number, maxLength: number): { count: number; target: number } {
  if (!(maxLength > 0)) {
    throw new PipelineError(internalError("chunk budget must be positive", { maxLength }));
  }

  let count = Math.max(1, Math.round(totalLength / maxLength));
  let target = totalLength / count;

  // count can never need to exceed totalLength
  const limit = Math.max(1, Math.ceil(totalLength));
  while (target > maxLength) {
    if (count >= limit) {
      throw new PipelineError(internalError("chunk planning did not converge", { totalLength, maxLength }));
    }
    count++;
    target = totalLength / count;
  }

  return { count, target };
}

/**
 * Split text into sentences line by line. The last sentence collected after
 * each line gets a trailing newline, so line breaks survive as sentence suffixes.
 */
export function splitSentences(text: string, splitter: SentenceSplitter): string[] {
  const sentences: string[] = [];
  for (const line of text.split(/\n+/)) {
    sentences.push(...splitter(line));
    if (sentences.length > 0) {
      sentences[sentences.length - 1] += "\n";
    }
  }
  return sentences;
}

/**
 * Split the text of one section into chunks of roughly equal length.
 *
 * Text within `maxLength` is returned as is. Otherwise sentences are packed
 * into `count` planned chunks; a chunk is closed before a sentence once half
 * of that sentence would reach the running target. The last planned chunk
 * takes whatever remains, even past `maxLength`.
 */
export function splitSection(
  text: string,
  splitter: SentenceSplitter,
  maxLength: number = DEFAULT_MAX_PASSAGE_LENGTH
): string[] {
  const totalLength = codePointLength(text);
  if (totalLength <= maxLength) {
    return [text];
  }

  const { count, target } = planChunks(totalLength, maxLength);
  const chunks: string[] = [];
  let chunkId = 1;
  let consumed = 0;
  let chunkText = "";

  for (const sentence of splitSentences(text, splitter)) {
    const length = codePointLength(sentence);

    if (chunkId !== count && consumed + Math.floor(length / 2) >= target * chunkId) {
      chunkId++;
      const closed = chunkText.trim();
      if (closed) {
        chunks.push(closed);
      }
      chunkText = "";
    }

    consumed += length;
    chunkText += sentence;
  }

  const last = chunkText.trim();
  if (last) {
    chunks.push(last);
  }

  logger.debug("Chunked section", {
    length: totalLength,
    planned: count,
    chunk_count: chunks.length,
  });

  return chunks;
}
