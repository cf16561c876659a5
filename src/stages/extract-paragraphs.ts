/**
 * Stage 1: page HTML records → paragraph records
 */

import type { ExtractOptions } from "../types.js";
import { JsonLinesWriter, parseRecord, readJsonLines } from "../lib/io/jsonl.js";
import { PageHtmlRecordSchema } from "../lib/io/schemas.js";
import { extractParagraphs } from "../lib/parser/paragraphs.js";
import { logger } from "../lib/utils/logger.js";

const PROGRESS_EVERY = 10_000;

export interface ExtractParagraphsInput {
  pageHtmlsFile: string;
  outputFile: string;
  options: ExtractOptions;
}

export interface ExtractParagraphsResult {
  documents: number;
  paragraphs: number;
}

/**
 * Run the extract stage over a whole file. Any failure aborts the run.
 */
export async function runExtractParagraphs(
  input: ExtractParagraphsInput
): Promise<ExtractParagraphsResult> {
  const { pageHtmlsFile, outputFile, options } = input;

  logger.logStage("extract-paragraphs", "start", {
    input: pageHtmlsFile,
    output: outputFile,
    tags_to_extract: [...options.tagsToExtract],
    tags_to_remove: [...options.tagsToRemove],
    inner_tags_to_remove: [...options.innerTagsToRemove],
    sections_to_ignore: [...options.sectionsToIgnore],
    min_paragraph_length: options.minParagraphLength,
    max_paragraph_length: options.maxParagraphLength,
  });

  const writer = new JsonLinesWriter(outputFile);
  let documents = 0;

  try {
    for await (const entry of readJsonLines(pageHtmlsFile)) {
      const page = parseRecord(PageHtmlRecordSchema, entry, pageHtmlsFile);
      for (const paragraph of extractParagraphs(page, options)) {
        await writer.write(paragraph);
      }
      documents++;
      logger.logProgress("extract-paragraphs", documents, PROGRESS_EVERY, {
        paragraphs: writer.written,
      });
    }
  } catch (error) {
    await writer.abort();
    throw error;
  }

  const paragraphs = await writer.close();
  logger.logStage("extract-paragraphs", "done", { documents, paragraphs });

  return { documents, paragraphs };
}
