/**
 * Stage 2: paragraph records → passages
 */

import type { PassageOptions } from "../types.js";
import { JsonLinesWriter, parseRecord, readJsonLines } from "../lib/io/jsonl.js";
import { ParagraphRecordSchema } from "../lib/io/schemas.js";
import type { GroupableParagraph } from "../lib/passages/grouper.js";
import { groupPassages } from "../lib/passages/grouper.js";
import { logger } from "../lib/utils/logger.js";

const PROGRESS_EVERY = 50_000;

export interface MakePassagesInput {
  paragraphsFile: string;
  outputFile: string;
  options: PassageOptions;
}

export interface MakePassagesResult {
  paragraphs: number;
  passages: number;
}

/**
 * Run the passage stage over a whole file. Any failure aborts the run.
 */
export async function runMakePassages(input: MakePassagesInput): Promise<MakePassagesResult> {
  const { paragraphsFile, outputFile, options } = input;

  logger.logStage("make-passages", "start", {
    input: paragraphsFile,
    output: outputFile,
    max_passage_length: options.maxPassageLength,
  });

  let paragraphs = 0;

  async function* readParagraphs(): AsyncGenerator<GroupableParagraph, void, undefined> {
    for await (const entry of readJsonLines(paragraphsFile)) {
      const record = parseRecord(ParagraphRecordSchema, entry, paragraphsFile);
      paragraphs++;
      yield record;
    }
  }

  const writer = new JsonLinesWriter(outputFile);

  try {
    for await (const passage of groupPassages(readParagraphs(), options)) {
      await writer.write(passage);
      logger.logProgress("make-passages", writer.written, PROGRESS_EVERY, { paragraphs });
    }
  } catch (error) {
    await writer.abort();
    throw error;
  }

  const passages = await writer.close();
  logger.logStage("make-passages", "done", { paragraphs, passages });

  return { paragraphs, passages };
}
