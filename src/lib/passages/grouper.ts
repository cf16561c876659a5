/**
 * Passage grouper: merges consecutive paragraphs that share a title and
 * heading context and cuts each group into passages
 */

import type { HeadingContext, ParagraphRecord, PassageOptions, PassageRecord } from "../../types.js";
import { contextKey } from "../parser/heading-context.js";
import { splitSection } from "../parser/chunker.js";

/**
 * The fields of a paragraph record the grouper reads
 */
export type GroupableParagraph = Pick<ParagraphRecord, "pageid" | "revid" | "title" | "section" | "text">;

function groupKey(paragraph: GroupableParagraph): string {
  return JSON.stringify([paragraph.title, contextKey(paragraph.section)]);
}

/**
 * Turn an ordered paragraph stream into passages.
 *
 * Passage ids start at 0 and increase by one per emitted passage across the
 * whole stream. Each passage carries the identity of the last paragraph of
 * its group.
 */
export async function* groupPassages(
  paragraphs: Iterable<GroupableParagraph> | AsyncIterable<GroupableParagraph>,
  options: PassageOptions
): AsyncGenerator<PassageRecord, void, undefined> {
  let nextId = 0;
  let buffer: string[] = [];
  let previous: GroupableParagraph | null = null;

  function* flush(last: GroupableParagraph): Generator<PassageRecord, void, undefined> {
    const sectionText = buffer.join("\n");
    const section: HeadingContext = { ...last.section };
    for (const chunk of splitSection(sectionText, options.splitter, options.maxPassageLength)) {
      yield {
        id: nextId++,
        pageid: last.pageid,
        revid: last.revid,
        title: last.title,
        section,
        text: chunk,
      };
    }
    buffer = [];
  }

  for await (const paragraph of paragraphs) {
    if (previous && groupKey(paragraph) !== groupKey(previous)) {
      yield* flush(previous);
    }
    buffer.push(paragraph.text);
    previous = paragraph;
  }

  if (previous) {
    yield* flush(previous);
  }
}
