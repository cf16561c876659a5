/**
 * Paragraph filtering and record construction for one page
 */

import type { ExtractOptions, ExtractedParagraph, PageHtmlRecord, ParagraphRecord } from "../../types.js";
import { codePointLength } from "../utils/text.js";
import { walkSections } from "./html-parser.js";

type ParagraphFilter = Pick<ExtractOptions, "sectionsToIgnore" | "minParagraphLength" | "maxParagraphLength">;

/**
 * Decide whether a walked paragraph is kept.
 * Only the h2 level is matched against the ignore list.
 */
export function isKeptParagraph(paragraph: ExtractedParagraph, filter: ParagraphFilter): boolean {
  const h2 = paragraph.context.h2;
  if (h2 !== undefined && filter.sectionsToIgnore.has(h2)) {
    return false;
  }

  const length = codePointLength(paragraph.text);
  return length >= filter.minParagraphLength && length <= filter.maxParagraphLength;
}

/**
 * Extract the kept paragraphs of a page as output records.
 * `paragraph_index` counts kept paragraphs only, starting at 0.
 */
export function* extractParagraphs(
  page: PageHtmlRecord,
  options: ExtractOptions
): Generator<ParagraphRecord, void, undefined> {
  let paragraphIndex = 0;

  for (const paragraph of walkSections(page.html, options)) {
    if (!isKeptParagraph(paragraph, options)) {
      continue;
    }

    yield {
      id: `${page.pageid}-${page.revid}-${paragraphIndex}`,
      pageid: page.pageid,
      revid: page.revid,
      paragraph_index: paragraphIndex,
      title: page.title,
      section: { ...paragraph.context },
      text: paragraph.text,
      html_tag: paragraph.tag,
    };
    paragraphIndex++;
  }
}
