/**
 * HTML section walker for extracting heading-annotated paragraphs from
 * rendered article pages
 */

import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { ExtractedParagraph, HeadingContext, TagKind, WalkOptions } from "../../types.js";
import { PipelineError, parseError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { normalizeText } from "../utils/text.js";
import { EMPTY_CONTEXT, enterSection, withHeading } from "./heading-context.js";
import { CONTAINER_TAGS, isTagKind, tagSelector } from "./tags.js";

const CONTAINER_SELECTOR = CONTAINER_TAGS.join(", ");

/**
 * Load HTML into a cheerio document
 */
function loadDocument(html: string): cheerio.CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (error) {
    throw new PipelineError(
      parseError("HTML parsing", error instanceof Error ? error.message : String(error)),
      { cause: error }
    );
  }
}

/**
 * Apply a context-only element (h3, h4, dt) to the context.
 * Returns null for elements that produce paragraphs.
 */
function applyHeading(
  context: HeadingContext,
  tag: TagKind,
  text: string
): HeadingContext | null {
  switch (tag) {
    case "h3":
    case "h4":
    case "dt":
      return withHeading(context, tag, text);
    default:
      return null;
  }
}

/**
 * Walk the top-level sections of a page and yield its paragraphs in
 * document order, each with the heading context in effect at that point.
 *
 * The walk starts at the first `section` element and follows its sibling
 * sections. Elements matching `tagsToRemove` are emptied before a section is
 * read, and elements nested in a `dd`, `li`, `th` or `tr` are skipped since
 * their container already yields their text. The document is edited in place
 * while walking, so the generator cannot be restarted.
 */
export function* walkSections(
  html: string,
  options: WalkOptions
): Generator<ExtractedParagraph, void, undefined> {
  const $ = loadDocument(html);
  const extractSelector = tagSelector(options.tagsToExtract);
  const removeSelector = tagSelector(options.tagsToRemove);
  const innerSelector = tagSelector(options.innerTagsToRemove);
  const readText = (el: cheerio.Cheerio<Element>): string =>
    normalizeText(el.text(), options.unicodeForm);

  let context = EMPTY_CONTEXT;
  let $section = $("section").first();

  while ($section.length > 0) {
    const $h2 = $section.find("h2").first();
    if ($h2.length > 0) {
      context = enterSection(readText($h2));
    }

    if (removeSelector) {
      $section.find(removeSelector).empty();
    }

    const elements: Element[] = extractSelector ? $section.find(extractSelector).toArray() : [];

    for (const el of elements) {
      const $el = $(el);
      if ($el.parents(CONTAINER_SELECTOR).length > 0) {
        continue;
      }

      const tag = el.tagName.toLowerCase();
      if (!isTagKind(tag)) {
        continue;
      }

      if (innerSelector) {
        $el.find(innerSelector).empty();
      }

      const text = readText($el);
      const next = applyHeading(context, tag, text);
      if (next) {
        context = next;
        continue;
      }

      yield { context, text, tag };
    }

    $section = $section.nextAll("section").first();
  }

  logger.logParsing("Walked sections", { last_context: context });
}
