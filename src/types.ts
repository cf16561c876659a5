/**
 * Core type definitions for the paragraph and passage pipeline
 */

/**
 * HTML element names the pipeline can extract, remove or strip.
 * Configuration strings outside this list are ignored.
 */
export const TAG_KINDS = [
  "p",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "dl",
  "dt",
  "dd",
  "ul",
  "ol",
  "li",
  "table",
  "caption",
  "tr",
  "th",
  "td",
  "sup",
  "sub",
  "blockquote",
  "pre",
  "figure",
  "figcaption",
  "div",
  "span",
  "style",
  "script",
] as const;

export type TagKind = (typeof TAG_KINDS)[number];

/**
 * Unicode normalization forms accepted for paragraph text
 */
export type UnicodeForm = "NFC" | "NFKC";

/**
 * Nearest enclosing heading text at each tracked level.
 * An absent key means the level is unset.
 */
export interface HeadingContext {
  readonly h2?: string;
  readonly h3?: string;
  readonly h4?: string;
  readonly dt?: string;
}

/**
 * One rendered article, as read by the extract stage
 */
export interface PageHtmlRecord {
  pageid: number;
  revid: number;
  title: string;
  html: string;
}

/**
 * A paragraph produced by the section walker, before filtering
 */
export interface ExtractedParagraph {
  context: HeadingContext;
  text: string;
  tag: TagKind;
}

/**
 * One line of the extract stage's output
 */
export interface ParagraphRecord {
  /** `pageid-revid-paragraph_index` */
  id: string;
  pageid: number;
  revid: number;
  paragraph_index: number;
  title: string;
  section: HeadingContext;
  text: string;
  html_tag: string;
}

/**
 * One line of the passage stage's output
 */
export interface PassageRecord {
  id: number;
  pageid: number;
  revid: number;
  title: string;
  section: HeadingContext;
  text: string;
}

/**
 * Splits one line of text into sentences whose concatenation is the line
 */
export type SentenceSplitter = (line: string) => string[];

/**
 * Options of the section walker
 */
export interface WalkOptions {
  tagsToExtract: ReadonlySet<TagKind>;
  tagsToRemove: ReadonlySet<TagKind>;
  innerTagsToRemove: ReadonlySet<TagKind>;
  unicodeForm: UnicodeForm;
}

/**
 * Options of the extract stage: walker options plus paragraph filters
 */
export interface ExtractOptions extends WalkOptions {
  sectionsToIgnore: ReadonlySet<string>;
  minParagraphLength: number;
  maxParagraphLength: number;
}

/**
 * Options of the passage stage
 */
export interface PassageOptions {
  maxPassageLength: number;
  splitter: SentenceSplitter;
}

/**
 * Standardized error payload
 */
export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Process-wide configuration read from the environment
 */
export interface PipelineConfig {
  logLevel: "debug" | "info" | "warn" | "error";
  /** BCP 47 locale handed to the sentence segmenter */
  sentenceLocale: string;
  unicodeForm: UnicodeForm;
}
