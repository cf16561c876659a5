/**
 * Schemas of the records read from disk
 */

import * as z from "zod";

export const PageHtmlRecordSchema = z.object({
  pageid: z.number().int(),
  revid: z.number().int(),
  title: z.string(),
  html: z.string(),
});

export const HeadingContextSchema = z.object({
  h2: z.string().optional(),
  h3: z.string().optional(),
  h4: z.string().optional(),
  dt: z.string().optional(),
});

export const ParagraphRecordSchema = z.object({
  pageid: z.number().int(),
  revid: z.number().int(),
  title: z.string(),
  section: HeadingContextSchema,
  text: z.string(),
});
