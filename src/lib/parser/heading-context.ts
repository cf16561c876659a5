/**
 * Immutable heading context threaded through the section walker.
 *
 * Levels are ordered h2 > h3 > h4 > dt. Setting a level clears every level
 * below it and leaves the levels above it as they are, set or not.
 */

import type { HeadingContext } from "../../types.js";

export const HEADING_LEVELS = ["h2", "h3", "h4", "dt"] as const;

export type HeadingLevel = (typeof HEADING_LEVELS)[number];

export const EMPTY_CONTEXT: HeadingContext = Object.freeze({});

/**
 * Return a new context with `level` set to `text` and all lower levels cleared
 */
export function withHeading(
  context: HeadingContext,
  level: HeadingLevel,
  text: string
): HeadingContext {
  const depth = HEADING_LEVELS.indexOf(level);
  const next: { -readonly [K in HeadingLevel]?: string } = {};

  for (const parent of HEADING_LEVELS.slice(0, depth)) {
    const value = context[parent];
    if (value !== undefined) {
      next[parent] = value;
    }
  }
  next[level] = text;

  return Object.freeze(next);
}

/**
 * Context for a section that starts with its own h2
 */
export function enterSection(h2: string): HeadingContext {
  return withHeading(EMPTY_CONTEXT, "h2", h2);
}

/**
 * Stable key of a context, used to group records with the same headings
 */
export function contextKey(context: HeadingContext): string {
  return JSON.stringify(HEADING_LEVELS.map((level) => context[level] ?? null));
}
