/**
 * Tag kind helpers: configuration parsing and selector building
 */

import { TAG_KINDS, type TagKind } from "../../types.js";
import { logger } from "../utils/logger.js";

/**
 * Tags whose text already covers their nested elements
 */
export const CONTAINER_TAGS: readonly TagKind[] = ["dd", "li", "th", "tr"];

export function isTagKind(value: string): value is TagKind {
  return (TAG_KINDS as readonly string[]).includes(value);
}

/**
 * Convert configured tag names to tag kinds.
 * Unknown names are dropped with a warning; they would never match anything.
 */
export function parseTagKinds(names: Iterable<string>, option: string): Set<TagKind> {
  const kinds = new Set<TagKind>();
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (isTagKind(name)) {
      kinds.add(name);
    } else if (name) {
      logger.warn("Ignoring unknown tag name", { option, tag: raw });
    }
  }
  return kinds;
}

/**
 * CSS selector list matching any of the given kinds, or null for an empty set
 */
export function tagSelector(kinds: Iterable<TagKind>): string | null {
  const list = [...kinds];
  return list.length > 0 ? list.join(", ") : null;
}
