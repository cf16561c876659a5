/**
 * Text normalization shared by the extract and passage stages
 */

import type { UnicodeForm } from "../../types.js";

// Control, format, surrogate, private-use and unassigned code points,
// except the ones collapsed as whitespace below.
const NON_PRINTABLE = /(?![\s\x1c-\x1f\x85])[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}]/gu;

const WHITESPACE_RUN = /[\s\x1c-\x1f\x85]+/g;

const MAX_PASSES = 4;

function normalizePass(text: string, form: UnicodeForm): string {
  return text
    .normalize(form)
    .replace(NON_PRINTABLE, "")
    .replace(WHITESPACE_RUN, " ")
    .trim();
}

/**
 * Normalize paragraph text: Unicode normalization, non-printable characters
 * removed, whitespace runs collapsed to one space, trimmed.
 *
 * Removing a format character can leave a base letter next to a combining
 * mark, so passes repeat until the text is stable.
 */
export function normalizeText(text: string, form: UnicodeForm = "NFC"): string {
  let current = normalizePass(text, form);
  for (let pass = 1; pass < MAX_PASSES; pass++) {
    const next = normalizePass(current, form);
    if (next === current) {
      break;
    }
    current = next;
  }
  return current;
}

/**
 * Length in Unicode code points (astral characters count once)
 */
export function codePointLength(text: string): number {
  let length = 0;
  for (const _char of text) {
    length++;
  }
  return length;
}
