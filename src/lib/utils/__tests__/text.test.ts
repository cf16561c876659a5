/**
 * Unit tests for text normalization
 */

import { describe, it, expect } from "vitest";
import { codePointLength, normalizeText } from "../text.js";

describe("normalizeText", () => {
  it("should collapse whitespace runs and trim", () => {
    expect(normalizeText("  a \n\t b  ")).toBe("a b");
  });

  it("should apply canonical composition by default", () => {
    expect(normalizeText("ＡＢＣ")).toBe("ＡＢＣ");
    expect(normalizeText("ｶﾞ")).toBe("ｶﾞ");
    expect(normalizeText("e\u0301")).toBe("\u00e9");
    expect(normalizeText("a\u3000b")).toBe("a b");
  });

  it("should fold compatibility characters under NFKC", () => {
    expect(normalizeText("ＡＢＣ１２３", "NFKC")).toBe("ABC123");
    expect(normalizeText("ｶﾞ", "NFKC")).toBe("ガ");
  });

  it("should strip non-printable characters", () => {
    expect(normalizeText("a\u200bb")).toBe("ab");
    expect(normalizeText("a\u0000b")).toBe("ab");
    expect(normalizeText("a\ue000b")).toBe("ab");
  });

  it("should not leave double spaces where characters were stripped", () => {
    expect(normalizeText("a \u200b b")).toBe("a b");
  });

  it("should compose marks left adjacent by stripping", () => {
    expect(normalizeText("e\u200b\u0301")).toBe("\u00e9");
  });

  it("should be idempotent", () => {
    const samples = [
      "  Plain   text  ",
      "ＡＢＣ\u3000ｶﾞ",
      "a \u200b b",
      "e\u200b\u0301",
      "line\u2028break\u2029here",
      "tab\tand\u00a0nbsp",
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe("codePointLength", () => {
  it("should count astral characters once", () => {
    expect(codePointLength("𠮷野家")).toBe(3);
    expect("𠮷野家".length).toBe(4);
  });

  it("should count ASCII characters", () => {
    expect(codePointLength("abc")).toBe(3);
    expect(codePointLength("")).toBe(0);
  });
});
