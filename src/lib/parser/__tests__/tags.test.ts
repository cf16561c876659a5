/**
 * Unit tests for tag kind helpers
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { isTagKind, parseTagKinds, tagSelector } from "../tags.js";
import { logger } from "../../utils/logger.js";

// Mock logger
vi.mock("../../utils/logger.js", () => ({
  logger: {
    warn: vi.fn(),
  },
}));

describe("parseTagKinds", () => {
  beforeEach(() => {
    vi.mocked(logger.warn).mockClear();
  });

  it("should accept known tag names case-insensitively", () => {
    expect(parseTagKinds(["P", " li ", "th"], "tags-to-extract")).toEqual(new Set(["p", "li", "th"]));
  });

  it("should drop unknown tag names with a warning", () => {
    expect(parseTagKinds(["p", "marquee"], "tags-to-extract")).toEqual(new Set(["p"]));
    expect(logger.warn).toHaveBeenCalledWith("Ignoring unknown tag name", {
      option: "tags-to-extract",
      tag: "marquee",
    });
  });

  it("should skip empty names silently", () => {
    expect(parseTagKinds(["", "  "], "tags-to-remove")).toEqual(new Set());
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("isTagKind", () => {
  it("should recognize only known tag names", () => {
    expect(isTagKind("dd")).toBe(true);
    expect(isTagKind("blink")).toBe(false);
  });
});

describe("tagSelector", () => {
  it("should join kinds into a selector list", () => {
    expect(tagSelector(["p", "li"])).toBe("p, li");
  });

  it("should return null for no kinds", () => {
    expect(tagSelector([])).toBeNull();
  });
});
