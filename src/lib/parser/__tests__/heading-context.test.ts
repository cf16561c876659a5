/**
 * Unit tests for the immutable heading context
 */

import { describe, it, expect } from "vitest";
import {
  EMPTY_CONTEXT,
  contextKey,
  enterSection,
  withHeading,
} from "../heading-context.js";

describe("withHeading", () => {
  it("should set a level and keep the levels above it", () => {
    const h2 = enterSection("History");
    const h3 = withHeading(h2, "h3", "Origins");
    const h4 = withHeading(h3, "h4", "Detail");
    const dt = withHeading(h4, "dt", "Term");

    expect(h3).toEqual({ h2: "History", h3: "Origins" });
    expect(h4).toEqual({ h2: "History", h3: "Origins", h4: "Detail" });
    expect(dt).toEqual({ h2: "History", h3: "Origins", h4: "Detail", dt: "Term" });
  });

  it("should clear the levels below the one that changes", () => {
    const full = { h2: "History", h3: "Origins", h4: "Detail", dt: "Term" };
    expect(withHeading(full, "h3", "Later")).toEqual({ h2: "History", h3: "Later" });
    expect(withHeading(full, "h4", "Other")).toEqual({
      h2: "History",
      h3: "Origins",
      h4: "Other",
    });
  });

  it("should set a level even when a level above it is unset", () => {
    expect(withHeading(enterSection("Terms"), "dt", "Word")).toEqual({ h2: "Terms", dt: "Word" });
    expect(withHeading(EMPTY_CONTEXT, "h3", "Lead subheading")).toEqual({ h3: "Lead subheading" });
  });

  it("should reset a term when an ancestor changes", () => {
    const term = withHeading(enterSection("Terms"), "dt", "Word");
    expect(withHeading(term, "h4", "Detail")).toEqual({ h2: "Terms", h4: "Detail" });
    expect(withHeading(term, "dt", "Other")).toEqual({ h2: "Terms", dt: "Other" });
  });

  it("should not mutate its input", () => {
    const h2 = enterSection("History");
    withHeading(h2, "h3", "Origins");
    expect(h2).toEqual({ h2: "History" });
    expect(Object.isFrozen(withHeading(h2, "h3", "Origins"))).toBe(true);
  });
});

describe("enterSection", () => {
  it("should start a fresh context at h2", () => {
    expect(enterSection("Geography")).toEqual({ h2: "Geography" });
  });
});

describe("contextKey", () => {
  it("should ignore keys holding undefined", () => {
    expect(contextKey({ h2: "A" })).toBe(contextKey({ h2: "A", h3: undefined }));
  });

  it("should tell different levels apart", () => {
    expect(contextKey({ h2: "A" })).not.toBe(contextKey({ h2: "A", h3: "B" }));
    expect(contextKey({ h2: "A", h3: "B" })).not.toBe(contextKey({ h2: "A", h4: "B" }));
  });
});
