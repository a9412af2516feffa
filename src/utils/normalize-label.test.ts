import { describe, it, expect } from "vitest";
import { normalizeLabel } from "./normalize-label";

describe("normalizeLabel", () => {
  // ==========================================================================
  // Separators
  // ==========================================================================
  describe("separators", () => {
    it("joins words with a hyphen", () => {
      expect(normalizeLabel("Some Section")).toBe("some-section");
    });

    it("treats slashes like whitespace", () => {
      expect(normalizeLabel("Input/Output")).toBe("input-output");
    });

    it("collapses runs of whitespace, slashes and hyphens", () => {
      expect(normalizeLabel("A - B")).toBe("a-b");
      expect(normalizeLabel("Read \t/ Write")).toBe("read-write");
      expect(normalizeLabel("Pre-requisites")).toBe("pre-requisites");
    });

    it("drops leading and trailing separators", () => {
      expect(normalizeLabel("  Spaced \t out  ")).toBe("spaced-out");
      expect(normalizeLabel("/path/")).toBe("path");
    });
  });

  // ==========================================================================
  // Deleted characters
  // ==========================================================================
  describe("deleted characters", () => {
    it("deletes dots, commas and backticks without a separator", () => {
      expect(normalizeLabel("Version 1.2, `config`")).toBe("version-12-config");
      expect(normalizeLabel("e.g. Foo")).toBe("eg-foo");
    });

    it("keeps other punctuation", () => {
      expect(normalizeLabel("C++ & C#")).toBe("c++-&-c#");
      expect(normalizeLabel("What? (Optional)")).toBe("what?-(optional)");
    });
  });

  // ==========================================================================
  // Case
  // ==========================================================================
  describe("case", () => {
    it("lowercases ASCII letters only", () => {
      expect(normalizeLabel("Café Crème")).toBe("café-crème");
      expect(normalizeLabel("ÄRGER")).toBe("Ärger");
    });

    it("returns an empty label for empty text", () => {
      expect(normalizeLabel("")).toBe("");
      expect(normalizeLabel(" ., ")).toBe("");
    });
  });

  // ==========================================================================
  // Idempotence
  // ==========================================================================
  it("returns the same label when applied to its own output", () => {
    const samples = [
      "Some Section",
      "Pre-requisites",
      "Version 1.2, `config`",
      "  Spaced \t out  ",
      "Input/Output - Overview",
      "C++ & C#",
      "Café Crème",
      "--leading and trailing--",
    ];

    for (const sample of samples) {
      const label = normalizeLabel(sample);
      expect(normalizeLabel(label)).toBe(label);
    }
  });
});
