import { describe, it, expect } from "vitest";
import { extractHeadings, parseHeading } from "./extract-headings";

describe("parseHeading", () => {
  it("splits marker, text and label", () => {
    expect(parseHeading("## Some Section", 3)).toEqual({
      line: 3,
      level: 2,
      marker: "##",
      text: "Some Section",
      label: "some-section",
    });
  });

  it("accepts headings without a space after the marker", () => {
    expect(parseHeading("#NoSpace", 0)?.text).toBe("NoSpace");
  });

  it("trims trailing whitespace from the text", () => {
    expect(parseHeading("### Trailing   ", 0)?.text).toBe("Trailing");
  });

  it("has no level limit", () => {
    expect(parseHeading("####### Deep", 0)?.level).toBe(7);
  });

  it("returns an empty label for a bare marker", () => {
    expect(parseHeading("####", 0)).toEqual({
      line: 0,
      level: 4,
      marker: "####",
      text: "",
      label: "",
    });
  });

  it("ignores lines not starting with #", () => {
    expect(parseHeading("  # indented", 0)).toBeNull();
    expect(parseHeading("text # not a heading", 0)).toBeNull();
    expect(parseHeading("", 0)).toBeNull();
  });
});

describe("extractHeadings", () => {
  it("returns headings in file order without deduplicating", () => {
    const lines = ["# Intro", "text", "## Setup", "", "# Intro"];

    expect(extractHeadings(lines).map((h) => [h.line, h.label])).toEqual([
      [0, "intro"],
      [2, "setup"],
      [4, "intro"],
    ]);
  });

  // ==========================================================================
  // Fenced code
  // ==========================================================================
  describe("fenced code", () => {
    const lines = ["# Title", "```sh", "# comment", "```", "## After"];

    it("treats every # line as a heading by default", () => {
      expect(extractHeadings(lines).map((h) => h.label)).toEqual([
        "title",
        "comment",
        "after",
      ]);
    });

    it("skips lines inside fences when asked to", () => {
      const headings = extractHeadings(lines, { ignoreFencedCode: true });
      expect(headings.map((h) => h.label)).toEqual(["title", "after"]);
    });
  });
});
