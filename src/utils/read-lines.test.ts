import { describe, it, expect } from "vitest";
import { splitLines } from "./read-lines";

describe("splitLines", () => {
  it("does not produce a line for the final terminator", () => {
    expect(splitLines("# A\ntext\n")).toEqual(["# A", "text"]);
  });

  it("keeps blank lines before the end", () => {
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
  });

  it("handles CRLF line endings", () => {
    expect(splitLines("a\r\nb")).toEqual(["a", "b"]);
  });

  it("returns no lines for an empty file", () => {
    expect(splitLines("")).toEqual([]);
  });
});
