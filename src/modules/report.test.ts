import { describe, it, expect } from "vitest";
import { stripVTControlCharacters } from "node:util";
import {
  createContext,
  LabelRegistry,
  loadDefaultConfig,
  Logger,
  mergeConfig,
} from "../utils";
import type { LinkError, MergeContext, PartialMergeConfig } from "../types";
import { formatReport } from "./report";

async function reportContext(
  overrides: PartialMergeConfig = {},
): Promise<MergeContext> {
  const ctx = createContext({
    config: mergeConfig(await loadDefaultConfig(), overrides),
    inputs: ["/docs/a.md", "/docs/b.md"],
    output: "/out/merged.md",
    logger: new Logger("error"),
  });

  const registry = new LabelRegistry();
  registry.addLabel("n1", "intro");
  registry.addLabel("n1", "setup");
  registry.addLabel("n1", "intro");
  registry.addFile("n2");
  registry.freeze();

  ctx.files = [
    { sourcePath: "/docs/a.md", relativePath: "a.md", id: "n1", lines: [] },
    { sourcePath: "/docs/b.md", relativePath: "b.md", id: "n2", lines: [] },
  ];
  ctx.registry = registry;
  ctx.report = new Map();
  ctx.tracker.setTotalFiles(2);
  return ctx;
}

function plainReport(ctx: MergeContext): string[] {
  return formatReport(ctx).map((line) => stripVTControlCharacters(line));
}

describe("formatReport", () => {
  it("lists the target and every input", async () => {
    const lines = plainReport(await reportContext());

    expect(lines).toContain(`   ◉ ${"Target".padEnd(18)} /out/merged.md`);
    expect(lines).toContain("      · a.md");
    expect(lines).toContain("      · b.md");
  });

  it("shows the labels of each file", async () => {
    const lines = plainReport(await reportContext());

    expect(lines).toContain("   a.md -> intro, setup");
    expect(lines).toContain("   b.md -> (no labels)");
  });

  it("hides the labels when context display is off", async () => {
    const lines = plainReport(
      await reportContext({ logging: { showContext: false } }),
    );

    expect(lines).not.toContain("   a.md -> intro, setup");
    expect(lines).not.toContain("\n  Context");
  });

  it("warns about duplicated labels", async () => {
    const ctx = await reportContext();
    ctx.tracker.trackClash("/docs/a.md", ["intro"]);
    const lines = plainReport(ctx);

    expect(lines).toContain(
      "   ◆ Some sections have the same name and therefore the same label",
    );
    expect(lines).toContain('      · in file "/docs/a.md" for label intro');
  });

  it("groups link errors by referencing file", async () => {
    const ctx = await reportContext();
    ctx.report = new Map<string, LinkError[]>([
      [
        "/docs/b.md",
        [
          { type: "dead-label", target: "/docs/a.md", label: "gone" },
          { type: "direct-link", target: "/docs/a.md" },
        ],
      ],
    ]);
    const lines = plainReport(ctx);

    expect(lines[1]).toMatch(/^ {2}✖ Link Validation Failed · \d+(ms|\.\d{2}s)$/);
    const start = lines.indexOf("   ✖ on file /docs/b.md");
    expect(lines.slice(start, start + 3)).toEqual([
      "   ✖ on file /docs/b.md",
      '      · dead-label: link to missing label "gone" in file "/docs/a.md"',
      '      · direct-link: link to file "/docs/a.md" without a section label',
    ]);
  });

  it("titles a finished merge", async () => {
    const ctx = await reportContext();
    ctx.merged = true;
    const lines = plainReport(ctx);

    expect(lines[1]).toMatch(/^ {2}✔ Merge Complete · /);
    expect(lines).toContain(`   ◉ ${"Files".padEnd(18)} 2`);
  });

  it("titles a dry run", async () => {
    const lines = plainReport(await reportContext());
    expect(lines[1]).toMatch(/^ {2}✔ Validation Complete · /);
  });
});
