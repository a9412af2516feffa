import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.markdown).toEqual({ extensions: [".md"], ignoreFencedCode: false });
    expect(config.identity.prefix).toBe("n");
    expect(config.links.local).toBe("keep");
    expect(config.assets.rewrite).toBe(false);
    expect(config.output.pageBreak).toBe("\\newpage");
  });
});

describe("mergeConfig", () => {
  it("overrides nested properties one by one", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      links: { local: "rewrite" },
      output: { pageBreak: "<!-- break -->" },
      markdown: { ignoreFencedCode: true },
    });

    expect(merged.links.local).toBe("rewrite");
    expect(merged.output.pageBreak).toBe("<!-- break -->");
    expect(merged.markdown).toEqual({ extensions: [".md"], ignoreFencedCode: true });
    expect(merged.identity).toEqual(base.identity);
  });

  it("rejects an identity prefix that is not a valid anchor start", async () => {
    const base = await loadDefaultConfig();
    expect(() => mergeConfig(base, { identity: { prefix: "1x" } })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "md-anchor-merge-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const custom = path.join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ identity: { prefix: "doc" } }));

    const { config, errors } = await loadConfig(custom);

    expect(config.identity.prefix).toBe("doc");
    expect(errors.filter((e) => e.path === custom)).toEqual([]);
  });

  it("reports a custom config that is not valid JSON", async () => {
    const custom = path.join(dir, "broken.json");
    await writeFile(custom, "{ not json");

    const { errors } = await loadConfig(custom);
    const error = errors.find((e) => e.path === custom)?.error;

    expect(error).toBeInstanceOf(SyntaxError);
  });

  it("reports a custom config that does not match the schema", async () => {
    const custom = path.join(dir, "invalid.json");
    await writeFile(custom, JSON.stringify({ links: { local: "sometimes" } }));

    const { errors } = await loadConfig(custom);

    expect(errors.some((e) => e.path === custom)).toBe(true);
  });
});
