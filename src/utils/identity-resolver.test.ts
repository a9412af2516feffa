import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  link,
  mkdir,
  mkdtemp,
  realpath,
  rm,
  symlink,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { InodeIdentityResolver } from "./identity-resolver";
import { IdentityError } from "./errors";

describe("InodeIdentityResolver", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await realpath(
      await mkdtemp(path.join(tmpdir(), "md-anchor-merge-identity-")),
    );
    await mkdir(path.join(dir, "sub"));
    await writeFile(path.join(dir, "a.md"), "# A\n");
    await writeFile(path.join(dir, "sub", "b.md"), "# B\n");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("builds identities from the prefix and the inode", async () => {
    const resolver = new InodeIdentityResolver();
    expect(await resolver.identify(path.join(dir, "a.md"))).toMatch(/^n\d+$/);

    const custom = new InodeIdentityResolver("doc");
    expect(await custom.identify(path.join(dir, "a.md"))).toMatch(/^doc\d+$/);
  });

  it("gives the same identity whatever path reaches the file", async () => {
    const resolver = new InodeIdentityResolver();
    const direct = await resolver.identify(path.join(dir, "a.md"));

    expect(await resolver.identify(path.join(dir, "sub", "..", "a.md"))).toBe(direct);
    expect(
      await resolver.identify(path.relative(process.cwd(), path.join(dir, "a.md"))),
    ).toBe(direct);
  });

  it("follows symbolic links", async () => {
    await symlink(path.join(dir, "a.md"), path.join(dir, "alias.md"));
    const resolver = new InodeIdentityResolver();

    expect(await resolver.identify(path.join(dir, "alias.md"))).toBe(
      await resolver.identify(path.join(dir, "a.md")),
    );
  });

  it("maps a file reached through a symlink back to its real path", async () => {
    await symlink(path.join(dir, "a.md"), path.join(dir, "alias.md"));
    const resolver = new InodeIdentityResolver();
    const identity = await resolver.identify(path.join(dir, "a.md"));
    await resolver.identify(path.join(dir, "alias.md"));

    expect(resolver.pathOf(identity)).toBe(path.join(dir, "a.md"));
  });

  it("gives different files different identities", async () => {
    const resolver = new InodeIdentityResolver();
    const a = await resolver.identify(path.join(dir, "a.md"));
    const b = await resolver.identify(path.join(dir, "sub", "b.md"));

    expect(a).not.toBe(b);
  });

  it("rejects missing files and directories", async () => {
    const resolver = new InodeIdentityResolver();

    await expect(resolver.identify(path.join(dir, "missing.md"))).rejects.toBeInstanceOf(
      IdentityError,
    );
    await expect(resolver.identify(path.join(dir, "sub"))).rejects.toBeInstanceOf(
      IdentityError,
    );
  });

  it("maps identities back to the absolute path", async () => {
    const resolver = new InodeIdentityResolver();
    const identity = await resolver.identify(path.join(dir, "sub", "..", "a.md"));

    expect(resolver.pathOf(identity)).toBe(path.join(dir, "a.md"));
  });

  it("fails on unknown identities", () => {
    const resolver = new InodeIdentityResolver();
    expect(() => resolver.pathOf("n0")).toThrow(IdentityError);
  });

  it("fails when an identity was reached through two distinct paths", async () => {
    await link(path.join(dir, "a.md"), path.join(dir, "hard.md"));
    const resolver = new InodeIdentityResolver();
    const identity = await resolver.identify(path.join(dir, "a.md"));
    await resolver.identify(path.join(dir, "hard.md"));

    expect(() => resolver.pathOf(identity)).toThrow(/ambiguous/);
  });
});
