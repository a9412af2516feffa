/**
 * Identity Resolver
 * Maps files to stable identities and back
 */

import { realpath, stat } from "fs/promises";
import path from "node:path";
import type { FileIdentity } from "../types";
import { IdentityError } from "./errors";

export interface IdentityResolver {
  /**
   * Identity of the file at `filePath`; throws IdentityError when the path
   * does not lead to a regular file
   */
  identify(filePath: string): Promise<FileIdentity>;

  /**
   * Real path of a file previously passed to identify(); throws IdentityError
   * when the identity is unknown or maps to several distinct files (hard links)
   */
  pathOf(identity: FileIdentity): string;
}

/**
 * Identity from the file's inode number, so that "./a.md", "../docs/a.md"
 * and a symlink to it all resolve to the same token.
 *
 * @example
 * const resolver = new InodeIdentityResolver("n");
 * await resolver.identify("docs/a.md") // "n1835021"
 * resolver.pathOf("n1835021") // "/work/docs/a.md"
 */
export class InodeIdentityResolver implements IdentityResolver {
  private paths = new Map<FileIdentity, Set<string>>();

  constructor(private prefix: string = "n") {}

  async identify(filePath: string): Promise<FileIdentity> {
    const absolutePath = path.resolve(filePath);

    let isFile: boolean;
    let inode: bigint;
    let realPath: string;
    try {
      const stats = await stat(absolutePath, { bigint: true });
      isFile = stats.isFile();
      inode = stats.ino;
      // Symlinks collapse onto their target; only hard links stay ambiguous
      realPath = await realpath(absolutePath);
    } catch (error) {
      throw new IdentityError(`No file found at "${filePath}"`, {
        cause: error,
      });
    }

    if (!isFile) {
      throw new IdentityError(`"${filePath}" is not a regular file`);
    }

    const identity = `${this.prefix}${inode}`;
    const known = this.paths.get(identity) ?? new Set<string>();
    known.add(realPath);
    this.paths.set(identity, known);
    return identity;
  }

  pathOf(identity: FileIdentity): string {
    const known = Array.from(this.paths.get(identity) ?? []);

    if (known.length === 0) {
      throw new IdentityError(`No file known for identity "${identity}"`);
    }
    if (known.length > 1) {
      throw new IdentityError(
        `Identity "${identity}" is ambiguous: ${known.join(", ")}`,
      );
    }

    return known[0];
  }
}
