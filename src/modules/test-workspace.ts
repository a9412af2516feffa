/**
 * Temporary on-disk workspace for pipeline tests
 */

import {
  mkdir,
  mkdtemp,
  readFile,
  realpath,
  rm,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { createContext, loadDefaultConfig, Logger, mergeConfig } from "../utils";
import type { MergeContext, PartialMergeConfig } from "../types";
import { merge, register, scan, validate } from "./index";

export interface Workspace {
  dir: string;
  path(...segments: string[]): string;
  write(files: Record<string, string>): Promise<void>;
  read(relativePath: string): Promise<string>;
  context(
    inputs: string[],
    overrides?: PartialMergeConfig,
  ): Promise<MergeContext>;
  cleanup(): Promise<void>;
}

export async function createWorkspace(): Promise<Workspace> {
  const dir = await realpath(
    await mkdtemp(path.join(tmpdir(), "md-anchor-merge-")),
  );
  const resolve = (...segments: string[]) => path.join(dir, ...segments);

  return {
    dir,
    path: resolve,
    async write(files) {
      for (const [relativePath, content] of Object.entries(files)) {
        const filePath = resolve(relativePath);
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, content, "utf-8");
      }
    },
    read: (relativePath) => readFile(resolve(relativePath), "utf-8"),
    async context(inputs, overrides = {}) {
      const config = mergeConfig(await loadDefaultConfig(), overrides);
      return createContext({
        config,
        inputs: inputs.map((input) => resolve(input)),
        output: resolve("merged.md"),
        logger: new Logger("error"),
      });
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Passes 0 to 3, as run by the merge command
 */
export async function runPipeline(ctx: MergeContext): Promise<void> {
  await scan(ctx);
  await register(ctx);
  await validate(ctx);
  if (!ctx.dryRun) await merge(ctx);
}
