/**
 * Merger Module
 * Pass 3: streams all fragments into one document with global anchors
 *
 * This module runs only AFTER the validator has accepted every link.
 */

import { open } from "fs/promises";
import type { FileHandle } from "fs/promises";
import path from "node:path";
import {
  codeMask,
  extractLinks,
  rewriteLine,
  toRelativeLink,
} from "../utils";
import type { RewriteOptions } from "../utils";
import type { FileDescriptor, FileIdentity, MergeContext } from "../types";

/**
 * Identity of every labelled cross-file link target of a file,
 * keyed by the path as written in the link
 */
async function resolveTargets(
  file: FileDescriptor,
  ctx: MergeContext,
): Promise<Map<string, FileIdentity>> {
  const targets = new Map<string, FileIdentity>();
  const links = extractLinks(file.lines, {
    extensions: ctx.config.markdown.extensions,
    ignoreFencedCode: ctx.config.markdown.ignoreFencedCode,
  });

  for (const link of links) {
    if (link.kind !== "cross-file" || targets.has(link.path)) continue;
    const target = path.resolve(path.dirname(file.sourcePath), link.path);
    targets.set(link.path, await ctx.identities.identify(target));
  }

  return targets;
}

/**
 * Rewrite options for one file
 */
function rewriteOptions(
  file: FileDescriptor,
  targets: Map<string, FileIdentity>,
  ctx: MergeContext,
): RewriteOptions {
  const { config } = ctx;
  const sourceDir = path.dirname(file.sourcePath);
  const outputDir = path.dirname(ctx.output);

  return {
    fileId: file.id,
    extensions: config.markdown.extensions,
    rewriteLocal: config.links.local === "rewrite",
    resolveTarget: (linkPath) => {
      const identity = targets.get(linkPath);
      if (identity === undefined) {
        throw new Error(`Unresolved link target "${linkPath}" in ${file.relativePath}`);
      }
      return identity;
    },
    assetExtensions: config.assets.rewrite ? config.assets.extensions : [],
    resolveAsset: (assetPath) =>
      toRelativeLink(outputDir, path.resolve(sourceDir, assetPath)),
  };
}

/**
 * Writes the merged document
 *
 * Reads from context:
 * - files, registry, report (must be empty)
 *
 * Writes to context:
 * - merged: false once the output is opened, true once every file is written
 *
 * The output is truncated first and written line by line; the handle is
 * closed on every exit path, leaving a partial file if a write fails.
 */
export async function merge(ctx: MergeContext): Promise<void> {
  if (!ctx.files || !ctx.registry || !ctx.report) {
    throw new Error("Scanner, registry and validator must run before merger");
  }
  if (ctx.report.size > 0) {
    throw new Error("Cannot merge: link validation failed");
  }

  const { tracker, logger, config } = ctx;
  let handle: FileHandle | undefined;

  try {
    const output = await open(ctx.output, "w");
    handle = output;
    ctx.merged = false;

    for (const file of ctx.files) {
      const targets = await resolveTargets(file, ctx);
      const options = rewriteOptions(file, targets, ctx);
      const mask = codeMask(file.lines, config.markdown.ignoreFencedCode);

      for (const [index, line] of file.lines.entries()) {
        if (mask[index]) {
          await output.write(`${line}\n`);
          continue;
        }

        const rewritten = rewriteLine(line, options);
        if (rewritten.heading) tracker.incrementRewrittenHeadings();
        tracker.addRewrittenLinks(rewritten.links);
        tracker.addRewrittenAssets(rewritten.assets);

        await output.write(`${rewritten.text}\n`);
      }

      await output.write(`\n\n${config.output.pageBreak}\n\n`);
      logger.debug(`Merged ${file.relativePath}`);
    }
  } catch (error) {
    tracker.trackError(ctx.output, error, "file", "write");
    throw error;
  } finally {
    await handle?.close();
  }

  ctx.merged = true;
}
