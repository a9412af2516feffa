/**
 * Scanner Module
 * Expands input arguments, reads fragments and assigns their identities
 */

import glob from "fast-glob";
import path from "node:path";
import {
  InputError,
  isFile,
  readLines,
  sortByNumericPrefix,
  toDisplayPath,
} from "../utils";
import type { FileDescriptor, FileIdentity, MergeContext } from "../types";

/**
 * Expand one input argument into absolute file paths
 * Glob patterns are sorted by numeric prefix; literal paths must exist
 */
async function expandInput(input: string): Promise<string[]> {
  if (glob.isDynamicPattern(input)) {
    const matches = await glob(input, { absolute: true, onlyFiles: true });
    return sortByNumericPrefix(matches.map((match) => path.resolve(match)));
  }

  const absolutePath = path.resolve(input);
  if (!(await isFile(absolutePath))) {
    throw new InputError(`Input file not found: ${input}`);
  }
  return [absolutePath];
}

/**
 * Scans input arguments and populates context
 *
 * Writes to context:
 * - files: fragments in document order, one per identity
 */
export async function scan(ctx: MergeContext): Promise<void> {
  const { tracker, logger, identities } = ctx;
  const files: FileDescriptor[] = [];
  const seen = new Map<FileIdentity, string>(); // identity -> first path

  for (const input of ctx.inputs) {
    const paths = await expandInput(input);

    if (paths.length === 0) {
      logger.warn(`Pattern matched no files: ${input}`);
    }

    for (const sourcePath of paths) {
      const id = await identities.identify(sourcePath);
      const relativePath = toDisplayPath(sourcePath);

      // The same file reached twice would clash with itself on every label
      const firstSeen = seen.get(id);
      if (firstSeen !== undefined) {
        logger.warn(`Skipping ${relativePath}: same file as ${firstSeen}`);
        tracker.trackDuplicateInput(relativePath, firstSeen);
        continue;
      }
      seen.set(id, relativePath);

      let lines: string[];
      try {
        lines = await readLines(sourcePath);
      } catch (error) {
        tracker.trackError(relativePath, error, "file", "read");
        throw error;
      }

      logger.debug(`${relativePath} -> ${id} (${lines.length} lines)`);
      files.push({ sourcePath, relativePath, id, lines });
    }
  }

  if (files.length === 0) {
    throw new InputError("No input files found");
  }

  // Truncating the output must not destroy one of the fragments
  if (await isFile(ctx.output)) {
    const outputId = await identities.identify(ctx.output);
    const clobbered = seen.get(outputId);
    if (clobbered !== undefined) {
      throw new InputError(`Output file is also an input: ${clobbered}`);
    }
  }

  tracker.setTotalFiles(files.length);
  ctx.files = files;
}
