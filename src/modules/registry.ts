/**
 * Registry Module
 * Pass 1: collects the labels of every fragment and detects clashes
 */

import { extractHeadings, LabelRegistry, toDisplayPath } from "../utils";
import type { MergeContext } from "../types";

/**
 * Builds the label registry over all files
 *
 * Reads from context:
 * - files
 *
 * Writes to context:
 * - registry: frozen, read-only from here on
 */
export async function register(ctx: MergeContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before registry");
  }

  const { tracker, logger, identities, config } = ctx;
  const registry = new LabelRegistry();
  let labels = 0;

  for (const file of ctx.files) {
    registry.addFile(file.id);

    const headings = extractHeadings(file.lines, {
      ignoreFencedCode: config.markdown.ignoreFencedCode,
    });

    for (const heading of headings) {
      tracker.incrementHeadings();
      if (registry.addLabel(file.id, heading.label) === "added") {
        labels++;
      }
    }
  }

  registry.freeze();
  tracker.setLabels(labels);

  // Duplicated labels only matter once something links to them
  for (const [identity, clashes] of registry.clashing()) {
    tracker.trackClash(toDisplayPath(identities.pathOf(identity)), clashes);
  }

  logger.debug(
    `Registered ${labels} label(s) in ${registry.files().length} file(s)`,
  );
  ctx.registry = registry;
}
