/**
 * Validator Module
 * Pass 2: checks every link against the completed registry
 */

import path from "node:path";
import { extractLinks, IdentityError, LinkValidationError } from "../utils";
import type { IdentityResolver, LabelRegistry } from "../utils";
import type {
  CrossFileLink,
  FileDescriptor,
  LinkError,
  LocalLink,
  MergeContext,
  ValidationReport,
} from "../types";

/**
 * Classify a cross-file link; null means valid
 * Checks run in order: direct link, unknown file, missing label, clash
 */
export async function checkCrossFileLink(
  link: CrossFileLink,
  sourcePath: string,
  registry: LabelRegistry,
  identities: IdentityResolver,
): Promise<LinkError | null> {
  // Link paths are relative to the referencing file, never to the cwd
  const target = path.resolve(path.dirname(sourcePath), link.path);

  if (link.label === undefined) {
    return { type: "direct-link", target };
  }
  const { label } = link;

  let identity: string;
  try {
    identity = await identities.identify(target);
  } catch (error) {
    if (error instanceof IdentityError) {
      return { type: "dead-file", target, label };
    }
    throw error;
  }

  if (!registry.hasFile(identity)) {
    return { type: "dead-file", target, label };
  }
  if (!registry.hasLabel(identity, label)) {
    return { type: "dead-label", target, label };
  }
  if (registry.isClash(identity, label)) {
    return { type: "label-clash", target, label };
  }

  return null;
}

/**
 * Classify a same-file link; null means valid
 */
export function checkLocalLink(
  link: LocalLink,
  file: FileDescriptor,
  registry: LabelRegistry,
): LinkError | null {
  const target = file.sourcePath;

  if (!registry.hasLabel(file.id, link.label)) {
    return { type: "dead-label", target, label: link.label };
  }
  if (registry.isClash(file.id, link.label)) {
    return { type: "label-clash", target, label: link.label };
  }

  return null;
}

/**
 * Validates the links of all files
 *
 * Reads from context:
 * - files, registry
 *
 * Writes to context:
 * - report: errors per source file (files without errors omitted)
 *
 * Throws LinkValidationError when the report is not empty
 */
export async function validate(ctx: MergeContext): Promise<void> {
  if (!ctx.files || !ctx.registry) {
    throw new Error("Scanner and registry must run before validator");
  }

  const { tracker, logger, identities, config, registry } = ctx;
  const report: ValidationReport = new Map();

  for (const file of ctx.files) {
    const errors: LinkError[] = [];
    const links = extractLinks(file.lines, {
      extensions: config.markdown.extensions,
      ignoreFencedCode: config.markdown.ignoreFencedCode,
      local: config.links.local === "rewrite",
    });

    for (const link of links) {
      let error: LinkError | null;
      if (link.kind === "cross-file") {
        tracker.incrementCrossFileLinks();
        error = await checkCrossFileLink(link, file.sourcePath, registry, identities);
      } else {
        tracker.incrementLocalLinks();
        error = checkLocalLink(link, file, registry);
      }

      if (error) {
        errors.push(error);
        tracker.trackLinkError(file.relativePath, error);
      }
    }

    if (errors.length > 0) {
      report.set(file.sourcePath, errors);
    }
    logger.debug(`${file.relativePath}: ${links.length} link(s), ${errors.length} error(s)`);
  }

  ctx.report = report;

  if (report.size > 0) {
    throw new LinkValidationError(report);
  }
}
