/**
 * Utility exports
 */

// Label utilities
export { normalizeLabel } from "./normalize-label";
export { parseHeading, extractHeadings } from "./extract-headings";
export type { ExtractHeadingsOptions } from "./extract-headings";
export { fencedLines, codeMask } from "./fenced-code";

// Link utilities
export {
  extractLinks,
  extractCrossFileLinks,
  extractLocalLinks,
  crossFileLinkPattern,
} from "./extract-links";
export type { ExtractLinksOptions } from "./extract-links";
export { rewriteLine, rewriteLinks, anchorId } from "./rewrite-line";
export type { RewriteOptions, RewrittenLine } from "./rewrite-line";
export { formatLinkError } from "./format-link-error";

// Path/string utilities
export { escapeRegExp, toDisplayPath, toRelativeLink } from "./string";
export { sortByNumericPrefix } from "./sort-files";

// Filesystem utilities
export { isFile } from "./is-file";
export { readLines, splitLines } from "./read-lines";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export { createContext } from "./create-context";
export type { CreateContextOptions } from "./create-context";

// Errors
export { IdentityError, InputError, LinkValidationError } from "./errors";

// Classes
export { InodeIdentityResolver } from "./identity-resolver";
export type { IdentityResolver } from "./identity-resolver";
export { LabelRegistry } from "./label-registry";
export { Logger } from "./logger";
export { Tracker } from "./tracker";
