/**
 * Line Rewriting
 * Turns per-file anchors and relative links into document-wide ones
 */

import type { FileIdentity } from "../types";
import { crossFileLinkPattern, LOCAL_LINK_PATTERN } from "./extract-links";
import { parseHeading } from "./extract-headings";
import { escapeRegExp } from "./string";

export interface RewriteOptions {
  /** Identity of the file the line belongs to */
  fileId: FileIdentity;
  /** Markdown suffixes of cross-file link targets */
  extensions: string[];
  /** Identity of a cross-file link target, given the path as written */
  resolveTarget: (linkPath: string) => FileIdentity;
  /** Prefix same-file (#label) links with the file identity */
  rewriteLocal?: boolean;
  /** Suffixes of asset links to relocate */
  assetExtensions?: string[];
  /** New relative path for an asset link, given the path as written */
  resolveAsset?: (assetPath: string) => string;
}

export interface RewrittenLine {
  text: string;
  heading: boolean;
  links: number;
  assets: number;
}

/**
 * Explicit pandoc anchor for a label of a file
 *
 * @example
 * anchorId("n42", "some-section") // "n42-some-section"
 */
export function anchorId(fileId: FileIdentity, label: string): string {
  return `${fileId}-${label}`;
}

function assetLinkPattern(extensions: string[]): RegExp {
  const suffix = extensions.map(escapeRegExp).join("|");
  return new RegExp(`\\]\\((\\./[^)#\\s]*?(?:${suffix}))\\)`, "gi");
}

/**
 * Rewrite the links of a piece of text
 * Local links are handled first so rewritten cross-file links are not
 * prefixed a second time
 */
export function rewriteLinks(
  text: string,
  options: RewriteOptions,
): Omit<RewrittenLine, "heading"> {
  let links = 0;
  let assets = 0;
  let result = text;

  if (options.rewriteLocal) {
    result = result.replace(LOCAL_LINK_PATTERN, (_match, label: string) => {
      links++;
      return `](#${anchorId(options.fileId, label)})`;
    });
  }

  result = result.replace(
    crossFileLinkPattern(options.extensions),
    (match: string, linkPath: string, label: string | undefined) => {
      // Direct links never get past validation; leave them as written
      if (!label) return match;
      links++;
      return `](#${anchorId(options.resolveTarget(linkPath), label)})`;
    },
  );

  const { resolveAsset, assetExtensions } = options;
  if (resolveAsset && assetExtensions && assetExtensions.length > 0) {
    result = result.replace(
      assetLinkPattern(assetExtensions),
      (_match, assetPath: string) => {
        assets++;
        return `](${resolveAsset(assetPath)})`;
      },
    );
  }

  return { text: result, links, assets };
}

/**
 * Rewrite one line of a fragment
 *
 * @example
 * rewriteLine("## Some Section", { fileId: "n42", ... }).text
 * // "## Some Section {#n42-some-section}"
 * rewriteLine("See [A](./a.md#intro).", { resolveTarget: () => "n7", ... }).text
 * // "See [A](#n7-intro)."
 */
export function rewriteLine(
  line: string,
  options: RewriteOptions,
): RewrittenLine {
  const heading = parseHeading(line, 0);

  if (!heading) {
    return { ...rewriteLinks(line, options), heading: false };
  }

  // The label comes from the original text, as registered in pass 1
  const { text, links, assets } = rewriteLinks(heading.text, options);
  const anchor = `{#${anchorId(options.fileId, heading.label)}}`;
  return {
    text: text ? `${heading.marker} ${text} ${anchor}` : `${heading.marker} ${anchor}`,
    heading: true,
    links,
    assets,
  };
}
