/**
 * Link extraction
 *
 * Cross-file links: [text](./path/to/file.md#label) or [text](./path/to/file.md)
 * Local links:      [text](#label)
 *
 * Links to other files without the "./" prefix are not considered.
 */

import type { CrossFileLink, Link, LocalLink } from "../types";
import { escapeRegExp } from "./string";
import { codeMask } from "./fenced-code";

/**
 * Pattern for cross-file links ending in one of the given suffixes
 * Group 1: path as written (with "./"), group 2: label (may be absent)
 */
export function crossFileLinkPattern(extensions: string[]): RegExp {
  const suffix = extensions.map(escapeRegExp).join("|");
  return new RegExp(`\\]\\((\\./[^)#]*?(?:${suffix}))(?:#([^)]*))?\\)`, "g");
}

/** Group 1: label */
export const LOCAL_LINK_PATTERN = /\]\(#([^)]+)\)/g;

/**
 * Cross-file links on a single line
 * An empty label ("./a.md#") counts as no label
 */
export function extractCrossFileLinks(
  line: string,
  index: number,
  extensions: string[],
): CrossFileLink[] {
  const links: CrossFileLink[] = [];
  for (const match of line.matchAll(crossFileLinkPattern(extensions))) {
    const [, path, label] = match;
    links.push(
      label
        ? { kind: "cross-file", path, label, line: index }
        : { kind: "cross-file", path, line: index },
    );
  }
  return links;
}

/**
 * Local (same-file) links on a single line
 */
export function extractLocalLinks(line: string, index: number): LocalLink[] {
  return Array.from(line.matchAll(LOCAL_LINK_PATTERN), (match) => ({
    kind: "local" as const,
    label: match[1],
    line: index,
  }));
}

export interface ExtractLinksOptions {
  extensions: string[];
  ignoreFencedCode?: boolean;
  local?: boolean; // Also collect local links
}

/**
 * All links of a file in order of appearance
 */
export function extractLinks(
  lines: string[],
  options: ExtractLinksOptions,
): Link[] {
  const mask = codeMask(lines, options.ignoreFencedCode ?? false);
  const links: Link[] = [];

  lines.forEach((line, index) => {
    if (mask[index]) return;
    links.push(...extractCrossFileLinks(line, index, options.extensions));
    if (options.local) {
      links.push(...extractLocalLinks(line, index));
    }
  });

  return links;
}
