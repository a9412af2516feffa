/**
 * Heading extraction
 * Any line starting with "#" is a heading (ATX style, no level limit)
 */

import type { Heading } from "../types";
import { normalizeLabel } from "./normalize-label";
import { codeMask } from "./fenced-code";

const HEADING_PATTERN = /^(#+)\s*(.*?)\s*$/;

/**
 * Parse one line as a heading, or null when it is not one
 *
 * @example
 * parseHeading("## Some Section", 3)
 * // { line: 3, level: 2, marker: "##", text: "Some Section", label: "some-section" }
 */
export function parseHeading(line: string, index: number): Heading | null {
  const match = HEADING_PATTERN.exec(line);
  if (!match) return null;

  const [, marker, text] = match;
  return {
    line: index,
    level: marker.length,
    marker,
    text,
    label: normalizeLabel(text),
  };
}

export interface ExtractHeadingsOptions {
  ignoreFencedCode?: boolean;
}

/**
 * All headings of a file in order, one per heading line (not deduplicated)
 */
export function extractHeadings(
  lines: string[],
  options: ExtractHeadingsOptions = {},
): Heading[] {
  const mask = codeMask(lines, options.ignoreFencedCode ?? false);
  const headings: Heading[] = [];

  lines.forEach((line, index) => {
    if (mask[index]) return;
    const heading = parseHeading(line, index);
    if (heading) headings.push(heading);
  });

  return headings;
}
