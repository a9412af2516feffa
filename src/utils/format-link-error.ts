import type { LinkError } from "../types";
import { toDisplayPath } from "./string";

/**
 * One report line per link error: kind, offending file and label
 *
 * @example
 * formatLinkError({ type: "dead-label", target: "/work/a.md", label: "missing" }, "/work")
 * // 'dead-label: link to missing label "missing" in file "a.md"'
 */
export function formatLinkError(
  error: LinkError,
  cwd: string = process.cwd(),
): string {
  const file = toDisplayPath(error.target, cwd);

  switch (error.type) {
    case "label-clash":
      return `label-clash: link to label "${error.label}" defined more than once in file "${file}"`;
    case "dead-label":
      return `dead-label: link to missing label "${error.label}" in file "${file}"`;
    case "dead-file":
      return `dead-file: link to unknown file "${file}" (label is "${error.label}")`;
    case "direct-link":
      return `direct-link: link to file "${file}" without a section label`;
  }
}
