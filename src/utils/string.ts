/**
 * String Utilities
 * Shared string and path helper functions
 */

import path from "node:path";

/**
 * Escape a string for literal use inside a RegExp
 *
 * @example
 * escapeRegExp(".md") // "\\.md"
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Path shown to the user: relative to the working directory when inside it
 *
 * @example
 * toDisplayPath("/work/docs/a.md", "/work") // "docs/a.md"
 * toDisplayPath("/elsewhere/a.md", "/work") // "/elsewhere/a.md"
 */
export function toDisplayPath(
  filePath: string,
  cwd: string = process.cwd(),
): string {
  const relative = path.relative(cwd, filePath);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return filePath;
  }
  return relative;
}

/**
 * Relative link from one directory to a file, always in posix form and
 * starting with "./" or "../" so it stays a relative markdown link
 *
 * @example
 * toRelativeLink("/out", "/docs/img/a.png") // "../docs/img/a.png"
 * toRelativeLink("/docs", "/docs/img/a.png") // "./img/a.png"
 */
export function toRelativeLink(fromDirectory: string, filePath: string): string {
  const relative = path
    .relative(fromDirectory, filePath)
    .split(path.sep)
    .join("/");
  return relative.startsWith("../") ? relative : `./${relative}`;
}
