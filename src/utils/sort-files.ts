import path from "node:path";

/**
 * Sort files by numeric prefix (e.g., 01-, 02-, 10-), then alphabetically
 *
 * @example
 * sortByNumericPrefix(["10-end.md", "2-middle.md", "01-start.md"])
 * // ["01-start.md", "2-middle.md", "10-end.md"]
 */
export function sortByNumericPrefix(files: string[]): string[] {
  return [...files].sort((a, b) => {
    const nameA = path.basename(a);
    const nameB = path.basename(b);

    const matchA = nameA.match(/^(\d+)-/);
    const matchB = nameB.match(/^(\d+)-/);

    if (matchA && matchB) {
      const byNumber = parseInt(matchA[1]) - parseInt(matchB[1]);
      if (byNumber !== 0) return byNumber;
    }

    // Fallback to path order (keeps directories together)
    return a.localeCompare(b);
  });
}
