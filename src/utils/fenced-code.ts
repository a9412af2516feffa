/**
 * Fenced code block detection
 */

// Opening/closing fence: up to 3 spaces of indentation, then ``` or ~~~ (3+)
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})/;

/**
 * Flag every line that belongs to a fenced code block, fences included.
 * A block closes on a fence of the same character at least as long as
 * the opening one; an unclosed block runs to the end of the file.
 *
 * @example
 * fencedLines(["text", "```sh", "# comment", "```"]) // [false, true, true, true]
 */
export function fencedLines(lines: string[]): boolean[] {
  const mask: boolean[] = [];
  let fence: string | null = null;

  for (const line of lines) {
    const match = FENCE_PATTERN.exec(line);

    if (fence === null) {
      mask.push(match !== null);
      if (match) fence = match[1];
      continue;
    }

    mask.push(true);
    if (match && match[1][0] === fence[0] && match[1].length >= fence.length) {
      fence = null;
    }
  }

  return mask;
}

/**
 * Mask for the given lines, or all-false when fences are not honoured
 */
export function codeMask(lines: string[], ignoreFencedCode: boolean): boolean[] {
  return ignoreFencedCode ? fencedLines(lines) : lines.map(() => false);
}
