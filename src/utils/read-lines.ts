import { readFile } from "fs/promises";

/**
 * Read a UTF-8 text file and split it into lines
 * A final line terminator does not produce a trailing empty line
 *
 * @example
 * // "# A\ntext\n" -> ["# A", "text"]
 */
export async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, "utf-8");
  return splitLines(content);
}

export function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}
