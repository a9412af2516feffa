/**
 * Derive a section label from heading text
 *
 * - ASCII letters are lowercased, other characters keep their case
 * - Runs of whitespace, "/" and "-" collapse into a single "-"
 * - ",", "." and "`" are deleted without leaving a separator
 * - Leading and trailing separators are dropped
 *
 * Applying it to its own output returns the same label.
 *
 * @example
 * normalizeLabel("Some Section") // "some-section"
 * normalizeLabel("Input/Output") // "input-output"
 * normalizeLabel("Version 1.2, `config`") // "version-12-config"
 */
export function normalizeLabel(text: string): string {
  let label = "";
  let separator = false;

  for (const char of text) {
    if (char === "/" || char === "-" || /\s/.test(char)) {
      separator = label.length > 0;
      continue;
    }
    if (char === "," || char === "." || char === "`") {
      continue;
    }
    if (separator) {
      label += "-";
      separator = false;
    }
    label += char;
  }

  return label.replace(/[A-Z]+/g, (letters) => letters.toLowerCase());
}
