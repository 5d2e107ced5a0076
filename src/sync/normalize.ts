/**
 * Whitespace normalization used to decide whether two instruction files
 * already hold the same text.
 *
 * The normalized form is only ever compared, never written.
 */

import { TextDecoder } from "node:util";

// BOM is kept so that adding or removing one still counts as a change
const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Normalizes content for equality testing.
 *
 * - Unifies `\r\n` and `\r` line endings to `\n`
 * - Strips trailing spaces and tabs from every line
 * - Strips trailing spaces, tabs and blank lines at end of file
 *
 * Only ASCII space and tab count as trailing whitespace; NBSP and other
 * Unicode spaces are content. Leading indentation and blank lines between
 * content are left alone.
 *
 * @example
 * ```ts
 * normalizeContent("# Rules  \r\n\r\nuse tabs\t\n\n"); // "# Rules\n\nuse tabs"
 * ```
 */
export function normalizeContent(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.replace(/[ \t]+$/, ""))
    .join("\n")
    .replace(/\n+$/, "");
}

/**
 * Returns true when two raw file contents are equal after normalization.
 *
 * Valid UTF-8 is compared as text. If either side is not valid UTF-8, both
 * are compared byte for byte (latin1 maps each byte to one character), so
 * distinct bytes never collapse into the same replacement character.
 */
export function contentsMatch(a: Buffer, b: Buffer): boolean {
  if (a.equals(b)) {
    return true;
  }

  const textA = decodeUtf8(a);
  const textB = decodeUtf8(b);
  if (textA === null || textB === null) {
    return normalizeContent(a.toString("latin1")) === normalizeContent(b.toString("latin1"));
  }
  return normalizeContent(textA) === normalizeContent(textB);
}

function decodeUtf8(content: Buffer): string | null {
  try {
    return strictUtf8.decode(content);
  } catch {
    return null;
  }
}
