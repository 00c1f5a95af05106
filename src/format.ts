/**
 * Output section formatting
 */

/** Comment-style prefix of the marker line */
export const SECTION_PREFIX = "// ";

/**
 * Frame one file's content: two blank lines, the marker, two blank lines,
 * the verbatim content and a single trailing newline.
 */
export function formatSection(name: string, content: string): string {
  return `\n\n${SECTION_PREFIX}${name}\n\n${content}\n`;
}
