/**
 * Text normalization shared by analysis and extraction
 */

/**
 * Trim and collapse internal whitespace runs to a single space
 *
 * @example
 * cleanText("  hello \n   world ") // "hello world"
 */
export function cleanText(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}
