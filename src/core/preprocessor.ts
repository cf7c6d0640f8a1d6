/**
 * MetaMark source preprocessor.
 *
 * Normalizes raw input before scanning. Line numbers survive every
 * transformation; the scanner already counts `\r\n` as one line break.
 *
 * @module core/preprocessor
 */

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Remove a leading byte-order mark.
 *
 * Editors on Windows often save with a BOM, which would otherwise be
 * scanned as part of the first text token and hide a frontmatter delimiter.
 *
 * @param source - Raw document text.
 * @returns Text without a leading BOM.
 */
function stripByteOrderMark(source: string): string {
  return source.startsWith(BYTE_ORDER_MARK) ? source.slice(1) : source;
}

/**
 * Convert CRLF and lone CR line breaks to LF.
 *
 * @param source - Raw document text.
 * @returns Text whose only line break is `\n`.
 */
function normalizeLineEndings(source: string): string {
  return source.replace(/\r\n?/g, '\n');
}

/**
 * Apply all preprocessor transformations in sequence.
 *
 * @param source - Raw document text.
 * @returns Text ready for the scanner.
 */
export function preprocessSource(source: string): string {
  let result = stripByteOrderMark(source);
  result = normalizeLineEndings(result);
  return result;
}
