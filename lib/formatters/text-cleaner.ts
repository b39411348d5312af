/**
 * Text cleanup utilities for cell values
 */

/** CRLF, LF, CR, VT, FF, FS/GS/RS, NEL, LS and PS all end a line */
const LINE_BREAK_RE = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

/** `\s` plus the separators and NEL that `trim()` keeps */
const OUTER_SPACE_RE = /^[\s\x1c-\x1f\x85]+|[\s\x1c-\x1f\x85]+$/g;

/**
 * Sanitize a cell value
 * - Trim surrounding whitespace
 * - Split on line breaks and drop empty fragments
 * - Rejoin fragments with a single space
 *
 * Whitespace inside a fragment is kept, so "a \n b" becomes "a   b".
 * Applying it twice gives the same result as applying it once.
 */
export function sanitizeCellText(text: string): string {
  return text
    .replace(OUTER_SPACE_RE, '')
    .split(LINE_BREAK_RE)
    .filter(fragment => fragment.length > 0)
    .join(' ');
}
