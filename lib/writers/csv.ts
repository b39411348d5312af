/**
 * CSV rendering (RFC 4180)
 */

import type { CellValue, Row } from '../types';

const NEEDS_QUOTES_RE = /[",\r\n]/;
const QUOTE_RE = /"/g;

/** Quote values containing commas, quotes or line breaks */
export function csvEscape(value: CellValue): string {
  if (!value) return '';
  if (NEEDS_QUOTES_RE.test(value)) {
    return '"' + value.replace(QUOTE_RE, '""') + '"';
  }
  return value;
}

/** A row holding one empty field is written as `""` so it is not a blank line */
export function csvLine(row: Row): string {
  const line = row.map(csvEscape).join(',');
  return row.length === 1 && line === '' ? '""' : line;
}

/**
 * Render rows as CSV text. Every line, the last included, ends in CRLF.
 */
export function renderCsv(rows: Iterable<Row>): string {
  let output = '';
  for (const row of rows) {
    output += csvLine(row) + '\r\n';
  }
  return output;
}
