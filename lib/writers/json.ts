/**
 * JSON rendering of records
 */

import type { CellRecord } from '../types';

const INDENT = '    ';

function renderRecord(record: CellRecord): string {
  if (record.size === 0) return '{}';
  const fields = Array.from(record, ([field, value]) =>
    `${INDENT}${INDENT}${JSON.stringify(field)}: ${JSON.stringify(value)}`
  );
  return `{\n${fields.join(',\n')}\n${INDENT}}`;
}

/**
 * Array of records indented by four spaces, with a trailing newline.
 * Fields are written in header order, the layout `JSON.stringify(_, null, 4)`
 * gives for plain objects.
 */
export function renderJson(records: readonly CellRecord[]): string {
  if (records.length === 0) return '[]\n';
  return `[\n${records.map(record => INDENT + renderRecord(record)).join(',\n')}\n]\n`;
}
