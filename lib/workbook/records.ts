/**
 * Header + record projection of a row sequence
 */

import { EmptyTableError } from '../errors';
import type { CellRecord, CellValue, Row } from '../types';

/** Empty header cells become the "" field */
function fieldName(value: CellValue): string {
  return value ?? '';
}

/**
 * Pair a row with the header positionally. Extra cells on either side are
 * dropped. Fields keep header order, "2024" included; a repeated field name
 * keeps its first position and the rightmost value.
 */
export function zipRecord(header: readonly string[], row: Row): CellRecord {
  const length = Math.min(header.length, row.length);
  const record: CellRecord = new Map();
  for (let i = 0; i < length; i++) {
    record.set(header[i], row[i]);
  }
  return record;
}

/**
 * Lazily project rows to records, using the first row as the header.
 * The first pull throws `EmptyTableError` when there is no header row.
 */
export function* toRecords(rows: Iterable<Row>): Generator<CellRecord, void, undefined> {
  const iterator = rows[Symbol.iterator]();
  try {
    const first = iterator.next();
    if (first.done) {
      throw new EmptyTableError();
    }

    const header = first.value.map(fieldName);
    for (let next = iterator.next(); !next.done; next = iterator.next()) {
      yield zipRecord(header, next.value);
    }
  } finally {
    iterator.return?.();
  }
}

/**
 * Eager projection of a materialized table
 */
export function projectTable(table: readonly Row[]): CellRecord[] {
  if (table.length === 0) {
    throw new EmptyTableError();
  }
  const [first, ...rows] = table;
  const header = first.map(fieldName);
  return rows.map(row => zipRecord(header, row));
}
