/**
 * YAML rendering of records (block style)
 */

import { stringify } from 'yaml';
import type { CellRecord } from '../types';

/** Maps are written in insertion order, so fields follow the header */
export function renderYaml(records: readonly CellRecord[]): string {
  return stringify(records, {
    indent: 2,
    lineWidth: 0,
    defaultStringType: 'PLAIN',
    nullStr: 'null',
  });
}
