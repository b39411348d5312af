/**
 * Sheet writers
 *
 * Format tags map to writers through an explicit table; callers resolve the
 * writer once and never build method names at run time.
 */

import * as fs from 'fs';
import type { Worksheet } from '../workbook/worksheet';
import { renderCsv } from './csv';
import type { OutputFormat } from './formats';
import { renderJson } from './json';
import { renderYaml } from './yaml';

export interface SheetWriter {
  /** File extension, without the dot */
  extension: string;
  render(sheet: Worksheet): string;
}

export const WRITERS: Record<OutputFormat, SheetWriter> = {
  csv: {
    extension: 'csv',
    render: sheet => renderCsv(sheet.rows()),
  },
  json: {
    extension: 'json',
    render: sheet => renderJson(sheet.records()),
  },
  yaml: {
    extension: 'yaml',
    render: sheet => renderYaml(sheet.records()),
  },
};

/**
 * Render `sheet` in `format` and write it to `target` as UTF-8.
 */
export function writeSheet(sheet: Worksheet, format: OutputFormat, target: string): string {
  const content = WRITERS[format].render(sheet);
  fs.writeFileSync(target, content, 'utf-8');
  return target;
}

export { renderCsv, csvEscape, csvLine } from './csv';
export { renderJson } from './json';
export { renderYaml } from './yaml';
export { FORMATS, isOutputFormat, type OutputFormat } from './formats';
export { outputPathFor, ensureOutputDirectory } from './output-path';
