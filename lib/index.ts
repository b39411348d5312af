/**
 * @package xlsx-tabulate
 *
 * Extract worksheet tables from Excel 2007+ files and re-render them as
 * CSV, JSON or YAML.
 *
 * @example
 * ```typescript
 * import { Workbook, convertWorkbook } from 'xlsx-tabulate';
 *
 * // Read tables
 * const book = new Workbook('./report.xlsx');
 * for (const sheet of book.sheets()) {
 *   console.log(sheet.sheetName, sheet.records());
 * }
 *
 * // Write every sheet as CSV and JSON into ./out
 * convertWorkbook(book, { formats: ['csv', 'json'], outDir: './out' });
 * ```
 */

// Workbook and worksheets
export { Workbook } from './workbook/workbook';
export { Worksheet, isWorksheetEntry, WORKSHEET_PREFIX } from './workbook/worksheet';

// Package parts
export { ZipArchive, openArchive, type ZipEntry } from './archive/zip-reader';
export { loadSharedStrings, parseSharedStrings, SHARED_STRINGS_ENTRY } from './workbook/shared-strings';
export {
  loadWorkbookIndex,
  parseSheetNames,
  parseRelationshipTargets,
  relationshipNumber,
  WORKBOOK_ENTRY,
  WORKBOOK_RELS_ENTRY,
  type WorkbookIndex
} from './workbook/workbook-index';

// Coordinates
export {
  decodeColumn,
  encodeColumn,
  decodeCell,
  encodeCell,
  shapeFromRange,
  ColumnDecoder,
  type CellCoordinates,
  type TableShape
} from './workbook/coordinates';

// Records
export { toRecords, projectTable, zipRecord } from './workbook/records';

// Text cleanup
export { sanitizeCellText } from './formatters/text-cleaner';

// Writers
export {
  WRITERS,
  writeSheet,
  renderCsv,
  renderJson,
  renderYaml,
  csvEscape,
  outputPathFor,
  ensureOutputDirectory,
  FORMATS,
  isOutputFormat,
  type OutputFormat,
  type SheetWriter
} from './writers';
export { convertWorkbook, type ConvertResult } from './convert';

// Options
export {
  WorkbookOptionsSchema,
  ConvertOptionsSchema,
  CliArgsSchema,
  parseWorkbookOptions,
  parseConvertOptions,
  MAX_FILE_SIZE,
  type WorkbookOptions,
  type ConvertOptions
} from './validation';

// Session logging
export { ConversionSession, type ConversionMetrics, type SessionOptions } from './debug';

// Errors
export {
  TabulateError,
  NotAnArchiveError,
  FileTooLargeError,
  ArchiveClosedError,
  MissingEntryError,
  MalformedXmlError,
  MalformedReferenceError,
  CellOutOfBoundsError,
  CellOrderError,
  InvalidSharedStringIndexError,
  EmptyTableError,
  DirectoryCreationConflictError,
  InvalidOptionsError,
  isTabulateError
} from './errors';

// Types
export type { CellValue, Row, CellRecord, RawCell, WorksheetOwner } from './types';
