/**
 * Worksheet extraction
 *
 * Parses one worksheet part into its sparse cell list and rebuilds the table
 * either eagerly (`materialize`) or row by row (`rows`). Both views hold the
 * same value at every coordinate.
 */

import * as path from 'path';
import { CellOrderError, CellOutOfBoundsError } from '../errors';
import { sanitizeCellText } from '../formatters/text-cleaner';
import type { CellRecord, CellValue, RawCell, Row, WorksheetOwner } from '../types';
import { ColumnDecoder, decodeCell, encodeCell, shapeFromRange, type TableShape } from './coordinates';
import { projectTable, toRecords } from './records';
import { walkXml } from './xml';

export const WORKSHEET_PREFIX = 'xl/worksheets/sheet';

const TRAILING_NUMBER_RE = /(\d+)$/;
const ROW_NUMBER_RE = /^[1-9]\d*$/;
const UNSAFE_NAME_RE = /[\\/:*?"<>|\x00-\x1f]/g;

/** Entry paths that hold worksheet data */
export function isWorksheetEntry(name: string): boolean {
  return name.startsWith(WORKSHEET_PREFIX) && name.endsWith('.xml');
}

// ============================================================================
// Parsing
// ============================================================================

interface ParsedWorksheet {
  dimension?: string;
  cells: RawCell[];
}

/**
 * Collect `<dimension>` and every `<c>` in document order.
 *
 * Cells without an `r` attribute take the position after the previous cell
 * of the same row; rows without `r` follow the previous row.
 */
function parseWorksheetXml(xml: string, part: string, columns: ColumnDecoder): ParsedWorksheet {
  const cells: RawCell[] = [];
  let dimension: string | undefined;

  let rowIndex = -1;
  let nextCol = 0;
  let cell: RawCell | null = null;
  let inValue = false;
  let inInline = false;
  let inInlineText = false;
  let phoneticDepth = 0;

  walkXml(xml, part, {
    open: ({ local, attributes }) => {
      switch (local) {
        case 'dimension':
          dimension = attributes.ref;
          break;
        case 'row': {
          const r = attributes.r;
          rowIndex = r !== undefined && ROW_NUMBER_RE.test(r) ? parseInt(r, 10) - 1 : rowIndex + 1;
          nextCol = 0;
          break;
        }
        case 'c': {
          const ref = attributes.r ?? encodeCell({ col: nextCol, row: Math.max(rowIndex, 0) });
          const { col, row } = decodeCell(ref, columns);
          cell = { ref, col, row, type: attributes.t, value: null, inline: null };
          nextCol = col + 1;
          break;
        }
        case 'v':
          if (cell) {
            inValue = true;
            cell.value = cell.value ?? '';
          }
          break;
        case 'is':
          inInline = cell !== null;
          break;
        case 'rPh':
          phoneticDepth++;
          break;
        case 't':
          if (cell && inInline && phoneticDepth === 0) {
            inInlineText = true;
            cell.inline = cell.inline ?? '';
          }
          break;
      }
    },
    text: (text) => {
      if (!cell) return;
      if (inValue) {
        cell.value = (cell.value ?? '') + text;
      } else if (inInlineText) {
        cell.inline = (cell.inline ?? '') + text;
      }
    },
    close: (local) => {
      switch (local) {
        case 'v':
          inValue = false;
          break;
        case 'is':
          inInline = false;
          break;
        case 'rPh':
          phoneticDepth--;
          break;
        case 't':
          inInlineText = false;
          break;
        case 'c':
          if (cell) cells.push(cell);
          cell = null;
          break;
      }
    },
  });

  return { dimension, cells };
}

function boundingShape(cells: readonly RawCell[]): TableShape {
  let width = 0;
  let height = 0;
  for (const cell of cells) {
    width = Math.max(width, cell.col + 1);
    height = Math.max(height, cell.row + 1);
  }
  return { width, height };
}

// ============================================================================
// Worksheet
// ============================================================================

export class Worksheet {
  /** Entry path inside the package, e.g. "xl/worksheets/sheet1.xml" */
  readonly entry: string;
  /** Relationship number linking the entry to its manifest declaration */
  readonly relationship: number | undefined;
  /** Declared sheet name, or the entry stem when the manifest has none */
  readonly sheetName: string;
  /** File-name friendly identifier: "01_Sales", or "sheet1" without a manifest */
  readonly name: string;
  /** Declared dimension text, if any */
  readonly dimension: string | undefined;
  readonly width: number;
  readonly height: number;

  private readonly owner: WorksheetOwner;
  private readonly columns = new ColumnDecoder();
  private readonly cells: RawCell[];
  private table: Row[] | null = null;
  private recordCache: CellRecord[] | null = null;

  constructor(entry: string, xml: string, owner: WorksheetOwner) {
    this.entry = entry;
    this.owner = owner;

    const parsed = parseWorksheetXml(xml, entry, this.columns);
    this.cells = parsed.cells;
    this.dimension = parsed.dimension;

    const shape = parsed.dimension !== undefined
      ? shapeFromRange(parsed.dimension, this.columns)
      : boundingShape(parsed.cells);
    this.width = shape.width;
    this.height = shape.height;

    for (const cell of this.cells) {
      if (cell.col >= this.width || cell.row >= this.height) {
        throw new CellOutOfBoundsError(
          `Cell ${cell.ref} lies outside ${entry} (${this.width}x${this.height})`,
          { reference: cell.ref, width: this.width, height: this.height }
        );
      }
    }

    const stem = path.posix.basename(entry, path.posix.extname(entry));
    this.relationship = owner.sheetTargets.get(entry) ?? trailingNumber(stem);

    const declared = this.relationship !== undefined
      ? owner.sheetNames.get(this.relationship)
      : undefined;

    if (declared !== undefined && this.relationship !== undefined) {
      this.sheetName = declared;
      this.name = `${String(this.relationship).padStart(2, '0')}_${declared.replace(UNSAFE_NAME_RE, '_')}`;
    } else {
      this.sheetName = stem;
      this.name = stem;
    }
  }

  /** Number of cell elements in the part */
  get cellCount(): number {
    return this.cells.length;
  }

  /** Distinct column strings decoded so far */
  get decodedColumnCount(): number {
    return this.columns.size;
  }

  /**
   * Dense `height × width` table, null where no cell exists.
   * A repeated address keeps the last value. Each call returns fresh rows
   * copied from a cached table.
   */
  materialize(): Row[] {
    return this.denseTable().map(row => [...row]);
  }

  private denseTable(): Row[] {
    if (this.table === null) {
      const table: Row[] = [];
      for (let r = 0; r < this.height; r++) {
        table.push(this.emptyRow());
      }
      for (const cell of this.cells) {
        table[cell.row][cell.col] = this.valueOf(cell);
      }
      this.table = table;
    }
    return this.table;
  }

  /**
   * Rows produced one at a time, exactly `height` of them.
   *
   * The current row is emitted as soon as a cell of a later row appears, and
   * rows without any cell come out as all-null rows, so sparse rows are never
   * lost. Cells must arrive in row order, as SpreadsheetML requires.
   */
  *rows(): Generator<Row, void, undefined> {
    let current = 0;
    let buffer = this.emptyRow();

    for (const cell of this.cells) {
      if (cell.row < current) {
        throw new CellOrderError(
          `Cell ${cell.ref} in ${this.entry} appears after row ${current + 1} was emitted`,
          { reference: cell.ref }
        );
      }
      while (cell.row > current) {
        yield buffer;
        buffer = this.emptyRow();
        current++;
      }
      buffer[cell.col] = this.valueOf(cell);
    }

    while (current < this.height) {
      yield buffer;
      buffer = this.emptyRow();
      current++;
    }
  }

  /**
   * Records keyed by the first row. Built from the dense table when it has
   * already been materialized, otherwise from `rows()`. Cached.
   */
  records(): CellRecord[] {
    if (this.recordCache === null) {
      this.recordCache = this.table !== null
        ? projectTable(this.table)
        : Array.from(toRecords(this.rows()));
    }
    return this.recordCache;
  }

  /** Value of a single cell element */
  valueOf(cell: RawCell): CellValue {
    let value: CellValue;
    switch (cell.type) {
      case 's':
        value = cell.value === null ? null : this.owner.resolveSharedString(cell.value);
        break;
      case 'inlineStr':
        value = cell.inline;
        break;
      default:
        value = cell.value ?? cell.inline;
    }

    if (value !== null && this.owner.sanitize) {
      return sanitizeCellText(value);
    }
    return value;
  }

  private emptyRow(): Row {
    return new Array<CellValue>(this.width).fill(null);
  }
}

function trailingNumber(stem: string): number | undefined {
  const match = TRAILING_NUMBER_RE.exec(stem);
  return match ? parseInt(match[1], 10) : undefined;
}
