/**
 * Cell address codec
 *
 * Converts between A1-style references and 0-based coordinates.
 * Column letters form a bijective base-26 number: A=0, Z=25, AA=26, AZ=51, BA=52.
 */

import { MalformedReferenceError } from '../errors';

// ============================================================================
// Types
// ============================================================================

export interface CellCoordinates {
  /** 0-based column index */
  col: number;
  /** 0-based row index */
  row: number;
}

export interface TableShape {
  width: number;
  height: number;
}

// ============================================================================
// Constants
// ============================================================================

const CELL_REFERENCE_RE = /^([A-Za-z]+)([0-9]+)$/;
const LETTERS_RE = /^[A-Za-z]+$/;
const CHAR_CODE_A = 65;

// ============================================================================
// Columns
// ============================================================================

/**
 * Decode column letters to a 0-based index (A → 0, Z → 25, AA → 26)
 */
export function decodeColumn(letters: string): number {
  if (!LETTERS_RE.test(letters)) {
    throw new MalformedReferenceError(`Invalid column letters: "${letters}"`, { reference: letters });
  }

  const upper = letters.toUpperCase();
  let index = 0;
  for (let i = 0; i < upper.length; i++) {
    index = index * 26 + (upper.charCodeAt(i) - CHAR_CODE_A + 1);
  }
  return index - 1;
}

/**
 * Encode a 0-based column index to letters (0 → A, 25 → Z, 26 → AA)
 */
export function encodeColumn(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Column index must be a non-negative integer, got ${index}`);
  }

  let letters = '';
  let temp = index;

  while (temp >= 0) {
    letters = String.fromCharCode((temp % 26) + CHAR_CODE_A) + letters;
    temp = Math.floor(temp / 26) - 1;
  }

  return letters;
}

/**
 * Memoizing column decoder. One instance lives per worksheet so repeated
 * columns are decoded once.
 */
export class ColumnDecoder {
  private readonly cache = new Map<string, number>();

  decode(letters: string): number {
    const cached = this.cache.get(letters);
    if (cached !== undefined) return cached;

    const index = decodeColumn(letters);
    this.cache.set(letters, index);
    return index;
  }

  /** Number of distinct column strings decoded so far */
  get size(): number {
    return this.cache.size;
  }
}

// ============================================================================
// Cells
// ============================================================================

/**
 * Decode an A1-style reference to 0-based coordinates.
 * Letters must precede digits and both parts must be present: "12A",
 * "A1B2", "A" and "7" are rejected, as is row 0.
 */
export function decodeCell(reference: string, columns?: ColumnDecoder): CellCoordinates {
  const match = CELL_REFERENCE_RE.exec(reference);
  if (!match) {
    throw new MalformedReferenceError(`Malformed cell reference: "${reference}"`, { reference });
  }

  const [, letters, digits] = match;
  const row = parseInt(digits, 10) - 1;
  if (row < 0) {
    throw new MalformedReferenceError(`Row numbers start at 1: "${reference}"`, { reference });
  }

  const col = columns ? columns.decode(letters) : decodeColumn(letters);
  return { col, row };
}

export function encodeCell({ col, row }: CellCoordinates): string {
  if (!Number.isInteger(row) || row < 0) {
    throw new RangeError(`Row index must be a non-negative integer, got ${row}`);
  }
  return `${encodeColumn(col)}${row + 1}`;
}

// ============================================================================
// Ranges
// ============================================================================

/**
 * Table size for a dimension range such as "A1:C10" → { width: 3, height: 10 }.
 *
 * Sizes are exclusive bounds measured from A1, so only the bottom-right
 * corner determines the shape. A single reference ("A1") is a 1-cell range.
 */
export function shapeFromRange(range: string, columns?: ColumnDecoder): TableShape {
  const parts = range.trim().split(':');
  if (parts.length > 2 || parts.some(part => part.length === 0)) {
    throw new MalformedReferenceError(`Malformed range: "${range}"`, { reference: range });
  }

  // The top-left corner is still decoded so a malformed range is rejected
  const topLeft = parts[0];
  const bottomRight = parts[parts.length - 1];
  decodeCell(topLeft, columns);
  const corner = decodeCell(bottomRight, columns);

  return { width: corner.col + 1, height: corner.row + 1 };
}
