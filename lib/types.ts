/**
 * Core types for workbook extraction
 */

/** A cell's text, or null for an empty cell. Values are never typed. */
export type CellValue = string | null;

/** One table row; its length is the worksheet width */
export type Row = CellValue[];

/** One data row keyed by the header row's field names, in header order */
export type CellRecord = Map<string, CellValue>;

/** Cell as read from worksheet XML, before value resolution */
export interface RawCell {
  /** A1-style address (inferred from position when the file omits it) */
  ref: string;
  col: number;
  row: number;
  /** `t` attribute: "s" for shared strings, "inlineStr", "str", "n", "b", "e" ... */
  type?: string;
  /** Text of `<v>` */
  value: string | null;
  /** Concatenated text of `<is>` */
  inline: string | null;
}

/**
 * Non-owning view a worksheet keeps of its workbook.
 */
export interface WorksheetOwner {
  readonly sanitize: boolean;
  /** Relationship number → declared sheet name */
  readonly sheetNames: ReadonlyMap<number, string>;
  /** Worksheet entry path → relationship number */
  readonly sheetTargets: ReadonlyMap<string, number>;
  /** Look up a shared string by its raw `<v>` text */
  resolveSharedString(index: string): CellValue;
}
