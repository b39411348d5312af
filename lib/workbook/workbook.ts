/**
 * Workbook
 *
 * Entry point for extraction. A workbook opens its package only while sheets
 * are being iterated and releases it on every exit path. The shared-string
 * table and the sheet-name index are loaded before the first worksheet is
 * built and are cached for the life of the instance.
 *
 * @example
 * ```typescript
 * import { Workbook } from 'xlsx-tabulate';
 *
 * const book = new Workbook('./report.xlsx');
 * for (const sheet of book.sheets()) {
 *   console.log(sheet.name, sheet.materialize());
 * }
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { openArchive, ZipArchive } from '../archive/zip-reader';
import { FileTooLargeError, InvalidSharedStringIndexError, NotAnArchiveError, toError } from '../errors';
import type { CellValue, WorksheetOwner } from '../types';
import { parseWorkbookOptions, type WorkbookOptions } from '../validation';
import { loadSharedStrings, SHARED_STRINGS_ENTRY } from './shared-strings';
import { loadWorkbookIndex, WORKBOOK_ENTRY, type WorkbookIndex } from './workbook-index';
import { isWorksheetEntry, Worksheet } from './worksheet';

const SHARED_INDEX_RE = /^\d+$/;

type WorkbookSource =
  | { kind: 'file'; path: string }
  | { kind: 'buffer'; buffer: Buffer };

export class Workbook implements WorksheetOwner {
  /** Absolute path of the source file, or the display name of a buffer */
  readonly path: string;
  readonly fileName: string;
  readonly sanitize: boolean;
  readonly maxFileSize: number;

  private readonly source: WorkbookSource;
  private archive: ZipArchive | null = null;
  private shared: (string | null)[] | null = null;
  private index: WorkbookIndex | null = null;
  private readonly absent: string[] = [];

  /**
   * @param filePath - package on disk, or the display name when `buffer` is given
   * @param buffer - package contents already in memory
   */
  constructor(filePath: string, options: WorkbookOptions = {}, buffer?: Buffer) {
    const resolved = parseWorkbookOptions(options);
    this.path = path.resolve(filePath);
    this.fileName = path.basename(filePath);
    this.sanitize = resolved.sanitize;
    this.maxFileSize = resolved.maxFileSize;
    this.source = buffer ? { kind: 'buffer', buffer } : { kind: 'file', path: this.path };
  }

  /**
   * Wrap a package already in memory
   */
  static fromBuffer(buffer: Buffer, fileName: string = 'workbook.xlsx', options: WorkbookOptions = {}): Workbook {
    return new Workbook(fileName, options, buffer);
  }

  // ==========================================================================
  // Cached parts
  // ==========================================================================

  /** Shared strings, index = shared-string id */
  get sharedStrings(): readonly (string | null)[] {
    return this.sharedTable();
  }

  private sharedTable(): (string | null)[] {
    if (this.shared === null) {
      this.shared = this.usingArchive(archive => {
        if (!archive.has(SHARED_STRINGS_ENTRY)) this.absent.push(SHARED_STRINGS_ENTRY);
        return loadSharedStrings(archive);
      });
    }
    return this.shared;
  }

  /** Relationship number → declared sheet name, in manifest order */
  get sheetNames(): ReadonlyMap<number, string> {
    return this.workbookIndex().sheetNames;
  }

  /** Worksheet entry path → relationship number */
  get sheetTargets(): ReadonlyMap<string, number> {
    return this.workbookIndex().targets;
  }

  /**
   * Optional parts the package turned out not to have. Their absence is not
   * an error; this list lets callers report it.
   */
  get absentParts(): readonly string[] {
    return [...this.absent];
  }

  private workbookIndex(): WorkbookIndex {
    if (this.index === null) {
      this.index = this.usingArchive(archive => {
        if (!archive.has(WORKBOOK_ENTRY)) this.absent.push(WORKBOOK_ENTRY);
        return loadWorkbookIndex(archive);
      });
    }
    return this.index;
  }

  /**
   * Shared string for a cell's raw `<v>` text
   */
  resolveSharedString(raw: string): CellValue {
    const table = this.sharedTable();
    const text = raw.trim();
    const index = SHARED_INDEX_RE.test(text) ? parseInt(text, 10) : -1;

    if (index < 0 || index >= table.length) {
      throw new InvalidSharedStringIndexError(
        `Shared string index "${raw}" is out of range (table has ${table.length} entries)`,
        { index: raw, tableSize: table.length }
      );
    }
    return table[index];
  }

  // ==========================================================================
  // Sheets
  // ==========================================================================

  /**
   * Worksheets in package order. The package stays open until the iteration
   * finishes, fails or is abandoned.
   */
  *sheets(): Generator<Worksheet, void, undefined> {
    const archive = this.open();
    this.archive = archive;
    try {
      // Both caches are complete before any worksheet exists
      this.sharedTable();
      this.workbookIndex();

      for (const entry of archive.list()) {
        if (isWorksheetEntry(entry)) {
          yield new Worksheet(entry, archive.readText(entry), this);
        }
      }
    } finally {
      this.archive = null;
      archive.close();
    }
  }

  /** All worksheets, materialized into an array */
  readSheets(): Worksheet[] {
    return Array.from(this.sheets());
  }

  /** Worksheet entry paths in package order */
  sheetEntries(): string[] {
    return this.usingArchive(archive => archive.list().filter(isWorksheetEntry));
  }

  // ==========================================================================
  // Archive scope
  // ==========================================================================

  private open(): ZipArchive {
    if (this.source.kind === 'buffer') {
      this.checkSize(this.source.buffer.length);
      return ZipArchive.fromBuffer(this.source.buffer, this.fileName);
    }

    let stat: fs.Stats | undefined;
    try {
      stat = fs.statSync(this.source.path, { throwIfNoEntry: false });
    } catch (error) {
      throw new NotAnArchiveError(`Cannot read file: ${this.source.path}`, {
        path: this.source.path,
        cause: toError(error),
      });
    }
    if (stat) this.checkSize(stat.size);
    return openArchive(this.source.path);
  }

  private checkSize(size: number): void {
    if (size > this.maxFileSize) {
      throw new FileTooLargeError(
        `File too large: ${(size / 1024 / 1024).toFixed(1)}MB exceeds ${(this.maxFileSize / 1024 / 1024).toFixed(0)}MB limit`,
        { size, limit: this.maxFileSize }
      );
    }
  }

  /**
   * Run `task` against the open package, or against one opened just for it
   */
  private usingArchive<T>(task: (archive: ZipArchive) => T): T {
    if (this.archive !== null) {
      return task(this.archive);
    }
    const archive = this.open();
    try {
      return task(archive);
    } finally {
      archive.close();
    }
  }
}
