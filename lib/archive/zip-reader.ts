/**
 * ZIP Package Reader
 *
 * Random-access reader for the ZIP container behind .xlsx files. Entries are
 * indexed from the central directory and inflated when read.
 *
 * Stored (0) and deflated (8) entries only; no ZIP64.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { ArchiveClosedError, MissingEntryError, NotAnArchiveError, toError } from '../errors';

// ============================================================================
// Types
// ============================================================================

export interface ZipEntry {
  name: string;
  compressionMethod: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

// ============================================================================
// Constants
// ============================================================================

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;

const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;
const CENTRAL_HEADER_SIZE = 46;
const LOCAL_HEADER_SIZE = 30;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

// ============================================================================
// Archive
// ============================================================================

/**
 * An opened ZIP package.
 *
 * @example
 * ```typescript
 * const archive = openArchive('./report.xlsx');
 * try {
 *   const xml = archive.readText('xl/workbook.xml');
 * } finally {
 *   archive.close();
 * }
 * ```
 */
export class ZipArchive {
  private buffer: Buffer | null;
  private readonly entries: Map<string, ZipEntry>;

  private constructor(readonly name: string, buffer: Buffer, entries: Map<string, ZipEntry>) {
    this.buffer = buffer;
    this.entries = entries;
  }

  /**
   * Index a package held in memory.
   */
  static fromBuffer(buffer: Buffer, name: string = 'workbook.xlsx'): ZipArchive {
    return new ZipArchive(name, buffer, indexCentralDirectory(buffer, name));
  }

  get closed(): boolean {
    return this.buffer === null;
  }

  /** Entry names in central-directory order, directories excluded */
  list(): string[] {
    this.assertOpen();
    return Array.from(this.entries.keys());
  }

  has(name: string): boolean {
    this.assertOpen();
    return this.entries.has(name);
  }

  read(name: string): Buffer {
    const buffer = this.assertOpen();
    const entry = this.entries.get(name);
    if (!entry) {
      throw new MissingEntryError(`Entry not found in ${this.name}: ${name}`, { entry: name });
    }
    return extractEntry(buffer, entry, this.name);
  }

  readText(name: string): string {
    return this.read(name).toString('utf-8');
  }

  close(): void {
    this.buffer = null;
  }

  private assertOpen(): Buffer {
    if (this.buffer === null) {
      throw new ArchiveClosedError(`Archive is closed: ${this.name}`);
    }
    return this.buffer;
  }
}

/**
 * Read a package from disk. Unreadable files and non-ZIP content both raise
 * `NotAnArchiveError`.
 */
export function openArchive(filePath: string): ZipArchive {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error) {
    throw new NotAnArchiveError(`Cannot read file: ${filePath}`, {
      path: filePath,
      cause: toError(error),
    });
  }
  return ZipArchive.fromBuffer(buffer, path.basename(filePath));
}

// ============================================================================
// Central Directory
// ============================================================================

function findEndOfCentralDirectory(buffer: Buffer): number {
  const lowest = Math.max(0, buffer.length - EOCD_MIN_SIZE - MAX_COMMENT_LENGTH);
  for (let offset = buffer.length - EOCD_MIN_SIZE; offset >= lowest; offset--) {
    if (buffer.readUInt32LE(offset) === EOCD_SIGNATURE) {
      return offset;
    }
  }
  return -1;
}

function indexCentralDirectory(buffer: Buffer, name: string): Map<string, ZipEntry> {
  const invalid = (reason: string) =>
    new NotAnArchiveError(`Not a ZIP package (${reason}): ${name}`, { path: name });

  if (buffer.length < EOCD_MIN_SIZE) {
    throw invalid('file too short');
  }

  const eocd = findEndOfCentralDirectory(buffer);
  if (eocd < 0) {
    throw invalid('no end of central directory');
  }

  const entryCount = buffer.readUInt16LE(eocd + 10);
  const directorySize = buffer.readUInt32LE(eocd + 12);
  const directoryOffset = buffer.readUInt32LE(eocd + 16);

  if (directoryOffset + directorySize > eocd) {
    throw invalid('central directory out of range');
  }

  const entries = new Map<string, ZipEntry>();
  let offset = directoryOffset;

  for (let i = 0; i < entryCount; i++) {
    if (offset + CENTRAL_HEADER_SIZE > eocd || buffer.readUInt32LE(offset) !== CENTRAL_SIGNATURE) {
      throw invalid(`bad central header #${i}`);
    }

    const compressionMethod = buffer.readUInt16LE(offset + 10);
    const compressedSize = buffer.readUInt32LE(offset + 20);
    const uncompressedSize = buffer.readUInt32LE(offset + 24);
    const fileNameLength = buffer.readUInt16LE(offset + 28);
    const extraFieldLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const localHeaderOffset = buffer.readUInt32LE(offset + 42);

    const nameStart = offset + CENTRAL_HEADER_SIZE;
    const entryName = buffer.toString('utf-8', nameStart, nameStart + fileNameLength);

    if (!entryName.endsWith('/')) {
      entries.set(entryName, {
        name: entryName,
        compressionMethod,
        compressedSize,
        uncompressedSize,
        localHeaderOffset,
      });
    }

    offset = nameStart + fileNameLength + extraFieldLength + commentLength;
  }

  return entries;
}

// ============================================================================
// Entry Extraction
// ============================================================================

function extractEntry(buffer: Buffer, entry: ZipEntry, archiveName: string): Buffer {
  const invalid = (reason: string, cause?: Error) =>
    new NotAnArchiveError(`Corrupt entry ${entry.name} in ${archiveName} (${reason})`, {
      path: archiveName,
      cause,
    });

  const header = entry.localHeaderOffset;
  if (header + LOCAL_HEADER_SIZE > buffer.length || buffer.readUInt32LE(header) !== LOCAL_SIGNATURE) {
    throw invalid('bad local header');
  }

  const fileNameLength = buffer.readUInt16LE(header + 26);
  const extraFieldLength = buffer.readUInt16LE(header + 28);
  const dataStart = header + LOCAL_HEADER_SIZE + fileNameLength + extraFieldLength;
  const dataEnd = dataStart + entry.compressedSize;

  if (dataEnd > buffer.length) {
    throw invalid('truncated data');
  }

  const data = buffer.subarray(dataStart, dataEnd);

  switch (entry.compressionMethod) {
    case METHOD_STORED:
      return Buffer.from(data);
    case METHOD_DEFLATE:
      try {
        return zlib.inflateRawSync(data);
      } catch (error) {
        throw invalid('inflate failed', toError(error));
      }
    default:
      throw invalid(`unsupported compression method ${entry.compressionMethod}`);
  }
}
