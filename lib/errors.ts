/**
 * Typed error classes for workbook extraction.
 *
 * Every error carries a stable `code` so callers (the CLI in particular) can
 * branch on the failure without string matching.
 */

/**
 * Base error class for all extraction errors
 */
export class TabulateError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(message: string, options?: { code?: string; cause?: Error }) {
    super(message);
    this.name = 'TabulateError';
    this.code = options?.code ?? 'TABULATE_ERROR';
    this.cause = options?.cause;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the input cannot be read or is not a ZIP package
 */
export class NotAnArchiveError extends TabulateError {
  /** Path (or display name) of the rejected input */
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: Error }) {
    super(message, { code: 'NOT_AN_ARCHIVE', cause: options.cause });
    this.name = 'NotAnArchiveError';
    this.path = options.path;
  }
}

/**
 * Thrown when the input exceeds the configured size limit
 */
export class FileTooLargeError extends TabulateError {
  readonly size: number;
  readonly limit: number;

  constructor(message: string, options: { size: number; limit: number }) {
    super(message, { code: 'FILE_TOO_LARGE' });
    this.name = 'FileTooLargeError';
    this.size = options.size;
    this.limit = options.limit;
  }
}

/**
 * Thrown when an archive is used after it was closed
 */
export class ArchiveClosedError extends TabulateError {
  constructor(message = 'Archive is closed') {
    super(message, { code: 'ARCHIVE_CLOSED' });
    this.name = 'ArchiveClosedError';
  }
}

/**
 * Thrown when an expected entry is absent from the package
 */
export class MissingEntryError extends TabulateError {
  /** Entry path inside the package */
  readonly entry: string;

  constructor(message: string, options: { entry: string }) {
    super(message, { code: 'MISSING_ENTRY' });
    this.name = 'MissingEntryError';
    this.entry = options.entry;
  }
}

/**
 * Thrown when a package part is not well-formed XML
 */
export class MalformedXmlError extends TabulateError {
  /** Entry path of the offending part */
  readonly part: string;

  constructor(message: string, options: { part: string; cause?: Error }) {
    super(message, { code: 'MALFORMED_XML', cause: options.cause });
    this.name = 'MalformedXmlError';
    this.part = options.part;
  }
}

/**
 * Thrown when a cell address or dimension cannot be decoded
 */
export class MalformedReferenceError extends TabulateError {
  readonly reference: string;

  constructor(message: string, options: { reference: string }) {
    super(message, { code: 'MALFORMED_REFERENCE' });
    this.name = 'MalformedReferenceError';
    this.reference = options.reference;
  }
}

/**
 * Thrown when a cell lies outside the worksheet's declared dimension
 */
export class CellOutOfBoundsError extends TabulateError {
  readonly reference: string;
  readonly width: number;
  readonly height: number;

  constructor(message: string, options: { reference: string; width: number; height: number }) {
    super(message, { code: 'CELL_OUT_OF_BOUNDS' });
    this.name = 'CellOutOfBoundsError';
    this.reference = options.reference;
    this.width = options.width;
    this.height = options.height;
  }
}

/**
 * Thrown by lazy row extraction when a cell belongs to a row already emitted
 */
export class CellOrderError extends TabulateError {
  readonly reference: string;

  constructor(message: string, options: { reference: string }) {
    super(message, { code: 'CELL_ORDER' });
    this.name = 'CellOrderError';
    this.reference = options.reference;
  }
}

/**
 * Thrown when a shared-string cell points outside the shared-string table
 */
export class InvalidSharedStringIndexError extends TabulateError {
  /** Raw index text found in the cell */
  readonly index: string;
  /** Size of the shared-string table */
  readonly tableSize: number;

  constructor(message: string, options: { index: string; tableSize: number }) {
    super(message, { code: 'INVALID_SHARED_STRING_INDEX' });
    this.name = 'InvalidSharedStringIndexError';
    this.index = options.index;
    this.tableSize = options.tableSize;
  }
}

/**
 * Thrown when records are requested from a table with no header row
 */
export class EmptyTableError extends TabulateError {
  constructor(message = 'Table has no header row') {
    super(message, { code: 'EMPTY_TABLE' });
    this.name = 'EmptyTableError';
  }
}

/**
 * Thrown when the output directory cannot be prepared
 */
export class DirectoryCreationConflictError extends TabulateError {
  readonly directory: string;

  constructor(message: string, options: { directory: string; cause?: Error }) {
    super(message, { code: 'DIRECTORY_CONFLICT', cause: options.cause });
    this.name = 'DirectoryCreationConflictError';
    this.directory = options.directory;
  }
}

/**
 * Thrown when options or CLI arguments fail validation
 */
export class InvalidOptionsError extends TabulateError {
  readonly issues: string[];

  constructor(message: string, options: { issues: string[] }) {
    super(message, { code: 'INVALID_OPTIONS' });
    this.name = 'InvalidOptionsError';
    this.issues = options.issues;
  }
}

/**
 * Type guard to check if an error is a TabulateError
 */
export function isTabulateError(error: unknown): error is TabulateError {
  return error instanceof TabulateError;
}

/**
 * Normalize an unknown thrown value to an Error for `cause` chaining
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
