/**
 * Output file locations
 */

import * as fs from 'fs';
import * as path from 'path';
import { DirectoryCreationConflictError, toError } from '../errors';

/**
 * `<outDir>/<source stem>.<sheet name>.<extension>`, where `outDir`
 * defaults to the directory holding the source file.
 *
 * @example
 * outputPathFor('/data/report.xlsx', '01_Sales', 'csv') // '/data/report.01_Sales.csv'
 */
export function outputPathFor(
  sourcePath: string,
  sheetName: string,
  extension: string,
  outDir?: string
): string {
  const directory = outDir ?? path.dirname(sourcePath);
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  return path.join(directory, `${stem}.${sheetName}.${extension}`);
}

/**
 * Create `directory` (and its parents) unless it already exists.
 * Something other than a directory in the way is a conflict.
 */
export function ensureOutputDirectory(directory: string): void {
  let stat: fs.Stats | undefined;
  try {
    stat = fs.statSync(directory, { throwIfNoEntry: false });
  } catch (error) {
    throw new DirectoryCreationConflictError(`Cannot inspect output directory: ${directory}`, {
      directory,
      cause: toError(error),
    });
  }

  if (stat) {
    if (!stat.isDirectory()) {
      throw new DirectoryCreationConflictError(`Output path exists and is not a directory: ${directory}`, {
        directory,
      });
    }
    return;
  }

  try {
    fs.mkdirSync(directory, { recursive: true });
  } catch (error) {
    throw new DirectoryCreationConflictError(`Cannot create output directory: ${directory}`, {
      directory,
      cause: toError(error),
    });
  }
}
