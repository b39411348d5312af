/**
 * Workbook → files
 *
 * Writes every worksheet of a workbook in each requested format, next to the
 * source file or into `outDir`.
 */

import { ConversionSession } from './debug';
import { parseConvertOptions, type ConvertOptions } from './validation';
import type { Workbook } from './workbook/workbook';
import { ensureOutputDirectory, outputPathFor, WRITERS, writeSheet } from './writers';

export interface ConvertResult {
  /** Written files, in write order */
  files: string[];
  /** Worksheet names in package order */
  sheets: string[];
}

export function convertWorkbook(
  workbook: Workbook,
  options: ConvertOptions,
  session: ConversionSession = new ConversionSession()
): ConvertResult {
  const { formats, outDir } = parseConvertOptions(options);
  const files: string[] = [];
  const sheets: string[] = [];

  if (outDir !== undefined) {
    ensureOutputDirectory(outDir);
  }

  try {
    session.startPhase('read');
    for (const sheet of workbook.sheets()) {
      session.endPhase('read');
      sheets.push(sheet.name);
      session.recordSheet(sheet.name, sheet.cellCount);
      session.debug(`${sheet.entry}: ${sheet.width}x${sheet.height}, ${sheet.cellCount} cells`);

      for (const format of formats) {
        session.info(`Saving ${sheet.name} as ${format}`);
        const target = outputPathFor(workbook.path, sheet.name, WRITERS[format].extension, outDir);
        session.measure('write', () => writeSheet(sheet, format, target));
        session.recordFile(target);
        files.push(target);
      }

      session.startPhase('read');
    }
    session.endPhase('read');
  } catch (error) {
    session.recordError(error);
    throw error;
  }

  for (const part of workbook.absentParts) {
    session.debug(`Package has no ${part}`);
  }

  return { files, sheets };
}
