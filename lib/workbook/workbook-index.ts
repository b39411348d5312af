/**
 * Workbook manifest (xl/workbook.xml) and its relationships
 * (xl/_rels/workbook.xml.rels).
 */

import * as path from 'path';
import type { ZipArchive } from '../archive/zip-reader';
import { walkXml } from './xml';

export const WORKBOOK_ENTRY = 'xl/workbook.xml';
export const WORKBOOK_RELS_ENTRY = 'xl/_rels/workbook.xml.rels';

export interface WorkbookIndex {
  /** Relationship number → declared sheet name, in declaration order */
  sheetNames: Map<number, string>;
  /** Worksheet entry path → relationship number */
  targets: Map<string, number>;
}

const RELATIONSHIP_NUMBER_RE = /(\d+)$/;

/**
 * "rId3" → 3. Identifiers without a trailing number give `undefined`.
 */
export function relationshipNumber(id: string): number | undefined {
  const match = RELATIONSHIP_NUMBER_RE.exec(id);
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Sheet declarations in manifest order. A relationship number seen twice
 * keeps its first name.
 */
export function parseSheetNames(xml: string): Map<number, string> {
  const names = new Map<number, string>();

  walkXml(xml, WORKBOOK_ENTRY, {
    open: ({ local, attributes }) => {
      if (local !== 'sheet') return;
      const id = attributes.id;
      const name = attributes.name;
      if (id === undefined || name === undefined) return;

      const number = relationshipNumber(id);
      if (number !== undefined && !names.has(number)) {
        names.set(number, name);
      }
    },
  });

  return names;
}

/**
 * Worksheet targets from the workbook relationships part, resolved to full
 * entry paths ("worksheets/sheet1.xml" → "xl/worksheets/sheet1.xml").
 */
export function parseRelationshipTargets(xml: string): Map<string, number> {
  const targets = new Map<string, number>();

  walkXml(xml, WORKBOOK_RELS_ENTRY, {
    open: ({ local, attributes }) => {
      if (local !== 'Relationship') return;
      const id = attributes.Id;
      const target = attributes.Target;
      if (id === undefined || target === undefined) return;

      const number = relationshipNumber(id);
      if (number !== undefined) {
        targets.set(resolveTarget(target), number);
      }
    },
  });

  return targets;
}

function resolveTarget(target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join('xl', target));
}

/**
 * Load the sheet-name index. Both parts are optional: a package without a
 * manifest gets an empty index and its sheets keep their entry names.
 */
export function loadWorkbookIndex(archive: ZipArchive): WorkbookIndex {
  const sheetNames = archive.has(WORKBOOK_ENTRY)
    ? parseSheetNames(archive.readText(WORKBOOK_ENTRY))
    : new Map<number, string>();

  const targets = archive.has(WORKBOOK_RELS_ENTRY)
    ? parseRelationshipTargets(archive.readText(WORKBOOK_RELS_ENTRY))
    : new Map<string, number>();

  return { sheetNames, targets };
}
