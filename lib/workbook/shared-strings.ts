/**
 * Shared-string table (xl/sharedStrings.xml)
 */

import type { ZipArchive } from '../archive/zip-reader';
import { walkXml } from './xml';

export const SHARED_STRINGS_ENTRY = 'xl/sharedStrings.xml';

/**
 * Parse a shared-strings part into one entry per `<si>` item.
 *
 * Rich-text runs (`<r><t>…</t></r>`) are concatenated into a single string so
 * item positions stay aligned with the indexes cells use. Phonetic hints
 * (`<rPh>`) are not part of the value. An item without any `<t>` is `null`.
 */
export function parseSharedStrings(xml: string): (string | null)[] {
  const strings: (string | null)[] = [];
  let item: string | null = null;
  let inItem = false;
  let inText = false;
  let phoneticDepth = 0;

  walkXml(xml, SHARED_STRINGS_ENTRY, {
    open: ({ local }) => {
      if (local === 'si') {
        inItem = true;
        item = null;
      } else if (local === 'rPh') {
        phoneticDepth++;
      } else if (local === 't' && inItem && phoneticDepth === 0) {
        inText = true;
        item = item ?? '';
      }
    },
    text: (text) => {
      if (inText) item = (item ?? '') + text;
    },
    close: (local) => {
      if (local === 't') {
        inText = false;
      } else if (local === 'rPh') {
        phoneticDepth--;
      } else if (local === 'si') {
        strings.push(item);
        inItem = false;
      }
    },
  });

  return strings;
}

/**
 * Load the workbook's shared strings. Workbooks that never use shared
 * strings have no such part; that yields an empty table.
 */
export function loadSharedStrings(archive: ZipArchive): (string | null)[] {
  if (!archive.has(SHARED_STRINGS_ENTRY)) {
    return [];
  }
  return parseSharedStrings(archive.readText(SHARED_STRINGS_ENTRY));
}
