import { describe, expect, it } from 'vitest';
import { parse } from 'yaml';
import {
  CellOrderError,
  CellOutOfBoundsError,
  EmptyTableError,
  InvalidSharedStringIndexError,
} from '../lib/errors';
import type { WorkbookOptions } from '../lib/validation';
import { Workbook } from '../lib/workbook/workbook';
import type { Worksheet } from '../lib/workbook/worksheet';
import { WRITERS } from '../lib/writers';
import { catchError } from './helpers/catch-error';
import { record } from './helpers/records';
import {
  buildPeopleXlsx,
  buildXlsx,
  cell,
  inlineCell,
  MAIN_NS,
  row,
  sharedCell,
  workbookRelsXml,
  workbookXml,
  worksheetXml,
  type FixtureOptions,
} from './helpers/xlsx-fixture';

async function sheetsOf(fixture: FixtureOptions, options: WorkbookOptions = {}): Promise<Worksheet[]> {
  return Workbook.fromBuffer(await buildXlsx(fixture), 'book.xlsx', options).readSheets();
}

async function onlySheet(xml: string, options: WorkbookOptions = {}, sharedStrings?: string[]): Promise<Worksheet> {
  const [sheet] = await sheetsOf({ sheets: [{ name: 'Data', xml }], sharedStrings }, options);
  return sheet;
}

describe('Worksheet', () => {
  describe('the People workbook', () => {
    it('resolves shared strings and builds the table', async () => {
      const [sheet] = Workbook.fromBuffer(await buildPeopleXlsx(), 'people.xlsx').readSheets();

      expect(sheet.entry).toBe('xl/worksheets/sheet1.xml');
      expect(sheet.dimension).toBe('A1:B2');
      expect(sheet.width).toBe(2);
      expect(sheet.height).toBe(2);
      expect(sheet.cellCount).toBe(4);
      expect(sheet.materialize()).toEqual([['Name', 'Age'], ['Alice', '30']]);
      expect(sheet.records()).toEqual([record({ Name: 'Alice', Age: '30' })]);
    });

    it('is named after its relationship number and declared name', async () => {
      const [sheet] = Workbook.fromBuffer(await buildPeopleXlsx()).readSheets();

      expect(sheet.relationship).toBe(1);
      expect(sheet.sheetName).toBe('People');
      expect(sheet.name).toBe('01_People');
    });

    it('hands out copies of the dense table', async () => {
      const [sheet] = Workbook.fromBuffer(await buildPeopleXlsx()).readSheets();
      const table = sheet.materialize();
      table[0][0] = 'Changed';
      table[1].push('extra');

      expect(sheet.materialize()).toEqual([['Name', 'Age'], ['Alice', '30']]);
      expect(sheet.records()).toEqual([record({ Name: 'Alice', Age: '30' })]);
      expect(Array.from(sheet.rows())).toEqual(sheet.materialize());
    });

    it('decodes each column string once', async () => {
      const [sheet] = Workbook.fromBuffer(await buildPeopleXlsx()).readSheets();
      expect(sheet.decodedColumnCount).toBe(2);
    });
  });

  describe('sparse data', () => {
    const sparseXml = worksheetXml('A1:C4', [
      row(1, [cell('A1', 'h1', 'str'), cell('B1', 'h2', 'str'), cell('C1', 'h3', 'str')]),
      row(3, [cell('B3', 'x', 'str')]),
    ]);

    it('fills gaps with null in the dense table', async () => {
      const sheet = await onlySheet(sparseXml);

      expect(sheet.materialize()).toEqual([
        ['h1', 'h2', 'h3'],
        [null, null, null],
        [null, 'x', null],
        [null, null, null],
      ]);
    });

    it('streams exactly the rows of the dense table', async () => {
      const sheet = await onlySheet(sparseXml);
      const streamed = Array.from(sheet.rows());

      expect(streamed).toHaveLength(sheet.height);
      expect(streamed).toEqual(sheet.materialize());
    });

    it('projects every row after the header', async () => {
      const sheet = await onlySheet(sparseXml);

      expect(sheet.records()).toEqual([
        record({ h1: null, h2: null, h3: null }),
        record({ h1: null, h2: 'x', h3: null }),
        record({ h1: null, h2: null, h3: null }),
      ]);
    });

    it('sizes the table from the cells when there is no dimension', async () => {
      const sheet = await onlySheet(worksheetXml(null, [
        row(1, [cell('A1', 'a', 'str')]),
        row(2, [cell('C2', 'c', 'str')]),
      ]));

      expect(sheet.dimension).toBeUndefined();
      expect([sheet.width, sheet.height]).toEqual([3, 2]);
      expect(sheet.materialize()).toEqual([['a', null, null], [null, null, 'c']]);
    });

    it('is empty when the part has no cells', async () => {
      const sheet = await onlySheet(worksheetXml(null, []));

      expect(sheet.materialize()).toEqual([]);
      expect(Array.from(sheet.rows())).toEqual([]);
      expect(() => sheet.records()).toThrow(EmptyTableError);
    });
  });

  describe('records', () => {
    const yearsXml = worksheetXml('A1:C2', [
      row(1, [cell('A1', 'Region', 'str'), cell('B1', '2024', 'str'), cell('C1', '2023', 'str')]),
      row(2, [cell('A2', 'North', 'str'), cell('B2', '10'), cell('C2', '9')]),
    ]);

    it('keep numeric header names in column order', async () => {
      const sheet = await onlySheet(yearsXml);
      const [first] = sheet.records();

      expect(Array.from(first.keys())).toEqual(['Region', '2024', '2023']);
      expect(Array.from(first.values())).toEqual(['North', '10', '9']);
    });

    it('are written to JSON in column order', async () => {
      const sheet = await onlySheet(yearsXml);

      expect(WRITERS.json.render(sheet)).toBe(
        '[\n    {\n        "Region": "North",\n        "2024": "10",\n        "2023": "9"\n    }\n]\n'
      );
    });

    it('are written to YAML in column order', async () => {
      const sheet = await onlySheet(yearsXml);
      const parsed: unknown = parse(WRITERS.yaml.render(sheet), { mapAsMap: true });
      const first: unknown = Array.isArray(parsed) ? parsed[0] : undefined;

      expect(first).toBeInstanceOf(Map);
      expect(first instanceof Map ? Array.from(first.keys()) : []).toEqual(['Region', '2024', '2023']);
    });
  });

  describe('cell values', () => {
    it('reads inline strings', async () => {
      const sheet = await onlySheet(worksheetXml('A1:B1', [
        row(1, [inlineCell('A1', 'inline text'), cell('B1', '1', 'b')]),
      ]));
      expect(sheet.materialize()).toEqual([['inline text', '1']]);
    });

    it('keeps a blank cell null and an empty value ""', async () => {
      const sheet = await onlySheet(worksheetXml('A1:B1', [
        row(1, ['<c r="A1"/>', '<c r="B1" t="str"><v></v></c>']),
      ]));
      expect(sheet.materialize()).toEqual([[null, '']]);
    });

    it('keeps the last value for a repeated address', async () => {
      const sheet = await onlySheet(worksheetXml('A1:A1', [
        row(1, [cell('A1', 'one', 'str'), cell('A1', 'two', 'str')]),
      ]));

      expect(sheet.materialize()).toEqual([['two']]);
      expect(Array.from(sheet.rows())).toEqual([['two']]);
    });

    it('sanitizes text by default', async () => {
      const sheet = await onlySheet(worksheetXml('A1:A1', [
        row(1, [cell('A1', '  multi\nline  ', 'str')]),
      ]));
      expect(sheet.materialize()).toEqual([['multi line']]);
    });

    it('keeps text as stored with sanitize off', async () => {
      const sheet = await onlySheet(worksheetXml('A1:A1', [
        row(1, [cell('A1', '  multi\nline  ', 'str')]),
      ]), { sanitize: false });
      expect(sheet.materialize()).toEqual([['  multi\nline  ']]);
    });

    it('sanitizes shared strings too', async () => {
      const sheet = await onlySheet(
        worksheetXml('A1:A1', [row(1, [sharedCell('A1', 0)])]),
        {},
        ['  padded\r\nvalue ']
      );
      expect(sheet.materialize()).toEqual([['padded value']]);
    });

    it('places cells without a reference after the previous cell of the row', async () => {
      const sheet = await onlySheet(worksheetXml(null, [
        '<row r="2"><c t="str"><v>a</v></c><c t="str"><v>b</v></c></row>',
      ]));
      expect(sheet.materialize()).toEqual([[null, null], ['a', 'b']]);
    });

    it('reads parts written with a namespace prefix', async () => {
      const xml = `<x:worksheet xmlns:x="${MAIN_NS}"><x:dimension ref="A1:A1"/><x:sheetData>` +
        '<x:row r="1"><x:c r="A1" t="str"><x:v>hi</x:v></x:c></x:row>' +
        '</x:sheetData></x:worksheet>';
      const sheet = await onlySheet(xml);
      expect(sheet.materialize()).toEqual([['hi']]);
    });
  });

  describe('errors', () => {
    it('rejects a cell outside the declared dimension', async () => {
      const xml = worksheetXml('A1:B2', [row(1, [cell('C1', 'x', 'str')])]);
      const book = Workbook.fromBuffer(await buildXlsx({ sheets: [{ name: 'Data', xml }] }));
      const error = catchError(() => book.readSheets());

      expect(error).toBeInstanceOf(CellOutOfBoundsError);
      expect(error).toMatchObject({ reference: 'C1', width: 2, height: 2 });
    });

    it('rejects a shared-string index past the end of the table', async () => {
      const sheet = await onlySheet(
        worksheetXml('A1:A1', [row(1, [sharedCell('A1', 5)])]),
        {},
        ['Name', 'Age']
      );
      const error = catchError(() => sheet.materialize());

      expect(error).toBeInstanceOf(InvalidSharedStringIndexError);
      expect(error).toMatchObject({ index: '5', tableSize: 2 });
    });

    it('rejects shared-string cells when the package has no table', async () => {
      const sheet = await onlySheet(worksheetXml('A1:A1', [row(1, [sharedCell('A1', 0)])]));
      expect(catchError(() => sheet.materialize())).toMatchObject({ index: '0', tableSize: 0 });
    });

    it('rejects a non-numeric shared-string index', async () => {
      const sheet = await onlySheet(
        worksheetXml('A1:A1', [row(1, [cell('A1', 'x1', 's')])]),
        {},
        ['Name']
      );
      expect(() => sheet.materialize()).toThrow(InvalidSharedStringIndexError);
    });

    it('refuses to stream cells that go back to an emitted row', async () => {
      const sheet = await onlySheet(worksheetXml('A1:A2', [
        row(2, [cell('A2', 'second', 'str')]),
        row(1, [cell('A1', 'first', 'str')]),
      ]));
      const error = catchError(() => Array.from(sheet.rows()));

      expect(error).toBeInstanceOf(CellOrderError);
      expect(error).toMatchObject({ reference: 'A1' });
      // The dense table does not depend on order
      expect(sheet.materialize()).toEqual([['first'], ['second']]);
      expect(sheet.records()).toEqual([record({ first: 'second' })]);
    });
  });

  describe('naming', () => {
    it('follows the relationship targets, not the entry number', async () => {
      const sheets = await sheetsOf({
        sheets: [
          { xml: worksheetXml(null, [row(1, [cell('A1', 'one', 'str')])]) },
          { xml: worksheetXml(null, [row(1, [cell('A1', 'two', 'str')])]) },
        ],
        manifest: false,
        rels: false,
        extra: {
          'xl/workbook.xml': workbookXml([{ name: 'First', rId: 1 }, { name: 'Second', rId: 2 }]),
          'xl/_rels/workbook.xml.rels': workbookRelsXml([
            { rId: 1, target: 'worksheets/sheet2.xml' },
            { rId: 2, target: 'worksheets/sheet1.xml' },
          ]),
        },
      });

      expect(sheets.map(s => s.name)).toEqual(['02_Second', '01_First']);
      expect(sheets.map(s => s.materialize())).toEqual([[['one']], [['two']]]);
    });

    it('falls back to the entry stem without a manifest', async () => {
      const [sheet] = await sheetsOf({
        sheets: [{ xml: worksheetXml(null, [row(1, [cell('A1', 'x', 'str')])]) }],
        manifest: false,
        rels: false,
      });

      expect(sheet.relationship).toBe(1);
      expect(sheet.sheetName).toBe('sheet1');
      expect(sheet.name).toBe('sheet1');
    });

    it('replaces characters that cannot appear in file names', async () => {
      const [sheet] = await sheetsOf({
        sheets: [{ name: 'Q1/Q2: Plan', xml: worksheetXml(null, []) }],
      });

      expect(sheet.sheetName).toBe('Q1/Q2: Plan');
      expect(sheet.name).toBe('01_Q1_Q2_ Plan');
    });
  });
});
