import { describe, expect, it } from 'vitest';
import { InvalidOptionsError } from '../lib/errors';
import {
  CliArgsSchema,
  MAX_FILE_SIZE,
  parseConvertOptions,
  parseWorkbookOptions,
} from '../lib/validation';
import { catchError } from './helpers/catch-error';

describe('parseWorkbookOptions', () => {
  it('fills in defaults', () => {
    expect(parseWorkbookOptions()).toEqual({ sanitize: true, maxFileSize: MAX_FILE_SIZE });
    expect(parseWorkbookOptions({ sanitize: false })).toEqual({ sanitize: false, maxFileSize: MAX_FILE_SIZE });
  });

  it('rejects unknown keys and bad values with one issue each', () => {
    const error = catchError(() => parseWorkbookOptions({ maxFileSize: 0, colour: 'blue' }));

    expect(error).toBeInstanceOf(InvalidOptionsError);
    expect(error).toHaveProperty('issues.length', 2);
    expect(error).toHaveProperty('code', 'INVALID_OPTIONS');
  });
});

describe('parseConvertOptions', () => {
  it('accepts formats with an optional directory', () => {
    expect(parseConvertOptions({ formats: ['csv'] })).toEqual({ formats: ['csv'] });
    expect(parseConvertOptions({ formats: ['json', 'yaml'], outDir: 'out' })).toEqual({
      formats: ['json', 'yaml'],
      outDir: 'out',
    });
  });

  it('requires at least one format', () => {
    const error = catchError(() => parseConvertOptions({ formats: [] }));
    expect(error).toMatchObject({ issues: ['formats: Choose at least one output format.'] });
  });

  it('rejects unsupported formats', () => {
    expect(() => parseConvertOptions({ formats: ['xml'] })).toThrow(InvalidOptionsError);
  });
});

describe('CliArgsSchema', () => {
  it('reports a missing --out-dir value', () => {
    const result = CliArgsSchema.safeParse({
      input: 'a.xlsx',
      formats: ['csv'],
      outDir: '',
      sanitize: true,
      quiet: false,
      verbose: false,
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map(issue => issue.message)).toEqual(['--out-dir needs a directory.']);
  });
});
