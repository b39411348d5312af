#!/usr/bin/env node
/**
 * Spreadsheet Conversion CLI
 *
 * Converts every worksheet of an Excel 2007+ file to CSV, JSON and/or YAML.
 * Each sheet is written to `<dir>/<file stem>.<NN>_<sheet name>.<ext>`.
 *
 * Usage:
 *   npx tsx cli/convert.ts <file.xlsx> [options]
 *   npx tsx cli/convert.ts ./data/report.xlsx --csv
 *   npx tsx cli/convert.ts ./data/report.xlsx --json --yaml -o ./out
 *
 * Options:
 *   --csv              Write CSV
 *   --json             Write JSON records (first row = field names)
 *   --yaml             Write YAML records
 *   --out-dir, -o      Output directory (default: the input file's directory)
 *   --no-sanitize      Keep cell text exactly as stored
 *   --quiet, -q        Suppress progress messages
 *   --verbose, -v      Show timings and sheet details
 *   --help, -h         Show this help message
 */

import { convertWorkbook } from '../lib/convert';
import { ConversionSession } from '../lib/debug';
import { isTabulateError, NotAnArchiveError } from '../lib/errors';
import { CliArgsSchema, type CliArgs } from '../lib/validation';
import { Workbook } from '../lib/workbook/workbook';
import { isOutputFormat, type OutputFormat } from '../lib/writers/formats';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

// ============================================================================
// Argument Parsing
// ============================================================================

interface RawArgs {
  input: string;
  formats: OutputFormat[];
  outDir?: string;
  sanitize: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  unknown: string[];
}

export function parseArgs(args: string[]): RawArgs {
  const result: RawArgs = {
    input: '',
    formats: [],
    outDir: undefined,
    sanitize: true,
    quiet: false,
    verbose: false,
    help: false,
    unknown: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--out-dir':
      case '-o':
        result.outDir = args[++i] ?? '';
        break;
      case '--no-sanitize':
        result.sanitize = false;
        break;
      case '--quiet':
      case '-q':
        result.quiet = true;
        break;
      case '--verbose':
      case '-v':
        result.verbose = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default: {
        const flag = arg.startsWith('--') ? arg.slice(2) : '';
        if (isOutputFormat(flag)) {
          if (!result.formats.includes(flag)) result.formats.push(flag);
        } else if (arg.startsWith('-')) {
          result.unknown.push(arg);
        } else if (!result.input) {
          result.input = arg;
        } else {
          result.unknown.push(arg);
        }
        break;
      }
    }
  }

  return result;
}

export const HELP_TEXT = `
xlsx-tabulate: convert Excel 2007+ worksheets to CSV, JSON and YAML

Usage:
  xlsx-tabulate <file.xlsx> [--csv] [--json] [--yaml] [options]

Examples:
  xlsx-tabulate ./report.xlsx --csv                 # report.01_Sheet1.csv beside the input
  xlsx-tabulate ./report.xlsx --json --yaml -o out  # JSON and YAML records into ./out

Formats (choose at least one):
  --csv                 One line per row
  --json                Array of records, first row = field names
  --yaml                Same records as YAML

Options:
  -o, --out-dir <dir>   Output directory (default: the input file's directory)
  --no-sanitize         Keep cell text exactly as stored
  -q, --quiet           Suppress progress messages
  -v, --verbose         Show timings and sheet details
  -h, --help            Show this help message
`;

// ============================================================================
// Main
// ============================================================================

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIO: CliIO = {
  out: text => console.log(text),
  err: text => console.error(text),
};

/**
 * Run the CLI and return its exit code
 */
export function run(argv: string[], io: CliIO = defaultIO): number {
  const raw = parseArgs(argv);

  if (raw.help) {
    io.out(HELP_TEXT);
    return EXIT_OK;
  }

  const parsed = CliArgsSchema.safeParse(raw);
  const problems = [
    ...(parsed.success ? [] : parsed.error.issues.map(issue => issue.message)),
    ...raw.unknown.map(arg => `Unknown argument: ${arg}`),
  ];

  if (!parsed.success || problems.length > 0) {
    for (const problem of problems) {
      io.err(`Error: ${problem}`);
    }
    io.err(HELP_TEXT);
    return EXIT_USAGE;
  }

  return convert(parsed.data, io);
}

function convert(args: CliArgs, io: CliIO): number {
  const log = args.quiet ? () => {} : (message: string) => io.err(message);
  const session = new ConversionSession({ verbose: args.verbose, logger: log });

  try {
    const workbook = new Workbook(args.input, { sanitize: args.sanitize });
    const result = convertWorkbook(workbook, { formats: args.formats, outDir: args.outDir }, session);

    if (result.sheets.length === 0) {
      session.warn(`No worksheets found in ${args.input}`);
    }
    log(session.summary());
    return EXIT_OK;
  } catch (error) {
    if (error instanceof NotAnArchiveError) {
      io.err(`Error: "${args.input}" is not an Excel 2007+ file`);
      if (args.verbose && error.cause) io.err(`  ${error.cause.message}`);
    } else {
      const message = error instanceof Error ? `${error.message} (${error.name})` : String(error);
      io.err(`Error: ${message}`);
    }
    if (args.verbose && isTabulateError(error)) io.err(`  code: ${error.code}`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  process.exit(run(process.argv.slice(2)));
}
