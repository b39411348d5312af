/**
 * Option Validation Module
 *
 * zod schemas for workbook, conversion and CLI options. Parsing fills in
 * defaults; failures raise `InvalidOptionsError` with one line per issue.
 */

import { z } from 'zod';
import { InvalidOptionsError } from '../errors';
import { FORMATS } from '../writers/formats';

// ============================================================================
// Constants
// ============================================================================

export const MAX_FILE_SIZE = 200 * 1024 * 1024; // 200MB default

// ============================================================================
// Schemas
// ============================================================================

export const OutputFormatSchema = z.enum(FORMATS);

export const WorkbookOptionsSchema = z.object({
  /** Trim cell text and fold line breaks into spaces */
  sanitize: z.boolean().default(true),
  /** Largest accepted input in bytes */
  maxFileSize: z.number().int().positive().default(MAX_FILE_SIZE),
}).strict();

export const ConvertOptionsSchema = z.object({
  formats: z.array(OutputFormatSchema).min(1, 'Choose at least one output format.'),
  /** Directory for output files; defaults to the input file's directory */
  outDir: z.string().min(1).optional(),
}).strict();

export const CliArgsSchema = z.object({
  input: z.string().min(1, 'Missing input file.'),
  formats: z.array(OutputFormatSchema).min(1, 'Choose at least one output format.'),
  outDir: z.string().min(1, '--out-dir needs a directory.').optional(),
  sanitize: z.boolean(),
  quiet: z.boolean(),
  verbose: z.boolean(),
});

export type WorkbookOptions = z.input<typeof WorkbookOptionsSchema>;
export type ResolvedWorkbookOptions = z.output<typeof WorkbookOptionsSchema>;
export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;
export type CliArgs = z.infer<typeof CliArgsSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * One readable line per zod issue, prefixed with the option path when there is one
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidOptionsError(`Invalid ${label}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function parseWorkbookOptions(options: unknown = {}): ResolvedWorkbookOptions {
  return parseWith(WorkbookOptionsSchema, options, 'workbook options');
}

export function parseConvertOptions(options: unknown): ConvertOptions {
  return parseWith(ConvertOptionsSchema, options, 'conversion options');
}
