/**
 * Output formats understood by the writers and the CLI
 */

export const FORMATS = ['csv', 'json', 'yaml'] as const;

export type OutputFormat = (typeof FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (FORMATS as readonly string[]).includes(value);
}
