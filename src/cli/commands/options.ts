import { InvalidArgumentError } from 'commander';
import { parseDateSpec, type DateSpec } from '../../lib/accounting/months.js';

/**
 * Commander argument parser for `YYYY-MM-DD` / `YYYY-MM` values
 */
export function parseDateOption(value: string): DateSpec {
  const spec = parseDateSpec(value);
  if (!spec) {
    throw new InvalidArgumentError('expected YYYY-MM-DD or YYYY-MM');
  }
  return spec;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
