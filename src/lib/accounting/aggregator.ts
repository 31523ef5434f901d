/**
 * Usage aggregation
 *
 * Folds `user|partition|seconds` rows into per-user CPU-second totals.
 * Rows are consumed one at a time, so a month of accounting output never has
 * to sit in memory.
 */

import { compilePartitionFilter } from './partitions.js';
import type { AggregationStats, PartitionFilter, UsageLine, UsageMap } from './types.js';

const SECONDS_PATTERN = /^\s*\d+\s*$/;

export interface AggregateOptions {
  /** Existing totals to add to; a fresh map is created when omitted */
  usage?: UsageMap;

  /** Receives counts of accepted and skipped rows */
  stats?: AggregationStats;
}

/**
 * Add `seconds` to a user's total, creating the entry at 0 first
 */
export function addUsage(usage: UsageMap, identity: string, seconds: number): UsageMap {
  usage.set(identity, (usage.get(identity) ?? 0) + seconds);
  return usage;
}

/**
 * Split a row on its first two pipes.
 *
 * Returns null when there are fewer than two. Any further pipes stay in the
 * seconds field (and make it non-numeric).
 */
export function parseUsageLine(line: string): UsageLine | null {
  const firstPipe = line.indexOf('|');
  if (firstPipe === -1) return null;

  const secondPipe = line.indexOf('|', firstPipe + 1);
  if (secondPipe === -1) return null;

  return {
    identity: line.slice(0, firstPipe),
    partition: line.slice(firstPipe + 1, secondPipe),
    seconds: line.slice(secondPipe + 1),
  };
}

/**
 * Parse a non-negative integer seconds field, or null
 */
export function parseSeconds(text: string): number | null {
  if (!SECONDS_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Sum CPU seconds per user for rows whose partition matches `filter`.
 *
 * Malformed rows, rows with an empty user and rows with non-numeric seconds
 * are skipped; they never abort the pass. Pass `options.usage` to keep
 * accumulating into the same map across calls.
 */
export async function aggregateUsage(
  lines: Iterable<string> | AsyncIterable<string>,
  filter: PartitionFilter,
  options: AggregateOptions = {},
): Promise<UsageMap> {
  const usage = options.usage ?? new Map<string, number>();
  const matches = compilePartitionFilter(filter);
  const stats = options.stats;

  for await (const line of lines) {
    const row = parseUsageLine(line);
    if (!row) {
      if (stats) stats.malformed++;
      continue;
    }

    if (!row.identity || !matches(row.partition)) {
      if (stats) stats.filtered++;
      continue;
    }

    const seconds = parseSeconds(row.seconds);
    if (seconds === null) {
      if (stats) stats.invalidSeconds++;
      continue;
    }

    addUsage(usage, row.identity, seconds);
    if (stats) stats.accepted++;
  }

  return usage;
}
