/**
 * Monthly collection
 *
 * Runs one sacct query per calendar month and writes `<outdir>/YYYY-MM.txt`
 * before moving on, so only a single month's totals are held at a time.
 */

import { join } from 'path';
import { aggregateUsage } from './accounting/aggregator.js';
import { formatMonth, monthBounds } from './accounting/months.js';
import { parsePartitionFilters, partitionHint } from './accounting/partitions.js';
import { collectUsageLines, type CollectOptions } from './accounting/sacct.js';
import { createEmptyStats, type AggregationStats, type DateRange, type MonthSpan } from './accounting/types.js';
import { writeUsageFile } from './usage-file.js';

export type LineCollector = (first: Date, last: Date, options: CollectOptions) => AsyncIterable<string>;

export interface MonthlyOptions {
  /** Directory for the YYYY-MM.txt files */
  outdir: string;

  /** Partition prefixes or wildcards; empty means every partition */
  partitions: readonly string[];

  /** Accounting binary (default: sacct) */
  command?: string;

  /** Replaces the sacct collector, mainly for tests */
  collect?: LineCollector;

  onMonthStart?: (month: string, span: MonthSpan) => void;
  onMonthDone?: (summary: MonthSummary) => void;
}

export interface MonthSummary {
  month: string;
  span: MonthSpan;
  file: string;
  users: number;
  seconds: number;
  stats: AggregationStats;
}

/**
 * Collect, aggregate and write one usage file per month of `range`.
 *
 * A failing sacct run aborts the remaining months; files already written
 * are kept.
 */
export async function collectMonthlyUsage(range: DateRange, options: MonthlyOptions): Promise<MonthSummary[]> {
  const collect = options.collect ?? collectUsageLines;
  const filters = parsePartitionFilters(options.partitions);
  const partition = partitionHint(filters);
  const summaries: MonthSummary[] = [];

  for (const span of monthBounds(range.first, range.last)) {
    const month = formatMonth(span.first);
    options.onMonthStart?.(month, span);

    const stats = createEmptyStats();
    const usage = await aggregateUsage(
      collect(span.first, span.last, { partition, command: options.command }),
      filters,
      { stats },
    );

    const file = join(options.outdir, `${month}.txt`);
    writeUsageFile(file, usage);

    let seconds = 0;
    for (const value of usage.values()) seconds += value;

    const summary: MonthSummary = { month, span, file, users: usage.size, seconds, stats };
    summaries.push(summary);
    options.onMonthDone?.(summary);
  }

  return summaries;
}
