/**
 * Accounting Types
 *
 * Type definitions shared by the sacct collector and the usage aggregator.
 */

/**
 * Inclusive pair of calendar dates, both at UTC midnight.
 */
export interface DateRange {
  first: Date;
  last: Date;
}

/**
 * A DateRange whose bounds fall inside one calendar month
 */
export type MonthSpan = DateRange;

/**
 * Accumulated CPU seconds per user name.
 *
 * Values only ever grow; see addUsage().
 */
export type UsageMap = Map<string, number>;

/**
 * One prefix, or an ordered list of prefixes and shell-style wildcards.
 *
 * An empty string or empty list matches every partition.
 */
export type PartitionFilter = string | readonly string[];

/**
 * One `user|partition|seconds` row split into its fields
 */
export interface UsageLine {
  identity: string;
  partition: string;
  seconds: string;
}

/**
 * Counters for rows the aggregator looked at.
 *
 * Malformed rows and rows with non-numeric seconds are skipped, never thrown;
 * pass a stats object to find out how many were dropped.
 */
export interface AggregationStats {
  /** Rows that contributed to the totals */
  accepted: number;

  /** Well-formed rows excluded by the partition filter or an empty user */
  filtered: number;

  /** Rows without two pipe delimiters */
  malformed: number;

  /** Rows whose seconds field is not a non-negative integer */
  invalidSeconds: number;
}

export function createEmptyStats(): AggregationStats {
  return { accepted: 0, filtered: 0, malformed: 0, invalidSeconds: 0 };
}

