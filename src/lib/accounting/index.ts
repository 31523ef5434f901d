/**
 * Slurm accounting
 *
 * Streams sacct output month by month and folds it into per-user totals:
 * 1. monthBounds() splits a date range into calendar months
 * 2. collectUsageLines() streams one month of sacct rows
 * 3. aggregateUsage() sums matching rows per user
 */

export * from './types.js';
export * from './errors.js';
export * from './months.js';
export * from './partitions.js';
export * from './sacct.js';
export * from './aggregator.js';
