/**
 * Usage files
 *
 * Plain-text `user seconds` files, one per month, written in descending
 * order of seconds. The same files are merged back into totals through the
 * aggregator's addUsage().
 */

import { createReadStream, existsSync, mkdirSync, readdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { createInterface } from 'readline';
import { addUsage, parseSeconds } from './accounting/aggregator.js';
import type { UsageMap } from './accounting/types.js';

export interface UsageEntry {
  identity: string;
  seconds: number;
}

export interface ReadUsageStats {
  entries: number;
  skipped: number;
}

/**
 * Entries by descending seconds, ties broken by user name
 */
export function sortUsage(usage: UsageMap): UsageEntry[] {
  return Array.from(usage, ([identity, seconds]) => ({ identity, seconds })).sort((a, b) => {
    if (a.seconds !== b.seconds) return b.seconds - a.seconds;
    if (a.identity < b.identity) return -1;
    return a.identity > b.identity ? 1 : 0;
  });
}

export function formatUsage(usage: UsageMap): string {
  return sortUsage(usage)
    .map((entry) => `${entry.identity} ${entry.seconds}\n`)
    .join('');
}

export function writeUsageFile(path: string, usage: UsageMap): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, formatUsage(usage), 'utf-8');
}

/**
 * Stream `[user, seconds]` pairs from a usage file.
 *
 * Blank lines and lines that are not exactly `user seconds` are skipped.
 */
export async function* readUsageFile(
  path: string,
  stats?: ReadUsageStats,
): AsyncGenerator<[string, number], void, undefined> {
  const input = createReadStream(path, { encoding: 'utf-8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      const parts = line.trim().split(/\s+/);
      if (parts.length !== 2) {
        if (stats && line.trim()) stats.skipped++;
        continue;
      }

      const seconds = parseSeconds(parts[1]);
      if (seconds === null) {
        if (stats) stats.skipped++;
        continue;
      }

      if (stats) stats.entries++;
      yield [parts[0], seconds];
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

/**
 * Monthly `*.txt` files in a directory, sorted by name
 */
export function listUsageFiles(dir: string): string[] {
  if (!existsSync(dir)) {
    return [];
  }

  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith('.txt'))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Sum several usage files into one map
 */
export async function mergeUsageFiles(
  paths: readonly string[],
  usage: UsageMap = new Map(),
  stats?: ReadUsageStats,
): Promise<UsageMap> {
  for (const path of paths) {
    for await (const [identity, seconds] of readUsageFile(path, stats)) {
      addUsage(usage, identity, seconds);
    }
  }
  return usage;
}

export function createEmptyReadStats(): ReadUsageStats {
  return { entries: 0, skipped: 0 };
}
