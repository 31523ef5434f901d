/**
 * Partition name matching.
 *
 * Plain entries match by prefix (`lrz-gpu` matches `lrz-gpu-a`); entries with
 * `*`, `?` or `[...]` are shell-style wildcards matched against the whole
 * partition name.
 */

import type { PartitionFilter } from './types.js';

const WILDCARD_CHARS = /[*?[]/;

export type PartitionPredicate = (partition: string) => boolean;

export function hasWildcard(pattern: string): boolean {
  return WILDCARD_CHARS.test(pattern);
}

/**
 * Whether a partition name is specific enough to hand to sacct as
 * `--partition`: no wildcards and at least three dash-separated segments,
 * e.g. `lrz-hgx-h100-94x4`. Such a name is matched exactly by sacct, not as a
 * prefix.
 */
export function isFullyQualifiedPartition(name: string | undefined): name is string {
  if (!name || hasWildcard(name) || name.includes(',')) {
    return false;
  }
  return name.split('-').filter(Boolean).length >= 3;
}

/**
 * Split comma-separated filters and drop blanks.
 *
 * Accepts repeated CLI values too, so `['a,b', 'c']` gives `['a', 'b', 'c']`.
 */
export function parsePartitionFilters(raw: string | readonly string[] | undefined): string[] {
  if (raw === undefined) {
    return [];
  }
  const items = typeof raw === 'string' ? [raw] : raw;
  return items
    .flatMap((item) => item.split(','))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Translate a shell-style wildcard into an anchored RegExp
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '*') {
      source += '.*';
      i++;
    } else if (ch === '?') {
      source += '.';
      i++;
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        // Unterminated class, treat the bracket literally
        source += '\\[';
        i++;
        continue;
      }
      let body = pattern.slice(i + 1, close);
      const negated = body.startsWith('!');
      if (negated) body = body.slice(1);
      source += `[${negated ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = close + 1;
    } else {
      source += escapeRegExp(ch);
      i++;
    }
  }

  return new RegExp(`^${source}$`);
}

/**
 * Build a predicate for one filter.
 *
 * The filter's entries are tried in order; the first match wins.
 */
export function compilePartitionFilter(filter: PartitionFilter): PartitionPredicate {
  const entries = typeof filter === 'string' ? [filter] : filter;
  const patterns = entries.filter((entry) => entry.length > 0);

  if (patterns.length === 0) {
    return () => true;
  }

  const matchers: PartitionPredicate[] = patterns.map((pattern) => {
    if (hasWildcard(pattern)) {
      const regex = wildcardToRegExp(pattern);
      return (partition) => regex.test(partition);
    }
    return (partition) => partition.startsWith(pattern);
  });

  return (partition) => matchers.some((match) => match(partition));
}

/**
 * Pick the server-side `--partition` hint for a filter, if there is one.
 *
 * Only a single fully qualified entry is pushed down; anything broader is
 * filtered client-side. sacct matches `--partition` exactly, so a pushed-down
 * entry no longer prefix-matches: `lrz-hgx-h100` selects that partition only,
 * not `lrz-hgx-h100-94x4`. Use a wildcard (`lrz-hgx-h100*`) to keep the
 * longer names.
 */
export function partitionHint(filter: PartitionFilter): string | undefined {
  const entries = parsePartitionFilters(filter);
  if (entries.length !== 1) {
    return undefined;
  }
  return isFullyQualifiedPartition(entries[0]) ? entries[0] : undefined;
}
