/**
 * Group affiliation
 *
 * Looks up a user's Unix groups and filters usage by project membership.
 */

import { readFileSync } from 'fs';
import { execa } from 'execa';
import type { UsageMap } from './accounting/types.js';

export type AffiliationMode = 'keep' | 'drop';

export type GroupLookup = (user: string) => Promise<Set<string>>;

/**
 * Primary and supplementary groups of `user`.
 *
 * An unknown user (or any lookup failure) has no groups.
 */
export async function lookupUserGroups(user: string, command: string = 'id'): Promise<Set<string>> {
  try {
    const { stdout } = await execa(command, ['-Gn', user]);
    return new Set(stdout.trim().split(/\s+/).filter(Boolean));
  } catch {
    return new Set();
  }
}

/**
 * Split a comma-separated project list, dropping blanks
 */
export function parseProjectList(raw: string): string[] {
  return raw.split(',').map((item) => item.trim()).filter(Boolean);
}

/**
 * One project group name per line, blank lines skipped
 */
export function readProjectList(path: string): string[] {
  return readFileSync(path, 'utf-8')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Keep or drop users that share a group with `projects`.
 *
 * Returns a new map; users are looked up one after another.
 */
export async function filterByAffiliation(
  usage: UsageMap,
  projects: Iterable<string>,
  mode: AffiliationMode,
  lookup: GroupLookup = lookupUserGroups,
): Promise<UsageMap> {
  const projectSet = new Set(projects);
  const result: UsageMap = new Map();

  for (const [user, seconds] of usage) {
    const groups = await lookup(user);
    const affiliated = [...groups].some((group) => projectSet.has(group));
    if (affiliated === (mode === 'keep')) {
      result.set(user, seconds);
    }
  }

  return result;
}
