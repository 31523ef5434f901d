import { readFileSync, existsSync } from 'fs';
import { parse } from '@iarna/toml';
import { CONFIG_FILE } from './paths.js';

export interface TopusersConfig {
  sacct: {
    command: string;      // Accounting binary, looked up on PATH
  };
  monthly: {
    partitions: string[]; // Prefixes or wildcards; empty means every partition
    outdir: string;       // Where YYYY-MM.txt files land
  };
  groups: {
    command: string;      // Identity binary used for `<command> -Gn <user>`
  };
}

const DEFAULT_CONFIG: TopusersConfig = {
  sacct: {
    command: 'sacct',
  },
  monthly: {
    partitions: ['lrz-hgx-h100-94x4'],
    outdir: '.',
  },
  groups: {
    command: 'id',
  },
};

type SectionOverrides = {
  [K in keyof TopusersConfig]: Partial<TopusersConfig[K]>;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Shallow merge of one config section.
 * - Undefined overrides keep the default
 * - Arrays in overrides replace defaults (not concatenated)
 */
function mergeSection<T extends object>(defaults: T, overrides: Partial<T>): T {
  const result = { ...defaults };

  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function readString(section: Record<string, unknown>, key: string): string | undefined {
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

function readStringList(section: Record<string, unknown>, key: string): string[] | undefined {
  const value = section[key];
  if (typeof value === 'string') return value.split(',').map((s) => s.trim()).filter(Boolean);
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return undefined;
}

/**
 * Pick the known keys out of a parsed TOML document.
 * Unknown sections and wrongly-typed values are ignored.
 */
function toOverrides(doc: Record<string, unknown>): SectionOverrides {
  const sacct = isPlainObject(doc.sacct) ? doc.sacct : {};
  const monthly = isPlainObject(doc.monthly) ? doc.monthly : {};
  const groups = isPlainObject(doc.groups) ? doc.groups : {};

  return {
    sacct: { command: readString(sacct, 'command') },
    monthly: {
      partitions: readStringList(monthly, 'partitions'),
      outdir: readString(monthly, 'outdir'),
    },
    groups: { command: readString(groups, 'command') },
  };
}

export function loadConfig(configFile: string = CONFIG_FILE): TopusersConfig {
  if (!existsSync(configFile)) {
    return getDefaultConfig();
  }

  try {
    const content = readFileSync(configFile, 'utf8');
    const defaults = getDefaultConfig();
    const overrides = toOverrides(parse(content));
    return {
      sacct: mergeSection(defaults.sacct, overrides.sacct),
      monthly: mergeSection(defaults.monthly, overrides.monthly),
      groups: mergeSection(defaults.groups, overrides.groups),
    };
  } catch (error) {
    console.warn(`Warning: Failed to parse ${configFile}, using defaults`, error);
    return getDefaultConfig();
  }
}

export function getDefaultConfig(): TopusersConfig {
  return structuredClone(DEFAULT_CONFIG);
}
