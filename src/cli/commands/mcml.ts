import chalk from 'chalk';
import { resolve } from 'path';
import { loadConfig } from '../../lib/config.js';
import {
  filterByAffiliation,
  lookupUserGroups,
  parseProjectList,
  readProjectList,
  type AffiliationMode,
} from '../../lib/groups.js';
import { mergeUsageFiles, writeUsageFile } from '../../lib/usage-file.js';
import { expandHome } from '../../lib/paths.js';
import { errorMessage } from './options.js';

export interface McmlOptions {
  ifile: string;
  ofile: string;
  mcmlprojects?: string;
  mcmlfile?: string;
  yes?: boolean;
  no?: boolean;
}

/**
 * Project groups from exactly one of --mcmlprojects / --mcmlfile
 */
export function resolveProjects(options: Pick<McmlOptions, 'mcmlprojects' | 'mcmlfile'>): string[] {
  if (options.mcmlprojects !== undefined && options.mcmlfile !== undefined) {
    throw new Error('--mcmlprojects and --mcmlfile are mutually exclusive');
  }
  if (options.mcmlfile !== undefined) {
    return readProjectList(resolve(expandHome(options.mcmlfile)));
  }
  if (options.mcmlprojects !== undefined) {
    return parseProjectList(options.mcmlprojects);
  }
  throw new Error('one of --mcmlprojects or --mcmlfile is required');
}

export function resolveMode(options: Pick<McmlOptions, 'yes' | 'no'>): AffiliationMode {
  if (options.yes && options.no) {
    throw new Error('--yes and --no are mutually exclusive');
  }
  if (options.yes) return 'keep';
  if (options.no) return 'drop';
  throw new Error('one of --yes or --no is required');
}

async function runFilter(label: string, options: McmlOptions, mode: AffiliationMode): Promise<void> {
  const config = loadConfig();
  const projects = resolveProjects(options);
  const ofile = resolve(expandHome(options.ofile));

  const usage = await mergeUsageFiles([resolve(expandHome(options.ifile))]);
  const filtered = await filterByAffiliation(usage, projects, mode, (user) =>
    lookupUserGroups(user, config.groups.command)
  );

  writeUsageFile(ofile, filtered);
  console.log(`[${label}] wrote ${ofile} ${chalk.dim(`(${filtered.size} of ${usage.size} users)`)}`);
}

export async function mcmlCommand(options: McmlOptions): Promise<void> {
  try {
    const mode = resolveMode(options);
    await runFilter(`mcml ${options.yes ? 'yes' : 'no'}`, options, mode);
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}

export async function nomcmlCommand(options: McmlOptions): Promise<void> {
  try {
    await runFilter('nomcml', options, 'drop');
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}
