import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { TEMP_DIR } from '../../setup.js';
import { mcmlCommand, nomcmlCommand } from '../../../src/cli/commands/mcml.js';
import { lookupUserGroups } from '../../../src/lib/groups.js';

vi.mock('../../../src/lib/groups.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/lib/groups.js')>();
  return {
    ...actual,
    lookupUserGroups: vi.fn(),
  };
});

vi.mock('../../../src/lib/config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/lib/config.js')>();
  return {
    ...actual,
    loadConfig: vi.fn(() => actual.getDefaultConfig()),
  };
});

const GROUPS: Record<string, string[]> = {
  alice: ['alice', 'pn12ab'],
  bob: ['bob', 'staff'],
  carol: ['carol', 'pn34cd'],
};

describe('mcml commands', () => {
  let ifile: string;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(lookupUserGroups).mockImplementation(async (user) => new Set(GROUPS[user] ?? []));
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});

    ifile = join(TEMP_DIR, 'total.txt');
    writeFileSync(ifile, 'alice 300\nbob 200\ncarol 100\n', 'utf-8');
  });

  afterEach(() => {
    vi.mocked(process.exit).mockRestore();
    vi.mocked(console.error).mockRestore();
    vi.mocked(console.log).mockRestore();
  });

  it('should keep affiliated users with --yes', async () => {
    const ofile = join(TEMP_DIR, 'mcml.txt');

    await mcmlCommand({ ifile, ofile, mcmlprojects: 'pn12ab,pn34cd', yes: true });

    expect(readFileSync(ofile, 'utf-8')).toBe('alice 300\ncarol 100\n');
    expect(lookupUserGroups).toHaveBeenCalledWith('alice', 'id');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should drop affiliated users with nomcml', async () => {
    const ofile = join(TEMP_DIR, 'nomcml.txt');

    await nomcmlCommand({ ifile, ofile, mcmlprojects: 'pn12ab' });

    expect(readFileSync(ofile, 'utf-8')).toBe('bob 200\ncarol 100\n');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should read project groups from --mcmlfile', async () => {
    const projects = join(TEMP_DIR, 'projects.list');
    writeFileSync(projects, 'pn34cd\n\n', 'utf-8');
    const ofile = join(TEMP_DIR, 'no.txt');

    await mcmlCommand({ ifile, ofile, mcmlfile: projects, no: true });

    expect(readFileSync(ofile, 'utf-8')).toBe('alice 300\nbob 200\n');
  });

  it('should exit 1 without --yes or --no', async () => {
    const ofile = join(TEMP_DIR, 'never.txt');

    await mcmlCommand({ ifile, ofile, mcmlprojects: 'pn12ab' });

    expect(console.error).toHaveBeenCalledWith(chalk.red('Error:'), 'one of --yes or --no is required');
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(existsSync(ofile)).toBe(false);
    expect(lookupUserGroups).not.toHaveBeenCalled();
  });
});
