import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { TEMP_DIR } from '../../setup.js';
import { aggregateCommand } from '../../../src/cli/commands/aggregate.js';

describe('aggregate command', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.mocked(process.exit).mockRestore();
    vi.mocked(console.error).mockRestore();
    vi.mocked(console.log).mockRestore();
    vi.mocked(console.warn).mockRestore();
  });

  it('should not merge its own output when run twice inside the data directory', async () => {
    writeFileSync(join(TEMP_DIR, '2024-01.txt'), 'alice 100\nbob 50\n', 'utf-8');
    writeFileSync(join(TEMP_DIR, '2024-02.txt'), 'alice 25\n', 'utf-8');
    const ofile = join(TEMP_DIR, 'total.txt');

    await aggregateCommand({ datadir: TEMP_DIR, ofile });
    expect(readFileSync(ofile, 'utf-8')).toBe('alice 125\nbob 50\n');

    await aggregateCommand({ datadir: TEMP_DIR, ofile });
    expect(readFileSync(ofile, 'utf-8')).toBe('alice 125\nbob 50\n');

    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should warn about malformed lines and still write the totals', async () => {
    writeFileSync(join(TEMP_DIR, '2024-01.txt'), 'alice 10\nbroken\n', 'utf-8');
    const ofile = join(TEMP_DIR, 'out', 'total.txt');

    await aggregateCommand({ datadir: TEMP_DIR, ofile });

    expect(readFileSync(ofile, 'utf-8')).toBe('alice 10\n');
    expect(console.warn).toHaveBeenCalledWith(chalk.yellow('[aggregate] skipped 1 malformed lines'));
  });

  it('should exit 1 when the output cannot be written', async () => {
    writeFileSync(join(TEMP_DIR, '2024-01.txt'), 'alice 10\n', 'utf-8');
    writeFileSync(join(TEMP_DIR, 'blocker'), '', 'utf-8');

    await aggregateCommand({ datadir: TEMP_DIR, ofile: join(TEMP_DIR, 'blocker', 'total.txt') });

    expect(console.error).toHaveBeenCalledWith(chalk.red('Error:'), expect.stringContaining('blocker'));
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
