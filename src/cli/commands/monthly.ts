import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'path';
import { resolveDateRange, formatIsoDate, type DateSpec } from '../../lib/accounting/months.js';
import { parsePartitionFilters } from '../../lib/accounting/partitions.js';
import { loadConfig } from '../../lib/config.js';
import { expandHome } from '../../lib/paths.js';
import { collectMonthlyUsage } from '../../lib/monthly.js';
import { errorMessage } from './options.js';

export interface MonthlyCommandOptions {
  start: DateSpec;
  end?: DateSpec;
  partition?: string;
  outdir?: string;
}

export async function monthlyCommand(options: MonthlyCommandOptions): Promise<void> {
  const config = loadConfig();
  const spinner = ora();

  try {
    const range = resolveDateRange(options.start, options.end);
    const partitions = options.partition !== undefined
      ? parsePartitionFilters(options.partition)
      : config.monthly.partitions;
    const outdir = resolve(expandHome(options.outdir ?? config.monthly.outdir));

    console.log(chalk.dim(
      `[monthly] ${formatIsoDate(range.first)} to ${formatIsoDate(range.last)}, ` +
      `partitions: ${partitions.length > 0 ? partitions.join(', ') : '(all)'}`
    ));

    const summaries = await collectMonthlyUsage(range, {
      outdir,
      partitions,
      command: config.sacct.command,
      onMonthStart: (month) => {
        spinner.start(`[monthly] ${month} …`);
      },
      onMonthDone: (summary) => {
        spinner.succeed(`[monthly] ${summary.month} ${chalk.green('done')} ${chalk.dim(`(${summary.users} users)`)}`);
        const skipped = summary.stats.malformed + summary.stats.invalidSeconds;
        if (skipped > 0) {
          console.warn(chalk.yellow(
            `[monthly] ${summary.month}: skipped ${summary.stats.malformed} malformed rows ` +
            `and ${summary.stats.invalidSeconds} rows with non-numeric seconds`
          ));
        }
      },
    });

    console.log(chalk.dim(`[monthly] wrote ${summaries.length} file(s) to ${outdir}`));
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail(chalk.red('[monthly] failed'));
    }
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}
