import chalk from 'chalk';
import { resolve } from 'path';
import { createEmptyReadStats, listUsageFiles, mergeUsageFiles, writeUsageFile } from '../../lib/usage-file.js';
import { expandHome } from '../../lib/paths.js';
import { errorMessage } from './options.js';

export interface AggregateCommandOptions {
  datadir: string;
  ofile: string;
}

export async function aggregateCommand(options: AggregateCommandOptions): Promise<void> {
  try {
    const datadir = resolve(expandHome(options.datadir));
    const ofile = resolve(expandHome(options.ofile));
    // The output may live next to the inputs; never merge it into itself
    const files = listUsageFiles(datadir).filter((file) => file !== ofile);

    if (files.length === 0) {
      console.log(chalk.yellow(`[aggregate] no *.txt files in ${datadir}`));
    }

    const stats = createEmptyReadStats();
    const total = await mergeUsageFiles(files, new Map(), stats);
    writeUsageFile(ofile, total);

    if (stats.skipped > 0) {
      console.warn(chalk.yellow(`[aggregate] skipped ${stats.skipped} malformed lines`));
    }
    console.log(`[aggregate] wrote ${ofile} ${chalk.dim(`(${files.length} files, ${total.size} users)`)}`);
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
  }
}
