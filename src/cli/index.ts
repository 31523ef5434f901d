#!/usr/bin/env node
import { Command } from 'commander';
import { monthlyCommand } from './commands/monthly.js';
import { aggregateCommand } from './commands/aggregate.js';
import { mcmlCommand, nomcmlCommand } from './commands/mcml.js';
import { parseDateOption } from './commands/options.js';

const program = new Command();

program
  .name('topusers')
  .description('Slurm per-user CPU usage reports')
  .version('0.3.0');

program
  .command('monthly')
  .description('Collect monthly sacct usage into YYYY-MM.txt files')
  .requiredOption('--start <date>', 'Start date (YYYY-MM-DD) or month (YYYY-MM)', parseDateOption)
  .option('--end <date>', 'End date (YYYY-MM-DD) or month (YYYY-MM)', parseDateOption)
  .option(
    '--partition <filters>',
    'Comma-separated partition filters; prefix match, or wildcards like \'lrz*\'. ' +
      'A single name with three or more dash-separated segments is passed to sacct, ' +
      'which matches it exactly (default from config)'
  )
  .option('--outdir <dir>', 'Output directory for YYYY-MM.txt files (default from config)')
  .action(monthlyCommand);

program
  .command('aggregate')
  .description('Merge all monthly *.txt files into one totals file')
  .requiredOption('--datadir <dir>', 'Directory with monthly *.txt files')
  .requiredOption('--ofile <file>', 'Output file for totals')
  .action(aggregateCommand);

program
  .command('mcml')
  .description('Keep (--yes) or drop (--no) users belonging to the given project groups')
  .requiredOption('--ifile <file>', 'Per-user totals to filter')
  .requiredOption('--ofile <file>', 'Output file after filtering')
  .option('--mcmlprojects <groups>', 'Comma-separated project group names (e.g. abc123,def456)')
  .option('--mcmlfile <file>', 'File with one project group name per line')
  .option('--yes', 'Keep only affiliated users')
  .option('--no', 'Drop affiliated users')
  .action(mcmlCommand);

program
  .command('nomcml')
  .description('Drop users belonging to the given project groups (same as mcml --no)')
  .requiredOption('--ifile <file>', 'Per-user totals to filter')
  .requiredOption('--ofile <file>', 'Output file after filtering')
  .option('--mcmlprojects <groups>', 'Comma-separated project group names (e.g. abc123,def456)')
  .option('--mcmlfile <file>', 'File with one project group name per line')
  .action(nomcmlCommand);

await program.parseAsync();
