#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import { VERSION } from './analyzer';
import { runAnalysis, CliOptions } from './cli';

const program = new Command();

program
  .name('pystyle')
  .description('Check Python files for PEP8-style issues (S001-S012)')
  .version(VERSION)
  .argument('<path>', 'Python file, or directory whose .py files are checked (non-recursive)')
  .option('-i, --ignore <codes...>', 'Rule codes to skip, e.g. S001 S005')
  .option('-e, --exclude <patterns...>', 'Glob patterns of file names to skip in a directory')
  .option('-c, --config <file>', 'Config file (default: .pystylerc.yml in the current directory)')
  .option('--json', 'Also write a JSON report to ./pystyle-report.json')
  .option('-o, --output <file>', 'Write the JSON report to this file')
  .option('-v, --verbose', 'Print the target, settings and a summary on stderr')
  .action(async (targetPath: string, options: CliOptions) => {
    try {
      await runAnalysis(targetPath, options);
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
