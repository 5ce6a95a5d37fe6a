/**
 * Split command: turn saved scanner output into per-port IP files
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULTS, resolvePaths } from '../../core/config.js';
import { splitByPort } from '../../core/splitter.js';

export const splitCommand = new Command('split')
  .description('Split saved masscan -oL output into open_ips80.txt and open_ips443.txt')
  .argument('<scanOutput>', 'masscan -oL output file')
  .option('-w, --workdir <dir>', 'Directory for the per-port IP files', process.cwd())
  .action(async (scanOutput: string, options: { workdir: string }) => {
    const paths = resolvePaths(options.workdir, DEFAULTS.OUTPUT);

    const result = await splitByPort(scanOutput, paths.open80, paths.open443);
    if (!result.ok) {
      console.error(chalk.red('Error: ') + result.error.message);
      process.exit(1);
    }

    console.log(chalk.gray('├─ ') + `${paths.open80}: ${chalk.cyan.bold(result.value.open80.toString())}`);
    console.log(chalk.gray('└─ ') + `${paths.open443}: ${chalk.cyan.bold(result.value.open443.toString())}`);
  });
