#!/usr/bin/env node

/**
 * titlesweep CLI entry point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { listCommand } from './commands/list.js';
import { splitCommand } from './commands/split.js';
import { titlesCommand } from './commands/titles.js';
import { permuteCommand } from './commands/permute.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('titlesweep')
  .description('Port-scan targets and report the page titles of reachable web hosts')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('TITLESWEEP')} ${chalk.gray(`v${VERSION}`)}                                   ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('masscan → zgrab2 → page titles')}                          ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

// Register commands
program.addCommand(scanCommand, { isDefault: true });
program.addCommand(listCommand);
program.addCommand(splitCommand);
program.addCommand(titlesCommand);
program.addCommand(permuteCommand);

// Error handling
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  // commander has already printed its own message
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`));
    process.exit(1);
  }
  throw error;
}
