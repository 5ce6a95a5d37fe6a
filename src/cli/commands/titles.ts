/**
 * Titles command: build the report from saved grabber output
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULTS } from '../../core/config.js';
import { extractTitles, FileReportSink } from '../../core/titles.js';

export const titlesCommand = new Command('titles')
  .description('Extract page titles from saved zgrab2 JSON-lines output')
  .argument('<grabOutputs...>', 'zgrab2 output files, processed in the given order')
  .option('-o, --output <file>', 'Report file', DEFAULTS.OUTPUT)
  .action(async (grabOutputs: string[], options: { output: string }) => {
    const opened = await FileReportSink.open(options.output);
    if (!opened.ok) {
      console.error(chalk.red('Error: ') + opened.error.message);
      process.exit(1);
    }

    const sink = opened.value;
    let lines = 0;
    try {
      for (const file of grabOutputs) {
        const result = await extractTitles(file, sink);
        if (!result.ok) {
          console.error(chalk.red('Error: ') + result.error.message);
          process.exitCode = 1;
          return;
        }
        lines += result.value.lines;
      }
    } finally {
      await sink.close();
    }

    console.log(chalk.green('✔ ') + `${lines} report lines written to ${chalk.blue(options.output)}`);
  });
