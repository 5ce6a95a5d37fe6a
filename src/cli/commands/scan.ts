/**
 * Scan command implementation
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { Pipeline } from '../../core/app.js';
import { isValidPortList, isValidRate, loadConfig } from '../../core/config.js';
import { configurationError } from '../../core/errors.js';
import type { PipelineConfig, PipelineSummary } from '../../core/types.js';

export const scanCommand = new Command('scan')
  .description('Scan an IP, CIDR, range, list file or country ASN .json and report page titles')
  .argument('<input>', 'IP, CIDR, a.b.c.d-w.x.y.z range, list file or country_asn.json')
  .option('--ports <list>', 'Ports to scan (only 80 and 443 are grabbed)')
  .option('--rate <n>', 'Scanner packet rate')
  .option('--list', 'Treat input as a pre-built scanner list file', false)
  .option('--country <name>', 'Filter country_name when reading a country ASN .json')
  .option('-o, --output <file>', 'Report file')
  .option('-w, --workdir <dir>', 'Directory for intermediate files')
  .option('--masscan <path>', 'masscan binary')
  .option('--zgrab <path>', 'zgrab2 binary')
  .option('--parallel-grab', 'Grab ports 80 and 443 at the same time', false)
  .option('-q, --quiet', 'Suppress output', false)
  .option('-v, --verbose', 'Debug logging', false)
  .action(
    async (
      input: string,
      options: {
        ports?: string;
        rate?: string;
        list: boolean;
        country?: string;
        output?: string;
        workdir?: string;
        masscan?: string;
        zgrab?: string;
        parallelGrab: boolean;
        quiet: boolean;
        verbose: boolean;
      }
    ) => {
      try {
        if (options.rate !== undefined && !isValidRate(options.rate)) {
          throw configurationError(`Invalid rate: ${options.rate}`);
        }
        if (options.ports !== undefined && !isValidPortList(options.ports)) {
          throw configurationError(`Invalid port list: ${options.ports}`);
        }

        const config = loadConfig({
          input,
          ports: options.ports,
          rate: options.rate,
          listMode: options.list,
          country: options.country,
          output: options.output,
          workdir: options.workdir,
          masscanPath: options.masscan,
          zgrabPath: options.zgrab,
          parallelGrab: options.parallelGrab,
          quiet: options.quiet,
          verbose: options.verbose,
        });

        const pipeline = new Pipeline(config);

        if (!config.quiet) {
          printBanner(config, pipeline);
        }

        const summary = await pipeline.run();

        if (!config.quiet) {
          printSummary(summary);
        }

        process.exit(0);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red('Error: ') + message);
        process.exit(1);
      }
    }
  );

function printBanner(config: PipelineConfig, pipeline: Pipeline) {
  console.log(
    chalk.bold('\n   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(config.input) + '\n'
  );

  console.log(chalk.dim('   Configuration'));
  console.log(chalk.gray('   ├─ Ports            : ') + chalk.white.bold(config.ports));
  console.log(chalk.gray('   ├─ Rate             : ') + chalk.white(config.rate));
  if (config.listMode) {
    console.log(chalk.gray('   ├─ List mode        : ') + chalk.green('Enabled'));
  }
  if (config.country) {
    console.log(chalk.gray('   ├─ Country filter   : ') + chalk.magenta.bold(config.country));
  }
  if (config.parallelGrab) {
    console.log(chalk.gray('   ├─ Parallel grab    : ') + chalk.green('Enabled'));
  }
  console.log(chalk.gray('   ├─ Workdir          : ') + chalk.blue(pipeline.paths.workdir));
  console.log(chalk.gray('   └─ Report           : ') + chalk.blue(pipeline.paths.report) + '\n');
}

function printSummary(summary: PipelineSummary) {
  console.log(chalk.green.bold('\n   ✔ Success\n'));

  console.log(chalk.bold('   Results Summary'));
  if (summary.rangesWritten !== undefined) {
    console.log(
      chalk.gray('   ├─ IPv4 ranges          : ') + chalk.cyan.bold(summary.rangesWritten.toString())
    );
  }
  console.log(chalk.gray('   ├─ Open port 80 IPs     : ') + chalk.cyan.bold(summary.open80.toString()));
  console.log(chalk.gray('   ├─ Open port 443 IPs    : ') + chalk.cyan.bold(summary.open443.toString()));
  console.log(
    chalk.gray('   ├─ Report lines         : ') + chalk.green.bold(summary.reportLines.toString())
  );
  if (summary.noBody > 0) {
    console.log(chalk.gray('   ├─ Without body         : ') + chalk.yellow(summary.noBody.toString()));
  }
  console.log(
    chalk.gray('   ├─ Duration             : ') +
      chalk.white(`${(summary.durationMs / 1000).toFixed(2)}s`)
  );
  console.log(chalk.gray('   └─ Report               : ') + chalk.blue.underline(summary.report) + '\n');
}
