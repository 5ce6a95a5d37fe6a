/**
 * List command: build the scanner target list only
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULTS, resolvePaths } from '../../core/config.js';
import { buildTargetList, resolveTargetSpec } from '../../core/targets.js';

export const listCommand = new Command('list')
  .description('Write the scanner target list without scanning')
  .argument('<input>', 'IP, CIDR, range, list file or country_asn.json')
  .option('--list', 'Treat input as a pre-built scanner list file', false)
  .option('--country <name>', 'Filter country_name when reading a country ASN .json')
  .option('-w, --workdir <dir>', 'Directory for the list file', process.cwd())
  .action(
    async (input: string, options: { list: boolean; country?: string; workdir: string }) => {
      const paths = resolvePaths(options.workdir, DEFAULTS.OUTPUT);

      const spec = await resolveTargetSpec(input, { listMode: options.list, country: options.country });
      if (!spec.ok) {
        console.error(chalk.red('Error: ') + spec.error.message);
        process.exit(1);
      }

      const built = await buildTargetList(spec.value, paths.list);
      if (!built.ok) {
        console.error(chalk.red('Error: ') + built.error.message);
        process.exit(1);
      }

      const ranges =
        built.value.rangesWritten !== undefined ? ` (${built.value.rangesWritten} ranges)` : '';
      console.log(chalk.green('✔ ') + `Target list written to ${chalk.blue(built.value.list)}${ranges}`);
    }
  );
