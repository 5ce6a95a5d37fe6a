/**
 * Permute command: candidate usernames from a file of full names
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { writePermutations } from '../../core/permutations.js';

export const permuteCommand = new Command('permute')
  .description('Write <name>_permutation<ext> with six username variants per "First [Middle] Last" line')
  .argument('<namesFile>', 'File with one full name per line')
  .action(async (namesFile: string) => {
    const result = await writePermutations(namesFile);
    if (!result.ok) {
      console.error(chalk.red('Error: ') + result.error.message);
      process.exit(1);
    }
  });
