/**
 * Username permutations from a file of full names
 */

import { readFile, stat, writeFile } from 'fs/promises';
import { join, parse } from 'path';
import { ioError, type PipelineError } from './errors.js';
import { err, ok, type Result } from './result.js';
import { logger } from '../utils/logger.js';
import type { PermutationSummary } from './types.js';

/**
 * The six candidate usernames for one name, e.g. James Ross →
 * `James`, `Ross`, `James.Ross`, `Ross.James`, `jross`, `j.ross`
 */
export function makePermutations(first: string, last: string): string[] {
  const initial = first.charAt(0).toLowerCase();
  const lowerLast = last.toLowerCase();
  return [
    first,
    last,
    `${first}.${last}`,
    `${last}.${first}`,
    `${initial}${lowerLast}`,
    `${initial}.${lowerLast}`,
  ];
}

/**
 * `users.txt` → `users_permutation.txt`, in the same directory
 */
export function permutationOutputPath(namesPath: string): string {
  const { dir, name, ext } = parse(namesPath);
  return join(dir, `${name}_permutation${ext}`);
}

/**
 * Permutations for every line of `content` with at least a first and last
 * name. Middle names are ignored; duplicates are dropped keeping the first.
 */
export function permuteNames(content: string): string[] {
  const unique = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/).filter(Boolean);
    if (parts.length < 2) {
      continue;
    }
    for (const candidate of makePermutations(parts[0], parts[parts.length - 1])) {
      unique.add(candidate);
    }
  }
  return [...unique];
}

/**
 * Read `namesPath` and write its permutations, one per line, beside it
 */
export async function writePermutations(
  namesPath: string,
  outputPath = permutationOutputPath(namesPath)
): Promise<Result<PermutationSummary, PipelineError>> {
  let content: string;
  try {
    if (!(await stat(namesPath)).isFile()) {
      return err(ioError(`File not found: ${namesPath}`, namesPath));
    }
    content = await readFile(namesPath, 'utf-8');
  } catch (error) {
    return err(ioError(`File not found: ${namesPath}`, namesPath, error));
  }

  const usernames = permuteNames(content);
  try {
    await writeFile(outputPath, `${usernames.join('\n')}\n`, 'utf-8');
  } catch (error) {
    return err(ioError(`Failed to write ${outputPath}`, outputPath, error));
  }

  logger.success(`Wrote ${usernames.length} usernames to ${outputPath}`);
  return ok({ written: usernames.length, output: outputPath });
}
