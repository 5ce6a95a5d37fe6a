/**
 * Target list builder
 *
 * Turns the input argument into the newline-delimited list file the port
 * scanner reads with `-iL`.
 */

import { copyFile, realpath, stat, writeFile } from 'fs/promises';
import { extname } from 'path';
import { extractRanges } from './asn.js';
import { configurationError, ioError, type PipelineError } from './errors.js';
import { err, ok, type Result } from './result.js';
import type { TargetListSummary, TargetSpec } from './types.js';

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Decide what kind of target the input is.
 *
 * A `.json` path is an ASN table. With `listMode` an existing file is a
 * pre-built list. Anything else is a single host, CIDR or range string.
 * A country filter paired with anything but an ASN table is rejected here,
 * before any file is touched.
 */
export async function resolveTargetSpec(
  input: string,
  options: { listMode?: boolean; country?: string } = {}
): Promise<Result<TargetSpec, PipelineError>> {
  const { listMode = false, country } = options;

  if (extname(input).toLowerCase() === '.json') {
    return ok({ kind: 'asn', path: input, country: country || undefined });
  }

  if (country) {
    return err(configurationError('--country requires a country ASN .json input.'));
  }

  if (listMode) {
    if (!(await isFile(input))) {
      return err(ioError(`List file not found: ${input}`, input));
    }
    return ok({ kind: 'list', path: input });
  }

  return ok({ kind: 'single', host: input });
}

async function samePath(a: string, b: string): Promise<boolean> {
  try {
    const [left, right] = await Promise.all([realpath(a), realpath(b)]);
    return left === right;
  } catch {
    return false;
  }
}

/**
 * Write the canonical list file for `spec` at `listPath`
 */
export async function buildTargetList(
  spec: TargetSpec,
  listPath: string
): Promise<Result<TargetListSummary, PipelineError>> {
  switch (spec.kind) {
    case 'single':
      try {
        await writeFile(listPath, `${spec.host}\n`, 'utf-8');
      } catch (error) {
        return err(ioError(`Failed to write ${listPath}`, listPath, error));
      }
      return ok({ kind: spec.kind, list: listPath });

    case 'list':
      if (await samePath(spec.path, listPath)) {
        return ok({ kind: spec.kind, list: listPath });
      }
      try {
        await copyFile(spec.path, listPath);
      } catch (error) {
        return err(ioError(`Failed to copy ${spec.path} to ${listPath}`, spec.path, error));
      }
      return ok({ kind: spec.kind, list: listPath });

    case 'asn': {
      const extraction = await extractRanges(spec.path, listPath, spec.country);
      if (!extraction.ok) {
        return extraction;
      }
      return ok({ kind: spec.kind, list: listPath, rangesWritten: extraction.value.rangesWritten });
    }
  }
}
