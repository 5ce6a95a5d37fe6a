/**
 * ASN table → IPv4 range list
 *
 * The table is read as text and the `start_ip`, `end_ip` and `country_name`
 * fields are collected by pattern, in document order, into three parallel
 * sequences. Record i is (starts[i], ends[i], countries[i]); nothing checks
 * that the fields really came from the same object.
 */

import { readFile, writeFile } from 'fs/promises';
import { ioError, parseError, PipelineError } from './errors.js';
import { isIPv4 } from './ipv4.js';
import { err, ok, type Result } from './result.js';
import { logger } from '../utils/logger.js';
import type { IpRange } from './types.js';

const START_IP = /"start_ip"\s*:\s*"([^"]+)"/g;
const END_IP = /"end_ip"\s*:\s*"([^"]+)"/g;
const COUNTRY_NAME = /"country_name"\s*:\s*"([^"]+)"/g;

export interface AsnFields {
  starts: string[];
  ends: string[];
  countries: string[];
}

function collect(content: string, pattern: RegExp): string[] {
  return Array.from(content.matchAll(pattern), (match) => match[1]);
}

/**
 * Pull the three field sequences out of the document text
 */
export function collectAsnFields(content: string): AsnFields {
  return {
    starts: collect(content, START_IP),
    ends: collect(content, END_IP),
    countries: collect(content, COUNTRY_NAME),
  };
}

/**
 * Pair up the sequences and apply the country filter and IPv4 check.
 * Returns null when the start/end sequences are empty or of different length.
 */
export function selectRanges(fields: AsnFields, countryFilter?: string): IpRange[] | null {
  const { starts, ends, countries } = fields;
  if (starts.length === 0 || starts.length !== ends.length) {
    return null;
  }

  const wanted = countryFilter ? countryFilter.toLowerCase() : undefined;
  const ranges: IpRange[] = [];

  for (let i = 0; i < starts.length; i++) {
    if (wanted !== undefined) {
      if (i >= countries.length || countries[i].toLowerCase() !== wanted) {
        continue;
      }
    }
    // IPv6 ranges are not scanned
    if (!isIPv4(starts[i]) || !isIPv4(ends[i])) {
      continue;
    }
    ranges.push({ startIp: starts[i], endIp: ends[i] });
  }

  return ranges;
}

export function formatRange(range: IpRange): string {
  return `${range.startIp}-${range.endIp}`;
}

/**
 * Write `start-end` lines for every matching IPv4 range of the table at
 * `jsonPath` into `listPath`, truncating it. Fails when nothing matched.
 */
export async function extractRanges(
  jsonPath: string,
  listPath: string,
  countryFilter?: string
): Promise<Result<{ rangesWritten: number }, PipelineError>> {
  let content: string;
  try {
    content = await readFile(jsonPath, 'utf-8');
  } catch (error) {
    return err(ioError(`Failed to open ${jsonPath}`, jsonPath, error));
  }

  const ranges = selectRanges(collectAsnFields(content), countryFilter);
  if (ranges === null) {
    return err(parseError(`Could not parse start/end IPs from ${jsonPath}`, jsonPath));
  }

  try {
    await writeFile(listPath, ranges.map((range) => `${formatRange(range)}\n`).join(''), 'utf-8');
  } catch (error) {
    return err(ioError(`Failed to write ${listPath}`, listPath, error));
  }

  logger.info(`Wrote ${ranges.length} IPv4 ranges to ${listPath}`);

  if (ranges.length === 0) {
    const filter = countryFilter ? ` for country "${countryFilter}"` : '';
    return err(
      new PipelineError('empty', `No IPv4 ranges found in ${jsonPath}${filter}`, { path: jsonPath })
    );
  }

  return ok({ rangesWritten: ranges.length });
}
