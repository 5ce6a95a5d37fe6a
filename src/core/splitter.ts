/**
 * Scanner output → per-port IP files
 */

import { open, type FileHandle } from 'fs/promises';
import { ioError, type PipelineError } from './errors.js';
import { err, ok, type Result } from './result.js';
import { logger } from '../utils/logger.js';
import type { ScanHit, SplitSummary } from './types.js';

/**
 * Parse one `-oL` line. Only `open tcp <port> <ip> ...` qualifies; trailing
 * tokens are ignored.
 */
export function parseScanLine(line: string): ScanHit | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length < 4 || tokens[0] !== 'open' || tokens[1] !== 'tcp') {
    return null;
  }
  return { protocol: tokens[1], port: tokens[2], ip: tokens[3] };
}

async function openForWrite(path: string): Promise<Result<FileHandle, PipelineError>> {
  try {
    return ok(await open(path, 'w'));
  } catch (error) {
    return err(ioError('Failed to open output IP files', path, error));
  }
}

/**
 * Route open port 80 hits to `out80Path` and port 443 hits to
 * `out443Path`, one IP per line. Both destinations are truncated.
 */
export async function splitByPort(
  scanOutputPath: string,
  out80Path: string,
  out443Path: string
): Promise<Result<SplitSummary, PipelineError>> {
  let input: FileHandle;
  try {
    input = await open(scanOutputPath, 'r');
  } catch (error) {
    return err(ioError(`Failed to read ${scanOutputPath}`, scanOutputPath, error));
  }

  const handles: FileHandle[] = [input];
  try {
    const out80 = await openForWrite(out80Path);
    if (!out80.ok) {
      return out80;
    }
    handles.push(out80.value);

    const out443 = await openForWrite(out443Path);
    if (!out443.ok) {
      return out443;
    }
    handles.push(out443.value);

    const summary: SplitSummary = { open80: 0, open443: 0, skipped: 0 };

    for await (const line of input.readLines()) {
      const hit = parseScanLine(line);
      if (!hit) {
        continue;
      }
      if (hit.port === '80') {
        await out80.value.write(`${hit.ip}\n`);
        summary.open80++;
      } else if (hit.port === '443') {
        await out443.value.write(`${hit.ip}\n`);
        summary.open443++;
      } else {
        summary.skipped++;
      }
    }

    logger.info(`Open port 80 IPs: ${summary.open80}`);
    logger.info(`Open port 443 IPs: ${summary.open443}`);
    if (summary.skipped > 0) {
      logger.debug(`Ignored ${summary.skipped} open ports other than 80/443`);
    }

    return ok(summary);
  } catch (error) {
    return err(ioError('Failed to split scanner output', scanOutputPath, error));
  } finally {
    await Promise.all(handles.map((handle) => handle.close()));
  }
}
