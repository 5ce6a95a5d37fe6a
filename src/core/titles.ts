/**
 * Grabber JSON-lines output → report lines
 *
 * Fields are found by pattern rather than by a structural parse, so lines
 * that are not valid JSON still yield whatever `ip` and `body` they carry.
 * The first occurrence of each key on the line wins.
 */

import { open, type FileHandle } from 'fs/promises';
import { ioError, type PipelineError } from './errors.js';
import { err, ok, type Result } from './result.js';
import { unescapeJsonString } from './unescape.js';
import { logger } from '../utils/logger.js';
import type { GrabRecord, TitleRecord, TitleSummary } from './types.js';

export const NO_TITLE = 'No title found';

/**
 * Destination for report lines. One writer owns it for the whole run.
 */
export interface ReportSink {
  writeLine(line: string): Promise<void>;
}

/**
 * Report file opened once (truncating) and appended to by every pass
 */
export class FileReportSink implements ReportSink {
  private constructor(
    private readonly handle: FileHandle,
    readonly path: string
  ) {}

  static async open(path: string): Promise<Result<FileReportSink, PipelineError>> {
    try {
      return ok(new FileReportSink(await open(path, 'w'), path));
    } catch (error) {
      return err(ioError(`Failed to open output file: ${path}`, path, error));
    }
  }

  async writeLine(line: string): Promise<void> {
    await this.handle.write(`${line}\n`);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value of the first `"key": "..."` string field on the line, unescaped
 */
export function extractJsonStringValue(line: string, key: string): string | undefined {
  const pattern = new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*"((?:[^\\\\"]|\\\\.)*)"`);
  const match = pattern.exec(line);
  return match ? unescapeJsonString(match[1]) : undefined;
}

/**
 * Record for a grabber line, or null when it has no `ip` (status and
 * metadata lines)
 */
export function parseGrabLine(line: string): GrabRecord | null {
  const ip = extractJsonStringValue(line, 'ip');
  if (ip === undefined) {
    return null;
  }
  const body = extractJsonStringValue(line, 'body');
  return body === undefined ? { ip } : { ip, body };
}

// Lowercases A-Z only so offsets stay aligned with the original text.
function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

// Unicode spaces such as NBSP are part of the title.
function trimAscii(value: string): string {
  return value.replace(/^[ \t\n\v\f\r]+|[ \t\n\v\f\r]+$/g, '');
}

/**
 * Trimmed text between the first `<title ...>` and the next `</title>`,
 * matching tags case-insensitively
 */
export function extractTitle(html: string): string {
  const lower = asciiLower(html);

  const start = lower.indexOf('<title');
  if (start === -1) {
    return NO_TITLE;
  }
  const gt = lower.indexOf('>', start);
  if (gt === -1) {
    return NO_TITLE;
  }
  const close = lower.indexOf('</title>', gt);
  if (close === -1 || close <= gt) {
    return NO_TITLE;
  }

  const title = trimAscii(html.slice(gt + 1, close));
  return title === '' ? NO_TITLE : title;
}

export function toTitleRecord(record: GrabRecord): TitleRecord | null {
  if (record.body === undefined) {
    return null;
  }
  return { ip: record.ip, title: extractTitle(record.body) };
}

/**
 * Report line for one grab record
 */
export function formatReportLine(record: GrabRecord): string {
  const titled = toTitleRecord(record);
  if (!titled) {
    return `IP: ${record.ip} - No response body found`;
  }
  return `IP: ${titled.ip} - Title: ${titled.title}`;
}

/**
 * Append one report line per grab record in `grabOutputPath` to `sink`,
 * in file order
 */
export async function extractTitles(
  grabOutputPath: string,
  sink: ReportSink
): Promise<Result<TitleSummary, PipelineError>> {
  let input: FileHandle;
  try {
    input = await open(grabOutputPath, 'r');
  } catch (error) {
    return err(ioError(`Failed to read ${grabOutputPath}`, grabOutputPath, error));
  }

  const summary: TitleSummary = { lines: 0, noBody: 0, skipped: 0 };

  try {
    for await (const line of input.readLines()) {
      const record = parseGrabLine(line);
      if (!record) {
        summary.skipped++;
        continue;
      }
      if (record.body === undefined) {
        summary.noBody++;
      }
      await sink.writeLine(formatReportLine(record));
      summary.lines++;
    }
  } catch (error) {
    return err(ioError(`Failed to extract titles from ${grabOutputPath}`, grabOutputPath, error));
  } finally {
    await input.close();
  }

  logger.info(`Wrote ${summary.lines} report lines from ${grabOutputPath}`);
  return ok(summary);
}
