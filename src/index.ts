/**
 * titlesweep - target list → port scan → page title report
 * Main entry point for programmatic usage
 */

export { Pipeline, type PipelineTools } from './core/app.js';
export { DEFAULTS, loadConfig, resolvePaths, isValidPortList, isValidRate } from './core/config.js';
export {
  PipelineError,
  configurationError,
  ioError,
  parseError,
  toolError,
  describeError,
  type PipelineErrorKind,
} from './core/errors.js';
export { ok, err, type Result } from './core/result.js';
export { isIPv4 } from './core/ipv4.js';
export { unescapeJsonString } from './core/unescape.js';
export { collectAsnFields, selectRanges, formatRange, extractRanges } from './core/asn.js';
export { resolveTargetSpec, buildTargetList } from './core/targets.js';
export { parseScanLine, splitByPort } from './core/splitter.js';
export {
  NO_TITLE,
  FileReportSink,
  extractJsonStringValue,
  extractTitle,
  extractTitles,
  formatReportLine,
  parseGrabLine,
  toTitleRecord,
  type ReportSink,
} from './core/titles.js';
export {
  makePermutations,
  permuteNames,
  permutationOutputPath,
  writePermutations,
} from './core/permutations.js';
export { ToolRunner } from './tools/runner.js';
export { MasscanRunner, masscanArgs, type Scanner, type ScanOptions } from './tools/masscan.js';
export { ZgrabRunner, zgrabArgs, type Grabber, type GrabOptions } from './tools/zgrab.js';
export { logger, Logger } from './utils/logger.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'titlesweep';
 *
 * const summary = await quickScan('192.0.2.0/24', { rate: '1000' });
 * console.log(summary.reportLines);
 * ```
 */
export async function quickScan(
  input: string,
  options: {
    ports?: string;
    rate?: string;
    output?: string;
    workdir?: string;
    country?: string;
    quiet?: boolean;
  } = {}
) {
  const { Pipeline } = await import('./core/app.js');
  const { loadConfig } = await import('./core/config.js');
  const pipeline = new Pipeline(
    loadConfig({
      input,
      ports: options.ports,
      rate: options.rate,
      output: options.output,
      workdir: options.workdir,
      country: options.country,
      quiet: options.quiet ?? true,
    })
  );

  return await pipeline.run();
}
