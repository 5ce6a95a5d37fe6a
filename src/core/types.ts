// src/core/types.ts
/**
 * Type definitions for titlesweep
 */

/**
 * Pipeline configuration, assembled from defaults, environment and CLI flags
 */
export interface PipelineConfig {
  input: string;
  ports: string;
  rate: string;
  listMode: boolean;
  country?: string;
  output: string;
  workdir: string;
  masscanPath?: string;
  zgrabPath?: string;
  parallelGrab: boolean;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Every file the pipeline reads or writes, resolved once up front
 */
export interface PipelinePaths {
  workdir: string;
  binDir: string;
  list: string;
  scanOutput: string;
  open80: string;
  open443: string;
  grab80: string;
  grab443: string;
  report: string;
}

/**
 * What the input argument turned out to be
 */
export type TargetSpec =
  | { kind: 'single'; host: string }
  | { kind: 'list'; path: string }
  | { kind: 'asn'; path: string; country?: string };

export type TargetKind = TargetSpec['kind'];

/**
 * IPv4 range taken from an ASN table. No ordering between the ends is enforced.
 */
export interface IpRange {
  startIp: string;
  endIp: string;
}

/**
 * One `open tcp <port> <ip>` line of scanner output
 */
export interface ScanHit {
  protocol: string;
  port: string;
  ip: string;
}

/**
 * One JSON-lines record of grabber output
 */
export interface GrabRecord {
  ip: string;
  body?: string;
}

/**
 * Final report unit
 */
export interface TitleRecord {
  ip: string;
  title: string;
}

/**
 * Outcome of building the target list
 */
export interface TargetListSummary {
  kind: TargetKind;
  list: string;
  rangesWritten?: number;
}

/**
 * Outcome of splitting scanner output by port
 */
export interface SplitSummary {
  open80: number;
  open443: number;
  skipped: number;
}

/**
 * Outcome of one title extraction pass
 */
export interface TitleSummary {
  lines: number;
  noBody: number;
  skipped: number;
}

/**
 * Result of writing a username permutation file
 */
export interface PermutationSummary {
  written: number;
  output: string;
}

/**
 * End-of-run counts
 */
export interface PipelineSummary {
  targetKind: TargetKind;
  rangesWritten?: number;
  open80: number;
  open443: number;
  reportLines: number;
  noBody: number;
  report: string;
  durationMs: number;
}

/**
 * Ports the grab and report phases support, in report order
 */
export type WebPort = '80' | '443';

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
