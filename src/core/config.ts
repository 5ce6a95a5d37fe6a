// Defaults for the scan pipeline. Environment variables override the
// defaults and CLI flags override both.

import { isAbsolute, join, resolve } from 'path';
import type { PipelineConfig, PipelinePaths } from './types.js';

function envOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function envString(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  return envOptional(env, name) ?? fallback;
}

export const DEFAULTS = {
  PORTS: '80,443',
  RATE: '10000',
  OUTPUT: 'opendomains',

  FILES: {
    LIST: 'list',
    SCAN_OUTPUT: 'masscan_results.txt',
    OPEN_80: 'open_ips80.txt',
    OPEN_443: 'open_ips443.txt',
    GRAB_80: 'zgrab_results_80.json',
    GRAB_443: 'zgrab_results_443.json',
    BIN_DIR: 'bin',
  },
} as const;

/**
 * Build a full config from partial overrides
 */
export function loadConfig(
  overrides: Partial<PipelineConfig> & { input: string },
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  return {
    input: overrides.input,
    ports: overrides.ports ?? envString(env, 'TITLESWEEP_PORTS', DEFAULTS.PORTS),
    rate: overrides.rate ?? envString(env, 'TITLESWEEP_RATE', DEFAULTS.RATE),
    listMode: overrides.listMode ?? false,
    country: overrides.country || undefined,
    output: overrides.output ?? DEFAULTS.OUTPUT,
    workdir: overrides.workdir ?? envString(env, 'TITLESWEEP_WORKDIR', process.cwd()),
    masscanPath: overrides.masscanPath ?? envOptional(env, 'TITLESWEEP_MASSCAN'),
    zgrabPath: overrides.zgrabPath ?? envOptional(env, 'TITLESWEEP_ZGRAB'),
    parallelGrab: overrides.parallelGrab ?? false,
    quiet: overrides.quiet ?? false,
    verbose: overrides.verbose ?? false,
  };
}

/**
 * Resolve every intermediate file once. The report path is relative to the
 * current directory, everything else lives in the workdir.
 */
export function resolvePaths(workdir: string, output: string): PipelinePaths {
  const root = resolve(workdir);
  return {
    workdir: root,
    binDir: join(root, DEFAULTS.FILES.BIN_DIR),
    list: join(root, DEFAULTS.FILES.LIST),
    scanOutput: join(root, DEFAULTS.FILES.SCAN_OUTPUT),
    open80: join(root, DEFAULTS.FILES.OPEN_80),
    open443: join(root, DEFAULTS.FILES.OPEN_443),
    grab80: join(root, DEFAULTS.FILES.GRAB_80),
    grab443: join(root, DEFAULTS.FILES.GRAB_443),
    report: isAbsolute(output) ? output : resolve(output),
  };
}

/**
 * Scanner port list such as `80,443` or `1-1024,8080`
 */
export function isValidPortList(ports: string): boolean {
  return ports.split(',').every((part) => {
    const match = /^(\d{1,5})(?:-(\d{1,5}))?$/.exec(part);
    if (!match) {
      return false;
    }
    const low = Number(match[1]);
    const high = match[2] === undefined ? low : Number(match[2]);
    return low >= 1 && high <= 65535 && low <= high;
  });
}

export function isValidRate(rate: string): boolean {
  return /^[1-9][0-9]*$/.test(rate);
}
