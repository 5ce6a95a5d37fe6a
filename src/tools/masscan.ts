/**
 * Port scanner integration
 */

import { ToolRunner } from './runner.js';

export interface ScanOptions {
  ports: string;
  rate: string;
  list: string;
  output: string;
}

/**
 * Anything that can turn a target list into `-oL` scanner output
 */
export interface Scanner {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  scan(options: ScanOptions): Promise<number>;
}

export function masscanArgs(options: ScanOptions): string[] {
  return [
    `-p${options.ports}`,
    '-iL',
    options.list,
    `--rate=${options.rate}`,
    '--exclude',
    '255.255.255.255',
    '--wait',
    '0',
    '-oL',
    options.output,
  ];
}

export class MasscanRunner extends ToolRunner implements Scanner {
  constructor(options: { explicitPath?: string; binDir?: string } = {}) {
    super('masscan', options);
  }

  async scan(options: ScanOptions): Promise<number> {
    return this.run(masscanArgs(options));
  }
}
