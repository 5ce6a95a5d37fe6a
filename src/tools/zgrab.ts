/**
 * Web grabber integration
 */

import { ToolRunner } from './runner.js';

export interface GrabOptions {
  port: string;
  input: string;
  output: string;
}

/**
 * Anything that can fetch a page per IP and write JSON lines
 */
export interface Grabber {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  grab(options: GrabOptions): Promise<number>;
}

export function zgrabArgs(options: GrabOptions): string[] {
  return [
    'http',
    '--port',
    options.port,
    '--input-file',
    options.input,
    '--max-redirects',
    '0',
    '--output-file',
    options.output,
  ];
}

export class ZgrabRunner extends ToolRunner implements Grabber {
  constructor(options: { explicitPath?: string; binDir?: string } = {}) {
    super('zgrab2', options);
  }

  async grab(options: GrabOptions): Promise<number> {
    return this.run(zgrabArgs(options));
  }
}
