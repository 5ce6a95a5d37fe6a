/**
 * Shared wrapper for the external scanner and grabber binaries
 */

import { spawn } from 'child_process';
import { access, constants } from 'fs/promises';
import { join } from 'path';
import { logger } from '../utils/logger.js';

/**
 * Spawns one external tool and reports its exit code
 */
export class ToolRunner {
  private binaryPath?: string;

  constructor(
    readonly name: string,
    private readonly options: { explicitPath?: string; binDir?: string } = {}
  ) {}

  /**
   * Binary to spawn: the explicit path, then `<binDir>/<name>`, then the bare
   * name for a PATH lookup
   */
  async resolveBinary(): Promise<string> {
    if (this.binaryPath) {
      return this.binaryPath;
    }

    if (this.options.explicitPath) {
      this.binaryPath = this.options.explicitPath;
    } else if (this.options.binDir && (await isExecutable(join(this.options.binDir, this.name)))) {
      this.binaryPath = join(this.options.binDir, this.name);
    } else {
      this.binaryPath = this.name;
    }
    return this.binaryPath;
  }

  /**
   * Check the binary can be started at all
   */
  async isAvailable(): Promise<boolean> {
    const binary = await this.resolveBinary();
    return new Promise((resolve) => {
      const proc = spawn(binary, ['--help'], {
        stdio: 'ignore',
      });

      proc.on('close', () => {
        resolve(true);
      });

      proc.on('error', () => {
        resolve(false);
      });
    });
  }

  /**
   * Run the tool to completion, streaming its stderr to the debug log.
   * Resolves to the exit code; rejects if the process cannot be spawned.
   */
  async run(args: string[]): Promise<number> {
    const binary = await this.resolveBinary();
    logger.command(binary, args);

    const proc = spawn(binary, args, {
      stdio: ['ignore', 'inherit', 'pipe'],
    });

    proc.stderr.on('data', (data: Buffer) => {
      for (const line of data.toString().split('\n')) {
        if (line.trim()) {
          logger.debug(`${this.name}: ${line.trim()}`);
        }
      }
    });

    return await new Promise<number>((resolve, reject) => {
      proc.on('close', (code) => {
        resolve(code ?? 1);
      });

      proc.on('error', (error) => {
        reject(error);
      });
    });
  }
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
