/**
 * Shared test helpers
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach } from 'vitest';
import { logger } from '../src/utils/logger.js';

/**
 * Fresh temporary directory per test, removed afterwards. Logging is silenced.
 */
export function useTempDir(): { path: () => string } {
  let dir = '';

  beforeEach(async () => {
    logger.setQuiet(true);
    dir = await mkdtemp(join(tmpdir(), 'titlesweep-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  return { path: () => dir };
}
