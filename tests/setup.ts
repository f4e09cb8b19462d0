/**
 * Point STAYSCOPE_HOME at a throwaway directory so tests never read
 * the user's config or append to their debug logs
 */

import { afterAll } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { logger } from '../src/utils/logger.js';

const testHome = mkdtempSync(join(tmpdir(), 'stayscope-test-'));
process.env.STAYSCOPE_HOME = testHome;
delete process.env.STAYSCOPE_DEBUG;
delete process.env.STAYSCOPE_FILTER;
delete process.env.STAYSCOPE_LIMIT;
delete process.env.STAYSCOPE_DECIMALS;

afterAll(() => {
  logger.close();
  rmSync(testHome, { recursive: true, force: true });
});
