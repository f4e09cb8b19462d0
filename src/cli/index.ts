#!/usr/bin/env node

import { createProgram } from './cli.js';
import { logger } from '../utils/logger.js';

const program = createProgram();

if (process.argv.length === 2) {
  program.help();
}

program
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error);
    process.exitCode = 1;
  })
  .finally(() => {
    logger.close();
  });
