import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createQualityCommand } from './commands/quality.js';
import { createSummaryCommand } from './commands/summary.js';

const packageJsonSchema = z.object({ version: z.string().optional() });

/**
 * Read version from the nearest package.json above this module
 * (src/cli in development, dist/src/cli once built)
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    dir = dirname(dir);
    try {
      const packageJson = packageJsonSchema.safeParse(JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8')));
      if (packageJson.success && packageJson.data.version) {
        return packageJson.data.version;
      }
    } catch {
      // Not here, keep walking up
    }
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stayscope')
    .description('Wellbeing score summaries for international students by length of stay')
    .version(readVersion());

  program.addCommand(createSummaryCommand());
  program.addCommand(createQualityCommand());

  return program;
}
