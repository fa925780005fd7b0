#!/usr/bin/env tsx

/**
 * spindle-thumbnail
 * Usage: spindle-thumbnail [--manifest <path>] <list|which|render> [file]
 */

import chalk from 'chalk';
import { createLogger, ErrorFactory } from '@spindle/sdk';
import { createProgram } from './cli/program';
import { loadEnv } from './env';

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({
    name: 'spindle-thumbnail',
    level: env.SPINDLE_LOG_LEVEL,
    destination: process.stderr
  });

  await createProgram(env, logger).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${ErrorFactory.describe(error)}`));
  process.exitCode = 1;
});
