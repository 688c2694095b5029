#!/usr/bin/env node
import { createProgram } from './cli';
import { runFromFiles } from './run';
import { createLogger } from './utils/logger';

const logger = createLogger('cli');

createProgram(runFromFiles)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
