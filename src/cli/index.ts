#!/usr/bin/env node
/**
 * recognition-cache CLI entry point
 */

import { createRecognitionCache } from '../cache/recognition-cache.js';
import { createProgram } from '../commands/cache/index.js';
import { getErrorMessage } from '../errors/index.js';
import { logger } from '../utils/logger.js';

const program = createProgram(async () => {
  const cache = createRecognitionCache();
  await cache.initialize();
  return cache;
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', { reason: getErrorMessage(error) });
  process.exitCode = 1;
});
