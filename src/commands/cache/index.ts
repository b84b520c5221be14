/**
 * recognition-cache commands
 *
 * Usage:
 *   recognition-cache stats
 *   recognition-cache lookup photo.jpg
 *   recognition-cache store photo.jpg '{"confidence":0.93,"label":"cat"}'
 *   recognition-cache remove photo.jpg
 *   recognition-cache sweep
 *   recognition-cache optimize
 *   recognition-cache clear
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import { RecognitionCache, RecognitionResultSchema } from '../../cache/recognition-cache.js';
import type { RecognitionResult } from '../../cache/types.js';
import { parseJSON } from '../../utils/json-validator.js';
import { logger } from '../../utils/logger.js';

export type CacheOpener = () => Promise<RecognitionCache<RecognitionResult>>;

/**
 * Open the cache, run the action, always shut it down afterwards
 */
async function withCache(open: CacheOpener, action: (cache: RecognitionCache<RecognitionResult>) => Promise<void>): Promise<void> {
  const cache = await open();
  try {
    await action(cache);
  } finally {
    await cache.shutdown();
  }
}

function fail(message: string): void {
  console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
}

export function createStatsCommand(open: CacheOpener): Command {
  return new Command('stats')
    .description('Show cache statistics')
    .option('--json', 'Print statistics as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withCache(open, async (cache) => {
        console.log(opts.json ? JSON.stringify(cache.statistics(), null, 2) : cache.formatStatistics());
      });
    });
}

export function createLookupCommand(open: CacheOpener): Command {
  return new Command('lookup')
    .description('Look up the cached result for an image')
    .argument('<image>', 'Image file')
    .action(async (image: string) => {
      const content = await fs.readFile(image);
      await withCache(open, async (cache) => {
        const lookup = await cache.get(content);
        if (!lookup) {
          console.log(chalk.yellow('miss'));
          return;
        }

        const origin = lookup.matchKind === 'similar'
          ? `similar to ${lookup.sourceHash} (${((lookup.similarity ?? 0) * 100).toFixed(1)}%)`
          : 'exact';
        console.log(chalk.green(`hit (${origin}, ${lookup.tier})`));
        console.log(JSON.stringify(lookup.value, null, 2));
      });
    });
}

export function createStoreCommand(open: CacheOpener): Command {
  return new Command('store')
    .description('Cache a recognition result for an image')
    .argument('<image>', 'Image file')
    .argument('<result>', 'Result as JSON, with a numeric "confidence"')
    .option('--ttl <ms>', 'Explicit lifetime in milliseconds')
    .action(async (image: string, result: string, opts: { ttl?: string }) => {
      const parsed = parseJSON(result, RecognitionResultSchema, { errorPrefix: 'Invalid result' });
      if (!parsed.success) {
        fail(parsed.error);
        return;
      }

      const ttlMs = opts.ttl !== undefined ? Number(opts.ttl) : undefined;
      if (ttlMs !== undefined && (!Number.isInteger(ttlMs) || ttlMs <= 0)) {
        fail(`--ttl must be a positive integer, got "${opts.ttl}"`);
        return;
      }

      const content = await fs.readFile(image);
      await withCache(open, async (cache) => {
        const hash = await cache.set(content, parsed.data, { ttlMs });
        if (hash === null) {
          fail('Result was not cached (unreadable image or unserializable result)');
          return;
        }
        console.log(hash);
      });
    });
}

export function createRemoveCommand(open: CacheOpener): Command {
  return new Command('remove')
    .description('Remove the cached result for an image')
    .argument('<image>', 'Image file')
    .action(async (image: string) => {
      const content = await fs.readFile(image);
      await withCache(open, async (cache) => {
        const removed = await cache.remove(content);
        console.log(removed ? 'removed' : 'not cached');
      });
    });
}

export function createSweepCommand(open: CacheOpener): Command {
  return new Command('sweep')
    .description('Remove expired entries')
    .action(async () => {
      await withCache(open, async (cache) => {
        const { memory, disk } = await cache.sweepExpired();
        console.log(`Swept ${memory.length} memory and ${disk.length} disk entries`);
      });
    });
}

export function createOptimizeCommand(open: CacheOpener): Command {
  return new Command('optimize')
    .description('Rebuild the similarity index')
    .action(async () => {
      await withCache(open, async (cache) => {
        const result = await cache.optimizeIndex();
        console.log(`Similarity index: ${result.nodes} nodes, ${result.edges} edges`);
      });
    });
}

export function createClearCommand(open: CacheOpener): Command {
  return new Command('clear')
    .description('Remove every cached result')
    .action(async () => {
      await withCache(open, async (cache) => {
        await cache.clear();
        console.log('Cache cleared');
      });
    });
}

/**
 * Root program with every cache command
 */
export function createProgram(open: CacheOpener): Command {
  const program = new Command('recognition-cache')
    .description('Inspect and manage the image-recognition result cache')
    .option('-v, --verbose', 'Log cache internals')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        logger.setLevel('debug');
      }
    });

  program.addCommand(createStatsCommand(open));
  program.addCommand(createLookupCommand(open));
  program.addCommand(createStoreCommand(open));
  program.addCommand(createRemoveCommand(open));
  program.addCommand(createSweepCommand(open));
  program.addCommand(createOptimizeCommand(open));
  program.addCommand(createClearCommand(open));

  return program;
}
