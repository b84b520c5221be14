/**
 * Recognition Cache Tests
 *
 * Exercises the full lookup path (memory, disk, near-duplicates) against a
 * real temporary directory and images generated in-process.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as path from 'path';
import * as fs from 'fs-extra';
import { z } from 'zod';
import {
  RecognitionCache,
  RecognitionResultSchema,
  createRecognitionCache,
} from '../../src/cache/recognition-cache.js';
import type { RecognitionCacheConfig } from '../../src/cache/cache-config.js';
import { DiskTier } from '../../src/cache/disk-tier.js';
import type { RecognitionResult } from '../../src/cache/types.js';
import { BLUE, NEAR_RED, RED, makeTempDir, solidImage } from '../test-utils.js';

describe('RecognitionCache', () => {
  let dir: string;
  let cache: RecognitionCache<RecognitionResult>;
  let red: Buffer;
  let nearRed: Buffer;
  let blue: Buffer;

  function open(overrides: Partial<RecognitionCacheConfig> = {}): RecognitionCache<RecognitionResult> {
    return createRecognitionCache({
      cacheDir: dir,
      indexSaveDebounceMs: 10,
      canonicalSize: 64,
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = makeTempDir('recognition-cache');
    cache = open();
    await cache.initialize();
    [red, nearRed, blue] = await Promise.all([solidImage(RED), solidImage(NEAR_RED), solidImage(BLUE)]);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cache.shutdown();
    await fs.remove(dir);
  });

  describe('exact hits', () => {
    it('should return a stored result from memory', async () => {
      const hash = await cache.set(red, { confidence: 0.9, label: 'red square' });

      const lookup = await cache.get(red);

      expect(lookup).toEqual({
        value: { confidence: 0.9, label: 'red square' },
        matchKind: 'exact',
        contentHash: hash,
        tier: 'memory',
      });
    });

    it('should miss for content never stored', async () => {
      expect(await cache.get(red)).toBeNull();
      expect(cache.statistics().misses).toBe(1);
    });

    it('should never cache undecodable content', async () => {
      const garbage = Buffer.from('not an image');

      expect(await cache.set(garbage, { confidence: 1 })).toBeNull();
      expect(await cache.get(garbage)).toBeNull();
      expect(cache.statistics().totalEntries).toBe(0);
    });

    it('should skip results that cannot be serialized', async () => {
      expect(await cache.set(red, { confidence: 0.9, size: BigInt(1) })).toBeNull();
      expect(await cache.get(red)).toBeNull();
    });
  });

  describe('overwrites', () => {
    it('should serve the newer value when it is too large for memory', async () => {
      await cache.shutdown();
      cache = open({ memoryBudgetBytes: 300 });
      const large = { confidence: 0.5, label: 'x'.repeat(600) };

      await cache.set(red, { confidence: 0.9, label: 'old' });
      await cache.set(red, large);
      const lookup = await cache.get(red);

      expect(lookup?.value).toEqual(large);
      expect(lookup?.tier).toBe('disk');
      expect(cache.statistics().memory.entries).toBe(0);
    });

    it('should keep a result stored for a source while a near-duplicate lookup reads it', async () => {
      await cache.shutdown();
      cache = new RecognitionCache<RecognitionResult>({
        schema: RecognitionResultSchema.refine((value) => value.label !== 'unreadable'),
        config: { cacheDir: dir, canonicalSize: 64, indexSaveDebounceMs: 10 },
      });
      await cache.set(red, { confidence: 0.9, label: 'unreadable' });
      await cache.hasher.hashContent(nearRed);

      await Promise.all([cache.get(nearRed), cache.set(red, { confidence: 0.8, label: 'fresh' })]);

      expect((await cache.get(red))?.value).toEqual({ confidence: 0.8, label: 'fresh' });
      await cache.shutdown();
      cache = open();
      expect(await cache.get(red)).toEqual(
        expect.objectContaining({ value: { confidence: 0.8, label: 'fresh' }, tier: 'disk' })
      );
    });
  });

  describe('batches', () => {
    it('should store a batch in memory and write it to disk in the background', async () => {
      const hashes = await cache.setMany([
        { content: red, value: { confidence: 0.9, label: 'red' } },
        { content: Buffer.from('junk'), value: { confidence: 1 } },
        { content: blue, value: { confidence: 0.8, label: 'blue' }, ttlMs: 60_000 },
      ]);

      expect(hashes[0]).toMatch(/^[0-9a-f]{64}$/);
      expect(hashes[1]).toBeNull();
      const lookup = await cache.get(blue);
      expect(lookup?.contentHash).toBe(hashes[2]);
      expect(lookup?.value).toEqual({ confidence: 0.8, label: 'blue' });
      expect(lookup?.tier).toBe('memory');

      await cache.flush();
      expect(cache.statistics().disk.entries).toBe(2);
    });

    it('should preload disk entries through one batch read', async () => {
      await cache.setMany([
        { content: red, value: { confidence: 0.9 } },
        { content: blue, value: { confidence: 0.8 } },
      ]);
      await cache.shutdown();

      cache = open();
      const batchGet = jest.spyOn(DiskTier.prototype, 'batchGet');
      const promoted = await cache.preload([red, blue, red]);

      expect(promoted).toBe(2);
      expect(batchGet).toHaveBeenCalledTimes(1);
      expect(batchGet.mock.calls[0][0]).toHaveLength(2);
      expect(cache.statistics().memory.entries).toBe(2);
    });
  });

  describe('similar hits', () => {
    it('should serve a near-duplicate with confidence scaled by similarity', async () => {
      const sourceHash = await cache.set(red, { confidence: 0.9, label: 'red' });

      const lookup = await cache.get(nearRed);

      expect(lookup?.matchKind).toBe('similar');
      expect(lookup?.sourceHash).toBe(sourceHash);
      expect(lookup?.similarity).toBeCloseTo(61 / 63, 10);
      expect(lookup?.value.confidence).toBeCloseTo(0.9 * (61 / 63), 10);
      expect(lookup?.value.matchedFrom).toBe(sourceHash);
      expect(lookup?.value.label).toBe('red');
    });

    it('should cache the near-duplicate under its own hash', async () => {
      await cache.set(red, { confidence: 0.9 });
      const first = await cache.get(nearRed);

      const second = await cache.get(nearRed);

      expect(second?.matchKind).toBe('exact');
      expect(second?.contentHash).toBe(first?.contentHash);
      expect(second?.value.confidence).toBeCloseTo(0.9 * (61 / 63), 10);
      expect(cache.statistics().similarityIndex).toEqual({ nodes: 2, edges: 1 });
    });

    it('should not match perceptually distant content', async () => {
      await cache.set(red, { confidence: 0.9 });
      expect(await cache.get(blue)).toBeNull();
    });

    it('should list similar results by descending confidence', async () => {
      await cache.set(red, { confidence: 0.6 });
      await cache.set(nearRed, { confidence: 0.9 });
      await cache.set(blue, { confidence: 0.99 });

      const results = await cache.findSimilarResults(red);

      expect(results.map((r) => r.matchKind)).toEqual(['similar', 'exact']);
      expect(results[0].value.confidence).toBeCloseTo(0.9 * (61 / 63), 10);
      expect(results[1].value.confidence).toBe(0.6);
      expect(await cache.findSimilarResults(red, { limit: 1 })).toHaveLength(1);
    });
  });

  describe('removal', () => {
    it('should be idempotent', async () => {
      await cache.set(red, { confidence: 0.9 });

      expect(await cache.remove(red)).toBe(true);
      expect(await cache.remove(red)).toBe(false);
      expect(await cache.get(red)).toBeNull();
    });

    it('should unlink a removed hash from its neighbours', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.set(nearRed, { confidence: 0.8 });
      expect(cache.statistics().similarityIndex).toEqual({ nodes: 2, edges: 1 });

      await cache.remove(nearRed);

      expect(cache.statistics().similarityIndex).toEqual({ nodes: 1, edges: 0 });
      const results = await cache.findSimilarResults(red);
      expect(results.map((r) => r.matchKind)).toEqual(['exact']);
    });

    it('should not let a late disk write resurrect a removed key', async () => {
      const hash = await cache.set(red, { confidence: 0.9 });
      await cache.remove(red);
      await cache.flush();

      expect(await fs.pathExists(path.join(dir, `${hash}.cache`))).toBe(false);
    });

    it('should clear every tier', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.set(blue, { confidence: 0.9 });

      await cache.clear();

      expect(cache.statistics().totalEntries).toBe(0);
      expect(await cache.get(red)).toBeNull();
    });
  });

  describe('expiry', () => {
    it('should miss after the lifetime and forget the key everywhere', async () => {
      let now = Date.now();
      jest.spyOn(Date, 'now').mockImplementation(() => now);

      await cache.set(red, { confidence: 0.9 }, { ttlMs: 1000 });
      await cache.flush();
      now += 1500;

      expect(await cache.get(red)).toBeNull();

      const stats = cache.statistics();
      expect(stats.memory.entries).toBe(0);
      expect(stats.disk.entries).toBe(0);
      expect(stats.similarityIndex.nodes).toBe(0);
    });

    it('should sweep expired entries from both tiers', async () => {
      let now = Date.now();
      jest.spyOn(Date, 'now').mockImplementation(() => now);

      const hash = await cache.set(red, { confidence: 0.9 }, { ttlMs: 1000 });
      await cache.set(blue, { confidence: 0.9 }, { ttlMs: 100_000 });
      await cache.flush();
      now += 5000;

      const swept = await cache.sweepExpired();

      expect(swept).toEqual({ memory: [hash], disk: [hash] });
      expect(cache.statistics().totalEntries).toBe(1);
      expect(cache.statistics().similarityIndex.nodes).toBe(1);
    });
  });

  describe('persistence', () => {
    it('should promote disk entries into memory in a new instance', async () => {
      const hash = await cache.set(red, { confidence: 0.9, label: 'red' });
      await cache.shutdown();

      cache = open();
      const first = await cache.get(red);
      const second = await cache.get(red);

      expect(first).toEqual({
        value: { confidence: 0.9, label: 'red' },
        matchKind: 'exact',
        contentHash: hash,
        tier: 'disk',
      });
      expect(second?.tier).toBe('memory');
      expect(cache.statistics().promotions).toBe(1);
      expect(cache.statistics().similarityIndex.nodes).toBe(1);
    });

    it('should find near-duplicates of entries that were only on disk', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.shutdown();

      cache = open();
      await cache.get(red);

      expect((await cache.get(nearRed))?.matchKind).toBe('similar');
    });

    it('should drop an entry whose payload cannot be decoded', async () => {
      const hash = await cache.set(red, { confidence: 0.9 });
      await cache.shutdown();
      await fs.writeFile(path.join(dir, `${hash}.cache`), 'garbage');

      cache = open();

      expect(await cache.get(red)).toBeNull();
      expect(cache.statistics().disk.entries).toBe(0);
    });

    it('should preload disk entries', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.shutdown();

      cache = open();
      const promoted = await cache.preload([red, blue, Buffer.from('junk')]);

      expect(promoted).toBe(1);
      expect(cache.statistics().memory.entries).toBe(1);
    });

    it('should stop preloading when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      expect(await cache.preload([red], controller.signal)).toBe(0);
    });
  });

  describe('statistics', () => {
    it('should count hits and misses', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.get(red);
      await cache.get(blue);

      const stats = cache.statistics();

      expect(stats.hits).toEqual({ memory: 1, disk: 0, exact: 1, similar: 0, total: 1 });
      expect(stats.misses).toBe(1);
      expect(stats.hitRate).toBe(0.5);
      expect(cache.formatStatistics()).toContain('Hit rate:        50.0% (1 hits, 1 misses)');
    });

    it('should report the disk compression ratio', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.flush();

      expect(cache.statistics().disk.compressionRatio).toBe(1);
      expect(cache.formatStatistics()).toContain('  compression:   100.0% of original size');
    });

    it('should emit events', async () => {
      const onSet = jest.fn();
      const onHit = jest.fn();
      const onMiss = jest.fn();
      const onStats = jest.fn();
      cache.on('set', onSet);
      cache.on('hit', onHit);
      cache.on('miss', onMiss);
      cache.on('stats', onStats);

      const hash = await cache.set(red, { confidence: 0.9 });
      await cache.get(red);
      await cache.get(blue);

      expect(onSet).toHaveBeenCalledTimes(1);
      expect(onHit).toHaveBeenCalledWith({ hash, tier: 'memory', matchKind: 'exact', similarity: undefined });
      expect(onMiss).toHaveBeenCalledTimes(1);
      expect(onStats).toHaveBeenCalledTimes(3);
    });
  });

  describe('custom schemas', () => {
    const LabelledSchema = z.object({
      confidence: z.number(),
      matchedFrom: z.string().optional(),
      label: z.string(),
    });
    type Labelled = z.infer<typeof LabelledSchema>;

    it('should validate values read back from disk', async () => {
      const typed = new RecognitionCache<Labelled>({
        schema: LabelledSchema,
        config: { cacheDir: dir, canonicalSize: 64 },
      });

      await typed.set(red, { confidence: 0.7, label: 'red' });
      const lookup = await typed.get(red);
      await typed.shutdown();

      expect(lookup?.value.label).toBe('red');
    });

    it('should treat values failing the schema as misses', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.shutdown();

      const strict = new RecognitionCache<Labelled>({
        schema: LabelledSchema,
        config: { cacheDir: dir, canonicalSize: 64 },
      });
      cache = open();

      expect(await strict.get(red)).toBeNull();
      await strict.shutdown();
    });
  });

  describe('lifecycle', () => {
    it('should persist pending writes on shutdown', async () => {
      const hash = await cache.set(red, { confidence: 0.9 });
      cache.startMaintenance();

      await cache.shutdown();

      const index = await fs.readJson(path.join(dir, 'index.json'));
      expect(Object.keys(index.entries)).toEqual([hash]);
    });

    it('should rebuild the similarity index on demand', async () => {
      await cache.set(red, { confidence: 0.9 });
      await cache.set(nearRed, { confidence: 0.9 });

      expect(await cache.optimizeIndex()).toEqual({ nodes: 2, edges: 1, aborted: false });
    });
  });

  it('should accept the base result schema', () => {
    expect(RecognitionResultSchema.safeParse({ confidence: 0.5, extra: [1] }).success).toBe(true);
    expect(RecognitionResultSchema.safeParse({ label: 'x' }).success).toBe(false);
  });
});
