/**
 * Disk Tier Tests
 *
 * Runs against a real temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as crypto from 'crypto';
import * as path from 'path';
import * as zlib from 'zlib';
import * as fs from 'fs-extra';
import { DiskTier, INDEX_FILE_NAME } from '../../src/cache/disk-tier.js';
import { makeTempDir } from '../test-utils.js';

const KEY_A = 'a'.repeat(64);
const KEY_B = 'b'.repeat(64);

describe('DiskTier', () => {
  let dir: string;
  let tier: DiskTier;

  function createTier(overrides: Partial<ConstructorParameters<typeof DiskTier>[0]> = {}): DiskTier {
    return new DiskTier({
      directory: dir,
      budgetBytes: 1024 * 1024,
      hysteresis: 0.75,
      compressionThresholdBytes: 1024,
      compressionLevel: 6,
      indexSaveDebounceMs: 10,
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = makeTempDir('disk-tier');
    tier = createTier();
    await tier.initialize();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await tier.dispose();
    await fs.remove(dir);
  });

  describe('set / get', () => {
    it('should round-trip small payloads uncompressed', async () => {
      const data = Buffer.from('{"confidence":0.9}');

      expect(await tier.set(KEY_A, data, 60_000)).toBe(true);

      expect(await tier.get(KEY_A)).toEqual(data);
      expect(tier.entryInfo(KEY_A)?.compressed).toBe(false);
      expect(await fs.pathExists(path.join(dir, `${KEY_A}.cache`))).toBe(true);
    });

    it('should compress payloads above the threshold when that saves space', async () => {
      const data = Buffer.from('x'.repeat(10_000));

      await tier.set(KEY_A, data, 60_000);

      const info = tier.entryInfo(KEY_A);
      expect(info?.compressed).toBe(true);
      expect(info?.originalSize).toBe(10_000);
      expect(info?.size).toBeLessThan(10_000);
      expect(await tier.get(KEY_A)).toEqual(data);
      expect(tier.stats().compressedEntries).toBe(1);
    });

    it('should store incompressible payloads as they are', async () => {
      const data = crypto.randomBytes(4096);

      await tier.set(KEY_A, data, 60_000);

      expect(tier.entryInfo(KEY_A)?.compressed).toBe(false);
      expect(tier.entryInfo(KEY_A)?.size).toBe(4096);
      expect(await tier.get(KEY_A)).toEqual(data);
    });

    it('should read raw bytes when decompression fails', async () => {
      await tier.set(KEY_A, Buffer.from('y'.repeat(5000)), 60_000);
      await fs.writeFile(path.join(dir, `${KEY_A}.cache`), 'plain bytes');

      expect((await tier.get(KEY_A))?.toString()).toBe('plain bytes');
    });

    it('should read gzip files regardless of the recorded flag', async () => {
      await tier.set(KEY_A, Buffer.from('short'), 60_000);
      await fs.writeFile(path.join(dir, `${KEY_A}.cache`), zlib.gzipSync(Buffer.from('zipped')));

      expect((await tier.get(KEY_A))?.toString()).toBe('zipped');
    });

    it('should hash keys that are not content hashes into file names', () => {
      expect(path.basename(tier.filePathFor('../escape'))).toMatch(/^[0-9a-f]{64}\.cache$/);
      expect(path.basename(tier.filePathFor(KEY_A))).toBe(`${KEY_A}.cache`);
    });

    it('should miss and forget entries whose file disappeared', async () => {
      await tier.set(KEY_A, Buffer.from('data'), 60_000);
      await fs.remove(path.join(dir, `${KEY_A}.cache`));

      expect(await tier.get(KEY_A)).toBeUndefined();
      expect(tier.has(KEY_A)).toBe(false);
    });

    it('should count accesses on read', async () => {
      await tier.set(KEY_A, Buffer.from('data'), 60_000);
      await tier.get(KEY_A);
      await tier.get(KEY_A);

      expect(tier.entryInfo(KEY_A)?.accessCount).toBe(2);
    });

    it('should return only present keys from batchGet', async () => {
      await tier.set(KEY_A, Buffer.from('a'), 60_000);

      const results = await tier.batchGet([KEY_A, KEY_B]);

      expect(Array.from(results.keys())).toEqual([KEY_A]);
    });

    it('should write a batch and keep the last write for a repeated key', async () => {
      const written = await tier.batchSet([
        { key: KEY_A, data: Buffer.from('first'), ttlMs: 60_000 },
        { key: KEY_B, data: Buffer.from('b'), ttlMs: 60_000 },
        { key: KEY_A, data: Buffer.from('second'), ttlMs: 60_000 },
      ]);

      expect(written).toEqual([KEY_A, KEY_B]);
      expect((await tier.get(KEY_A))?.toString()).toBe('second');
      expect((await tier.get(KEY_B))?.toString()).toBe('b');
    });

    it('should report stored bytes over original bytes as the compression ratio', async () => {
      expect(tier.stats().compressionRatio).toBe(1);

      await tier.set(KEY_A, Buffer.from('x'.repeat(10_000)), 60_000);
      await tier.set(KEY_B, crypto.randomBytes(2000), 60_000);

      const stats = tier.stats();
      expect(stats.compressionRatio).toBe(stats.sizeBytes / 12_000);
      expect(stats.compressionRatio).toBeLessThan(1);
    });
  });

  describe('expiry', () => {
    it('should miss and remove expired entries on read', async () => {
      let now = 1_000_000;
      jest.spyOn(Date, 'now').mockImplementation(() => now);
      const expired = jest.fn();
      tier.on('expire', expired);

      await tier.set(KEY_A, Buffer.from('data'), 1000);
      now += 1500;

      expect(await tier.get(KEY_A)).toBeUndefined();
      expect(expired).toHaveBeenCalledWith(KEY_A);
      expect(await fs.pathExists(path.join(dir, `${KEY_A}.cache`))).toBe(false);
    });

    it('should sweep expired entries and report their keys', async () => {
      let now = 1_000_000;
      jest.spyOn(Date, 'now').mockImplementation(() => now);

      await tier.set(KEY_A, Buffer.from('short'), 1000);
      await tier.set(KEY_B, Buffer.from('long'), 100_000);
      now += 5000;

      expect(await tier.sweepExpired()).toEqual([KEY_A]);
      expect(tier.keys()).toEqual([KEY_B]);
      expect(tier.stats().expired).toBe(1);
    });
  });

  describe('remove', () => {
    it('should be idempotent', async () => {
      await tier.set(KEY_A, Buffer.from('data'), 60_000);

      expect(await tier.remove(KEY_A)).toBe(true);
      expect(await tier.remove(KEY_A)).toBe(false);
      expect(await tier.remove(KEY_B)).toBe(false);
      expect(await fs.pathExists(path.join(dir, `${KEY_A}.cache`))).toBe(false);
    });

    it('should clear every entry', async () => {
      await tier.set(KEY_A, Buffer.from('a'), 60_000);
      await tier.set(KEY_B, Buffer.from('b'), 60_000);

      await tier.clear();

      expect(tier.keys()).toEqual([]);
      expect(await fs.pathExists(path.join(dir, `${KEY_B}.cache`))).toBe(false);
    });
  });

  describe('eviction', () => {
    it('should evict the lowest scored entries down to the hysteresis fraction', async () => {
      const scores: Record<string, number> = { k1: 5, k2: 0, k3: 1, k4: 9 };
      await tier.dispose();
      tier = createTier({
        budgetBytes: 1000,
        compressionThresholdBytes: 1_000_000,
        scoreOf: (key) => scores[key] ?? 0,
      });
      await tier.initialize();
      const evicted: string[] = [];
      tier.on('evict', (key: string) => evicted.push(key));

      for (const key of ['k1', 'k2', 'k3', 'k4']) {
        await tier.set(key, Buffer.alloc(300), 60_000);
      }

      expect(evicted).toEqual(['k2', 'k3']);
      expect(tier.keys().sort()).toEqual(['k1', 'k4']);
      expect(tier.sizeBytes).toBe(600);
      expect(tier.stats().evictions).toBe(2);
    });
  });

  describe('persistence', () => {
    it('should reload the index in a new instance', async () => {
      await tier.set(KEY_A, Buffer.from('persisted'), 60_000);
      await tier.flush();

      const index = await fs.readJson(path.join(dir, INDEX_FILE_NAME));
      expect(index.version).toBe(1);
      expect(Object.keys(index.entries)).toEqual([KEY_A]);

      const reopened = createTier();
      await reopened.initialize();

      expect((await reopened.get(KEY_A))?.toString()).toBe('persisted');
      await reopened.dispose();
    });

    it('should drop index entries whose file is missing', async () => {
      await tier.set(KEY_A, Buffer.from('a'), 60_000);
      await tier.set(KEY_B, Buffer.from('b'), 60_000);
      await tier.flush();
      await fs.remove(path.join(dir, `${KEY_B}.cache`));

      const reopened = createTier();
      await reopened.initialize();

      expect(reopened.keys()).toEqual([KEY_A]);
      await reopened.dispose();
    });

    it('should start empty on a corrupt index and keep working', async () => {
      await fs.writeFile(path.join(dir, INDEX_FILE_NAME), '{ not json');
      const reopened = createTier();
      const onCorrupt = jest.fn();
      reopened.on('index:corrupt', onCorrupt);

      await reopened.initialize();

      expect(reopened.keys()).toEqual([]);
      expect(onCorrupt).toHaveBeenCalledTimes(1);
      expect(await reopened.set(KEY_A, Buffer.from('fresh'), 60_000)).toBe(true);
      expect((await reopened.get(KEY_A))?.toString()).toBe('fresh');
      await reopened.dispose();
    });

    it('should only ever touch entry files inside the cache directory', async () => {
      const cacheDir = path.join(dir, 'nested');
      const outside = path.join(dir, 'outside.txt');
      await fs.writeFile(outside, 'keep me');
      const entry = { size: 7, originalSize: 7, createdAt: 0, compressed: false, accessCount: 0, lastAccessedAt: 0 };
      await fs.outputJson(path.join(cacheDir, INDEX_FILE_NAME), {
        version: 1,
        savedAt: 1,
        entries: {
          '../outside.txt': { ...entry, fileName: '../outside.txt', expiresAt: 1 },
          [KEY_A]: { ...entry, fileName: '../outside.txt', expiresAt: Date.now() + 60_000 },
        },
      });

      const reopened = createTier({ directory: cacheDir });
      await reopened.initialize();

      expect(await fs.readFile(outside, 'utf-8')).toBe('keep me');
      expect(reopened.keys()).toEqual([]);
      expect(await reopened.get(KEY_A)).toBeUndefined();
      await reopened.dispose();
    });

    it('should start empty on an index with the wrong shape', async () => {
      await fs.writeJson(path.join(dir, INDEX_FILE_NAME), { version: 2, entries: [] });
      const reopened = createTier();

      await reopened.initialize();

      expect(reopened.keys()).toEqual([]);
      await reopened.dispose();
    });
  });
});
