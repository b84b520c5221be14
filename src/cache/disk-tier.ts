/**
 * Disk Tier
 *
 * Byte-bounded persistent key → bytes store. One file per entry, named by
 * the entry's content hash, plus an index side-file (index.json) that maps
 * keys to { size, createdAt, expiresAt, compressed } and is reloaded on
 * startup.
 *
 * Features:
 * - gzip for payloads above the compression threshold, kept only when smaller
 * - atomic writes (temp file + rename)
 * - per-key serialized file operations; the tier is the index file's only writer
 * - eviction by accessFrequency × hitRate down to the hysteresis fraction
 * - expiry sweep that reports removed keys for cascading cleanup
 * - cold start on a missing or corrupt index
 */

import { EventEmitter } from 'events';
import * as crypto from 'crypto';
import * as path from 'path';
import * as zlib from 'zlib';
import { promisify } from 'util';
import * as fs from 'fs-extra';
import { z } from 'zod';
import { KeyedLanes } from '../concurrency/lanes.js';
import { CorruptIndexError, StorageIOError, getErrorMessage } from '../errors/index.js';
import { parseJSON } from '../utils/json-validator.js';
import { logger } from '../utils/logger.js';
import type { DiskTierStats } from './types.js';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

// ============================================================================
// Types
// ============================================================================

export interface DiskTierConfig {
  directory: string;
  budgetBytes: number;
  /** Fraction of the budget eviction drains down to */
  hysteresis: number;
  compressionThresholdBytes: number;
  compressionLevel: number;
  indexSaveDebounceMs: number;
  /**
   * Eviction keep-score of a key (higher survives). Defaults to the entry's
   * own hourly access frequency.
   */
  scoreOf?: (key: string, entry: DiskIndexEntry) => number;
}

export interface DiskWrite {
  key: string;
  data: Buffer;
  ttlMs: number;
}

export const INDEX_FILE_NAME = 'index.json';
export const ENTRY_FILE_SUFFIX = '.cache';
const INDEX_VERSION = 1;
const HOUR_MS = 60 * 60 * 1000;
const CONTENT_HASH_PATTERN = /^[0-9a-f]{64}$/;

// Entry files are always located through filePathFor(key); the index holds no paths
const DiskIndexEntrySchema = z.object({
  size: z.number().int().nonnegative(),
  originalSize: z.number().int().nonnegative(),
  createdAt: z.number(),
  expiresAt: z.number(),
  compressed: z.boolean(),
  accessCount: z.number().int().nonnegative().default(0),
  lastAccessedAt: z.number(),
});

const DiskIndexFileSchema = z.object({
  version: z.literal(INDEX_VERSION),
  savedAt: z.number(),
  entries: z.record(z.string(), DiskIndexEntrySchema),
});

export type DiskIndexEntry = z.infer<typeof DiskIndexEntrySchema>;

const DEFAULT_DISK_CONFIG: Omit<DiskTierConfig, 'directory'> = {
  budgetBytes: 100 * 1024 * 1024,
  hysteresis: 0.75,
  compressionThresholdBytes: 1024 * 1024,
  compressionLevel: 6,
  indexSaveDebounceMs: 1000,
};

function defaultScore(_key: string, entry: DiskIndexEntry): number {
  const hours = Math.max((Date.now() - entry.createdAt) / HOUR_MS, 1);
  return entry.accessCount / hours;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Disk Tier
// ============================================================================

export class DiskTier extends EventEmitter {
  private config: DiskTierConfig;
  private index: Map<string, DiskIndexEntry> = new Map();
  private lanes = new KeyedLanes();
  private indexPath: string;

  private initialized = false;
  private available = true;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private indexWrite: Promise<void> = Promise.resolve();
  private evicting: Promise<void> | null = null;

  private counters = {
    evictions: 0,
    expired: 0,
    writeFailures: 0,
    readFailures: 0,
  };

  constructor(config: Partial<DiskTierConfig> & { directory: string }) {
    super();
    this.config = { ...DEFAULT_DISK_CONFIG, ...config };
    this.indexPath = path.join(this.config.directory, INDEX_FILE_NAME);
  }

  /**
   * Create the cache directory and load the persisted index. Never rejects:
   * an unusable directory disables the tier, an unusable index starts empty.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    try {
      await fs.ensureDir(this.config.directory);
    } catch (error) {
      this.available = false;
      const failure = new StorageIOError('mkdir', this.config.directory, { cause: error });
      logger.warn('Disk cache unavailable, continuing memory-only', failure.logContext());
      return;
    }

    const loaded = await this.loadIndex();
    logger.debug(`Disk cache index loaded with ${loaded} entries`, { directory: this.config.directory });
    this.emit('initialized', { entries: loaded });
  }

  /**
   * Write bytes for a key. Resolves false when the write failed.
   */
  async set(key: string, data: Buffer, ttlMs: number): Promise<boolean> {
    const written = await this.batchSet([{ key, data, ttlMs }]);
    return written.length === 1;
  }

  /**
   * Write several entries with one eviction pass afterwards. Writes for the
   * same key land in the order given. Resolves to the keys written.
   */
  async batchSet(writes: DiskWrite[]): Promise<string[]> {
    if (!this.available) return [];

    const outcomes = await Promise.all(
      writes.map(({ key, data, ttlMs }) => this.lanes.run(key, () => this.writeEntry(key, data, ttlMs)))
    );
    const written = writes.filter((_, i) => outcomes[i]).map(({ key }) => key);

    if (written.length > 0) {
      await this.evictIfNeeded();
    }
    return Array.from(new Set(written));
  }

  /**
   * Read bytes for a key. Missing, expired or unreadable entries are misses;
   * unreadable ones are removed so they stop failing.
   */
  async get(key: string): Promise<Buffer | undefined> {
    if (!this.available || !this.index.has(key)) return undefined;
    return this.lanes.run(key, () => this.readEntry(key));
  }

  /**
   * Read several keys; aborting stops before the next read
   */
  async batchGet(keys: string[], signal?: AbortSignal): Promise<Map<string, Buffer>> {
    const results = new Map<string, Buffer>();
    for (const key of keys) {
      if (signal?.aborted) break;
      const data = await this.get(key);
      if (data) {
        results.set(key, data);
      }
    }
    return results;
  }

  /**
   * Delete the file and the index entry together. Missing files are fine.
   */
  async remove(key: string): Promise<boolean> {
    return this.lanes.run(key, () => this.removeEntry(key));
  }

  /**
   * Remove every entry and rewrite an empty index
   */
  async clear(): Promise<void> {
    await this.lanes.drain();
    this.index.clear();

    if (this.available) {
      try {
        await fs.emptyDir(this.config.directory);
      } catch (error) {
        const failure = new StorageIOError('delete', this.config.directory, { cause: error });
        logger.warn('Failed to empty disk cache directory', failure.logContext());
      }
    }

    await this.flush();
    this.emit('clear');
  }

  /**
   * Remove entries whose expiry has passed and return their keys
   */
  async sweepExpired(signal?: AbortSignal): Promise<string[]> {
    const now = Date.now();
    const due = Array.from(this.index)
      .filter(([, entry]) => now > entry.expiresAt)
      .map(([key]) => key);

    const removed: string[] = [];
    for (const key of due) {
      if (signal?.aborted) break;
      if (await this.remove(key)) {
        removed.push(key);
        this.counters.expired++;
        this.emit('expire', key);
      }
    }

    if (removed.length > 0) {
      logger.debug(`Disk tier swept ${removed.length} expired entries`);
    }
    return removed;
  }

  has(key: string): boolean {
    const entry = this.index.get(key);
    return entry !== undefined && Date.now() <= entry.expiresAt;
  }

  entryInfo(key: string): DiskIndexEntry | undefined {
    const entry = this.index.get(key);
    return entry ? { ...entry } : undefined;
  }

  keys(): string[] {
    return Array.from(this.index.keys());
  }

  get sizeBytes(): number {
    let total = 0;
    for (const entry of this.index.values()) {
      total += entry.size;
    }
    return total;
  }

  /**
   * `compressionRatio` is stored bytes over original bytes (1 when empty)
   */
  stats(): DiskTierStats {
    let compressedEntries = 0;
    let originalBytes = 0;
    for (const entry of this.index.values()) {
      if (entry.compressed) compressedEntries++;
      originalBytes += entry.originalSize;
    }

    const sizeBytes = this.sizeBytes;
    return {
      entries: this.index.size,
      sizeBytes,
      budgetBytes: this.config.budgetBytes,
      evictions: this.counters.evictions,
      expired: this.counters.expired,
      compressedEntries,
      compressionRatio: originalBytes > 0 ? sizeBytes / originalBytes : 1,
    };
  }

  filePathFor(key: string): string {
    const name = CONTENT_HASH_PATTERN.test(key)
      ? key
      : crypto.createHash('sha256').update(key).digest('hex');
    return path.join(this.config.directory, `${name}${ENTRY_FILE_SUFFIX}`);
  }

  /**
   * Write the index now, cancelling any pending debounced save
   */
  async flush(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    if (!this.available) return;

    const snapshot = JSON.stringify({
      version: INDEX_VERSION,
      savedAt: Date.now(),
      entries: Object.fromEntries(this.index),
    });

    this.indexWrite = this.indexWrite.then(() => this.writeIndex(snapshot));
    await this.indexWrite;
  }

  /**
   * Wait for in-flight file operations, then persist the index
   */
  async dispose(): Promise<void> {
    await this.lanes.drain();
    if (this.evicting) {
      await this.evicting;
    }
    await this.flush();
    this.removeAllListeners();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async encode(data: Buffer): Promise<{ payload: Buffer; compressed: boolean }> {
    if (data.length <= this.config.compressionThresholdBytes) {
      return { payload: data, compressed: false };
    }

    const compressed = await gzip(data, { level: this.config.compressionLevel });
    return compressed.length < data.length
      ? { payload: compressed, compressed: true }
      : { payload: data, compressed: false };
  }

  /**
   * Entries written before compression was enabled are stored raw, so a
   * failed gunzip means the bytes are already plain
   */
  private async decode(raw: Buffer): Promise<Buffer> {
    try {
      return await gunzip(raw);
    } catch {
      return raw;
    }
  }

  private async writeEntry(key: string, data: Buffer, ttlMs: number): Promise<boolean> {
    const { payload, compressed } = await this.encode(data);
    const filePath = this.filePathFor(key);
    const tempPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;

    try {
      await fs.writeFile(tempPath, payload);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      this.counters.writeFailures++;
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        logger.debug('Failed to remove temp file', { tempPath, reason: getErrorMessage(cleanupError) });
      });
      const failure = new StorageIOError('write', filePath, { cause: error });
      logger.warn('Disk cache write failed', { key, ...failure.logContext() });
      return false;
    }

    const now = Date.now();
    this.index.set(key, {
      size: payload.length,
      originalSize: data.length,
      createdAt: now,
      expiresAt: now + ttlMs,
      compressed,
      accessCount: 0,
      lastAccessedAt: now,
    });

    this.scheduleIndexSave();
    this.emit('set', { key, sizeBytes: payload.length, compressed });
    return true;
  }

  private async readEntry(key: string): Promise<Buffer | undefined> {
    const entry = this.index.get(key);
    if (!entry) return undefined;

    if (Date.now() > entry.expiresAt) {
      await this.removeEntry(key);
      this.counters.expired++;
      this.emit('expire', key);
      return undefined;
    }

    const filePath = this.filePathFor(key);
    let raw: Buffer;
    try {
      raw = await fs.readFile(filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.counters.readFailures++;
        const failure = new StorageIOError('read', filePath, { cause: error });
        logger.warn('Disk cache read failed, dropping entry', { key, ...failure.logContext() });
      }
      await this.removeEntry(key);
      return undefined;
    }

    const data = await this.decode(raw);
    entry.accessCount++;
    entry.lastAccessedAt = Date.now();
    this.scheduleIndexSave();
    return data;
  }

  private async removeEntry(key: string): Promise<boolean> {
    const existed = this.index.delete(key);

    try {
      await fs.remove(this.filePathFor(key));
    } catch (error) {
      const failure = new StorageIOError('delete', this.filePathFor(key), { cause: error });
      logger.warn('Disk cache delete failed', { key, ...failure.logContext() });
    }

    if (existed) {
      this.scheduleIndexSave();
      this.emit('remove', key);
    }
    return existed;
  }

  /**
   * Runs outside any key lane; concurrent callers share one pass
   */
  private async evictIfNeeded(): Promise<void> {
    if (this.evicting) {
      await this.evicting;
      return;
    }
    if (this.sizeBytes <= this.config.budgetBytes) return;

    this.evicting = this.evict().finally(() => {
      this.evicting = null;
    });
    await this.evicting;
  }

  private async evict(): Promise<void> {
    const scoreOf = this.config.scoreOf ?? defaultScore;
    const target = this.config.budgetBytes * this.config.hysteresis;

    const ranked = Array.from(this.index)
      .map(([key, entry]) => ({ key, entry, score: scoreOf(key, entry) }))
      .sort((a, b) => (a.score !== b.score ? a.score - b.score : a.entry.createdAt - b.entry.createdAt));

    let evicted = 0;
    for (const { key } of ranked) {
      if (this.sizeBytes <= target) break;
      if (await this.remove(key)) {
        evicted++;
        this.counters.evictions++;
        this.emit('evict', key);
      }
    }

    logger.debug(`Disk tier evicted ${evicted} entries`, {
      sizeBytes: this.sizeBytes,
      budgetBytes: this.config.budgetBytes,
    });
  }

  private scheduleIndexSave(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flush();
    }, this.config.indexSaveDebounceMs);
    this.saveTimer.unref();
  }

  private async writeIndex(snapshot: string): Promise<void> {
    const tempPath = `${this.indexPath}.tmp`;
    try {
      await fs.writeFile(tempPath, snapshot, 'utf-8');
      await fs.rename(tempPath, this.indexPath);
    } catch (error) {
      const failure = new StorageIOError('write', this.indexPath, { cause: error });
      logger.warn('Failed to persist disk cache index', failure.logContext());
    }
  }

  private async loadIndex(): Promise<number> {
    let content: string;
    try {
      content = await fs.readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.reportCorruptIndex(getErrorMessage(error), error);
      }
      return 0;
    }

    const parsed = parseJSON(content, DiskIndexFileSchema, { errorPrefix: 'Invalid index' });
    if (!parsed.success) {
      this.reportCorruptIndex(parsed.error);
      return 0;
    }

    const now = Date.now();
    let stale = 0;
    for (const [key, entry] of Object.entries(parsed.data.entries)) {
      const filePath = this.filePathFor(key);
      if (now > entry.expiresAt || !(await fs.pathExists(filePath))) {
        await fs.remove(filePath);
        stale++;
        continue;
      }
      this.index.set(key, entry);
    }

    if (stale > 0) {
      this.scheduleIndexSave();
    }
    return this.index.size;
  }

  private reportCorruptIndex(reason: string, cause?: unknown): void {
    const failure = new CorruptIndexError(this.indexPath, reason, { cause });
    logger.warn('Disk cache index unusable, starting cold', failure.logContext());
    this.emit('index:corrupt', failure);
  }
}
