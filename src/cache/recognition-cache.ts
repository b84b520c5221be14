/**
 * Recognition Cache
 *
 * Two-tier cache for image-recognition results keyed by image content.
 * Lookups try, in order:
 * 1. the memory tier (exact content hash)
 * 2. the disk tier (exact content hash, promoted to memory on hit)
 * 3. near-duplicates through the similarity index, whose confidence is
 *    rescaled by the perceptual similarity
 *
 * Values cross the tiers as bytes; (de)serialization and validation happen
 * here, against the schema the cache was built with.
 *
 * Usage:
 * ```typescript
 * const cache = createRecognitionCache({ cacheDir: '/tmp/recognition' });
 * await cache.initialize();
 * cache.startMaintenance();
 *
 * await cache.set(imageBytes, { confidence: 0.92, label: 'cat' });
 * const lookup = await cache.get(imageBytes);
 *
 * await cache.shutdown();
 * ```
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { KeyedLanes } from '../concurrency/lanes.js';
import { SerializationError, getErrorMessage } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { AccessTracker } from './access-tracker.js';
import { RecognitionCacheConfig, getCacheConfig } from './cache-config.js';
import { DiskTier, type DiskWrite } from './disk-tier.js';
import { ExpiryPolicy, confidenceScaledTtl } from './expiry-policy.js';
import { ImageHasher } from './image-hasher.js';
import { MemoryTier } from './memory-tier.js';
import { RebuildResult, SimilarityIndex } from './similarity-index.js';
import type {
  CacheLookup,
  CacheStatistics,
  ContentHash,
  PerceptualHash,
  RecognitionResult,
  SetOptions,
  TierName,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RecognitionCacheOptions<T extends RecognitionResult> {
  /** Validates values read back from either tier */
  schema: ResultSchema<T>;
  config?: Partial<RecognitionCacheConfig>;
  /** Lifetime of a value; defaults to confidence-scaled TTL */
  expiryPolicy?: ExpiryPolicy<T>;
  /** Shared hasher; one is created from the config otherwise */
  hasher?: ImageHasher;
}

export interface SimilarSearchOptions {
  threshold?: number;
  limit?: number;
}

export interface BatchItem<T> {
  content: Buffer;
  value: T;
  /** Explicit lifetime; bypasses the expiry policy */
  ttlMs?: number;
}

export interface SweepResult {
  memory: string[];
  disk: string[];
}

/**
 * Base result schema: a numeric confidence plus any other fields
 */
export const RecognitionResultSchema = z
  .object({
    confidence: z.number(),
    matchedFrom: z.string().optional(),
  })
  .catchall(z.unknown());

/** What both tiers actually store */
const EnvelopeSchema = z.object({
  value: z.unknown(),
  perceptualHash: z.string().nullable(),
});

interface ResolvedValue<T> {
  value: T;
  perceptualHash: PerceptualHash | null;
  tier: TierName;
}

// ============================================================================
// Recognition Cache
// ============================================================================

export class RecognitionCache<T extends RecognitionResult> extends EventEmitter {
  readonly config: RecognitionCacheConfig;
  readonly hasher: ImageHasher;

  private schema: ResultSchema<T>;
  private expiryPolicy: ExpiryPolicy<T>;
  private memory: MemoryTier;
  private disk: DiskTier;
  private index: SimilarityIndex;
  private tracker = new AccessTracker();
  private lanes = new KeyedLanes();
  private pendingWrites: Map<ContentHash, Promise<void>> = new Map();

  private ready: Promise<void> | null = null;
  private maintenanceTimer: ReturnType<typeof setInterval> | null = null;
  private maintenanceController: AbortController | null = null;
  private maintenanceRun: Promise<void> | null = null;
  private sweepCount = 0;

  private counters = {
    memoryHits: 0,
    diskHits: 0,
    exactHits: 0,
    similarHits: 0,
    misses: 0,
    promotions: 0,
  };

  constructor(options: RecognitionCacheOptions<T>) {
    super();
    this.config = getCacheConfig(options.config);
    this.schema = options.schema;
    this.expiryPolicy = options.expiryPolicy ?? confidenceScaledTtl(this.config.minTtlMs);
    this.hasher = options.hasher ?? new ImageHasher({
      canonicalSize: this.config.canonicalSize,
      hashCacheEntries: this.config.hashCacheEntries,
    });

    this.memory = new MemoryTier({
      budgetBytes: this.config.memoryBudgetBytes,
      hysteresis: this.config.evictionHysteresis,
    });
    this.disk = new DiskTier({
      directory: this.config.cacheDir,
      budgetBytes: this.config.diskBudgetBytes,
      hysteresis: this.config.evictionHysteresis,
      compressionThresholdBytes: this.config.compressionThresholdBytes,
      compressionLevel: this.config.compressionLevel,
      indexSaveDebounceMs: this.config.indexSaveDebounceMs,
      scoreOf: (key) => this.tracker.score(key),
    });
    this.index = new SimilarityIndex({
      threshold: this.config.similarityThreshold,
      maxCandidates: this.config.maxSimilarityCandidates,
    });

    this.wireTierEvents();
  }

  /**
   * Load the disk index. Called implicitly by every operation.
   */
  initialize(): Promise<void> {
    if (!this.ready) {
      this.ready = this.disk.initialize();
    }
    return this.ready;
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /**
   * Look up the result for an image, exact first, then near-duplicates
   */
  async get(content: Buffer): Promise<CacheLookup<T> | null> {
    await this.initialize();
    const hashes = await this.hasher.hashContent(content);
    if (hashes.fallback) {
      this.recordMiss(hashes.contentHash);
      return null;
    }

    const hash = hashes.contentHash;
    const exact = await this.lanes.run(hash, () => this.readValue(hash, true));
    if (exact) {
      this.tracker.record(hash, exact.tier);
      return this.recordHit({
        value: exact.value,
        matchKind: 'exact',
        contentHash: hash,
        tier: exact.tier,
      });
    }

    const similar = await this.lookupSimilar(hash, hashes.perceptualHash);
    if (similar) {
      this.tracker.record(hash, 'similarity');
      return this.recordHit(similar);
    }

    this.tracker.record(hash, 'none');
    this.recordMiss(hash);
    return null;
  }

  /**
   * Every resident result similar to the image, confidence-rescaled,
   * most confident first
   */
  async findSimilarResults(content: Buffer, options: SimilarSearchOptions = {}): Promise<CacheLookup<T>[]> {
    await this.initialize();
    const hashes = await this.hasher.hashContent(content);
    if (hashes.perceptualHash === null) return [];

    const matches = this.index.findSimilar(hashes.perceptualHash, {
      threshold: options.threshold,
      scanLimit: Number.POSITIVE_INFINITY,
    });

    const results: CacheLookup<T>[] = [];
    for (const match of matches) {
      const resolved = await this.lanes.run(match.hash, () => this.readValue(match.hash, false));
      if (!resolved) continue;

      if (match.hash === hashes.contentHash) {
        results.push({ value: resolved.value, matchKind: 'exact', contentHash: match.hash, tier: resolved.tier });
        continue;
      }

      results.push({
        value: rescale(resolved.value, match.similarity, match.hash),
        matchKind: 'similar',
        contentHash: hashes.contentHash,
        tier: resolved.tier,
        similarity: match.similarity,
        sourceHash: match.hash,
      });
    }

    results.sort((a, b) => b.value.confidence - a.value.confidence);
    return options.limit !== undefined ? results.slice(0, options.limit) : results;
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  /**
   * Cache a result for an image. The memory tier holds it when this resolves;
   * the disk write finishes in the background (see `flush`). Resolves to the
   * content hash, or null when nothing was cached.
   */
  async set(content: Buffer, value: T, options: SetOptions = {}): Promise<ContentHash | null> {
    await this.initialize();
    const hashes = await this.hasher.hashContent(content);
    if (hashes.fallback) {
      logger.debug('Not caching result for unhashable content', { byteLength: content.length });
      return null;
    }

    const hash = hashes.contentHash;
    const ttlMs = options.ttlMs ?? this.expiryPolicy(value, this.config.defaultTtlMs);
    const stored = await this.lanes.run(hash, async () => {
      const write = this.store(hash, hashes.perceptualHash, value, ttlMs);
      if (write) {
        this.scheduleDiskWrites([write]);
      }
      return write !== null;
    });
    if (!stored) return null;

    this.emit('set', { hash, ttlMs });
    this.publishStats();
    return hash;
  }

  /**
   * Cache several results at once. Memory holds every stored item when this
   * resolves; the disk writes go out as one batch in the background.
   * Resolves to each item's content hash, or null where nothing was cached.
   */
  async setMany(items: BatchItem<T>[]): Promise<(ContentHash | null)[]> {
    await this.initialize();
    const hashed = await Promise.all(items.map((item) => this.hasher.hashContent(item.content)));

    const keys = hashed.filter((hashes) => !hashes.fallback).map((hashes) => hashes.contentHash);
    const stored = await this.lanes.runAll(keys, async () => {
      const writes: DiskWrite[] = [];
      for (const [i, item] of items.entries()) {
        const hashes = hashed[i];
        if (hashes.fallback) continue;

        const ttlMs = item.ttlMs ?? this.expiryPolicy(item.value, this.config.defaultTtlMs);
        const write = this.store(hashes.contentHash, hashes.perceptualHash, item.value, ttlMs);
        if (write) {
          writes.push(write);
        }
      }

      if (writes.length > 0) {
        this.scheduleDiskWrites(writes);
      }
      return writes;
    });

    for (const { key, ttlMs } of stored) {
      this.emit('set', { hash: key, ttlMs });
    }
    if (stored.length > 0) {
      this.publishStats();
    }

    const storedKeys = new Set(stored.map(({ key }) => key));
    return hashed.map((hashes) => (storedKeys.has(hashes.contentHash) ? hashes.contentHash : null));
  }

  /**
   * Remove the result for an image from every tier. Idempotent.
   */
  async remove(content: Buffer): Promise<boolean> {
    await this.initialize();
    const hashes = await this.hasher.hashContent(content);
    if (hashes.fallback) return false;
    return this.invalidate(hashes.contentHash);
  }

  /**
   * Remove a content hash from every tier, the similarity index and the
   * access tracker. A disk write still in flight for the key lands first.
   */
  async invalidate(hash: ContentHash): Promise<boolean> {
    await this.initialize();
    const removed = await this.lanes.run(hash, () => this.dropKey(hash));
    if (removed) {
      this.emit('remove', { hash });
      this.publishStats();
    }
    return removed;
  }

  async clear(): Promise<void> {
    await this.initialize();
    await this.lanes.drain();
    await this.flush();

    this.memory.clear();
    this.index.clear();
    this.tracker.clear();
    await this.disk.clear();

    logger.info('Recognition cache cleared');
    this.emit('clear');
    this.publishStats();
  }

  /**
   * Hash the given images and promote their disk entries to memory through
   * one batch read. Resolves to the number of promoted entries.
   */
  async preload(contents: Buffer[], signal?: AbortSignal): Promise<number> {
    await this.initialize();
    const hashed = await Promise.all(contents.map((content) => this.hasher.hashContent(content)));
    if (signal?.aborted) return 0;

    const wanted = hashed
      .filter((hashes) => !hashes.fallback && !this.memory.has(hashes.contentHash))
      .map((hashes) => hashes.contentHash);
    const loaded = await this.disk.batchGet(Array.from(new Set(wanted)), signal);

    let promoted = 0;
    for (const [hash, data] of loaded) {
      const resolved = await this.lanes.run(hash, async () => {
        // A write since the batch read is newer than these bytes
        if (this.memory.has(hash)) return null;
        return this.promote(hash, data, false);
      });
      if (resolved) {
        promoted++;
      }
    }

    if (promoted > 0) {
      logger.debug(`Preloaded ${promoted} entries into memory`);
      this.publishStats();
    }
    return promoted;
  }

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  /**
   * Remove expired entries from both tiers and everything that references them
   */
  async sweepExpired(signal?: AbortSignal): Promise<SweepResult> {
    await this.initialize();

    const memory = this.memory.sweepExpired();
    const disk = signal?.aborted ? [] : await this.disk.sweepExpired(signal);

    if (memory.length + disk.length > 0) {
      logger.debug('Expired entries swept', { memory: memory.length, disk: disk.length });
      this.publishStats();
    }
    return { memory, disk };
  }

  /**
   * Recompute similarity edges
   */
  async optimizeIndex(signal?: AbortSignal): Promise<RebuildResult> {
    const result = await this.index.rebuild(signal);
    logger.debug('Similarity index rebuilt', { ...result });
    return result;
  }

  /**
   * Sweep expired entries every `maintenanceIntervalMs`, rebuilding the
   * similarity index every `indexRebuildEvery` sweeps
   */
  startMaintenance(): void {
    if (this.maintenanceTimer) return;

    this.maintenanceTimer = setInterval(() => {
      if (this.maintenanceRun) return;
      this.maintenanceRun = this.runMaintenance().finally(() => {
        this.maintenanceRun = null;
      });
    }, this.config.maintenanceIntervalMs);
    this.maintenanceTimer.unref();
  }

  stopMaintenance(): void {
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }
    this.maintenanceController?.abort();
  }

  /**
   * Wait for every background disk write
   */
  async flush(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all(this.pendingWrites.values());
    }
    await this.disk.flush();
  }

  /**
   * Stop maintenance, let in-flight work land and persist the disk index
   */
  async shutdown(): Promise<void> {
    this.stopMaintenance();
    if (this.maintenanceRun) {
      await this.maintenanceRun;
    }

    await this.lanes.drain();
    await this.flush();
    await this.disk.dispose();
    this.emit('shutdown');
  }

  // ===========================================================================
  // Statistics
  // ===========================================================================

  statistics(): CacheStatistics {
    const { memoryHits, diskHits, exactHits, similarHits, misses, promotions } = this.counters;
    const total = exactHits + similarHits;
    const memory = this.memory.stats();
    const disk = this.disk.stats();

    const keys = new Set([...this.memory.keys(), ...this.disk.keys()]);

    return {
      hits: { memory: memoryHits, disk: diskHits, exact: exactHits, similar: similarHits, total },
      misses,
      hitRate: total + misses > 0 ? total / (total + misses) : 0,
      promotions,
      memory,
      disk,
      similarityIndex: this.index.stats(),
      hasher: { cachedHashes: this.hasher.getCacheStatistics().cachedHashes },
      pendingDiskWrites: this.pendingWrites.size,
      totalEntries: keys.size,
      totalSizeBytes: memory.sizeBytes + disk.sizeBytes,
    };
  }

  formatStatistics(): string {
    const stats = this.statistics();
    const percent = (value: number) => `${(value * 100).toFixed(1)}%`;

    const lines = [
      'Recognition Cache Statistics',
      '============================',
      `Hit rate:        ${percent(stats.hitRate)} (${stats.hits.total} hits, ${stats.misses} misses)`,
      `  exact:         ${stats.hits.exact}`,
      `  similar:       ${stats.hits.similar}`,
      `  from memory:   ${stats.hits.memory}`,
      `  from disk:     ${stats.hits.disk}`,
      `Promotions:      ${stats.promotions}`,
      '',
      `Memory tier:     ${stats.memory.entries} entries, ${formatBytes(stats.memory.sizeBytes)} / ${formatBytes(stats.memory.budgetBytes)}`,
      `  evictions:     ${stats.memory.evictions}, expired: ${stats.memory.expired}`,
      `Disk tier:       ${stats.disk.entries} entries (${stats.disk.compressedEntries} compressed), ${formatBytes(stats.disk.sizeBytes)} / ${formatBytes(stats.disk.budgetBytes)}`,
      `  compression:   ${percent(stats.disk.compressionRatio)} of original size`,
      `  evictions:     ${stats.disk.evictions}, expired: ${stats.disk.expired}`,
      `Similarity:      ${stats.similarityIndex.nodes} nodes, ${stats.similarityIndex.edges} edges`,
      `Hash cache:      ${stats.hasher.cachedHashes} entries`,
      `Pending writes:  ${stats.pendingDiskWrites}`,
    ];

    return lines.join('\n');
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Tier removals that leave a key in neither tier unlink it everywhere else
   */
  private wireTierEvents(): void {
    const onMemoryGone = (kind: 'evict' | 'expire') => (key: string) => {
      if (!this.disk.has(key) && !this.pendingWrites.has(key)) {
        this.forget(key);
      }
      this.emit(kind, { hash: key, tier: 'memory' });
    };
    const onDiskGone = (kind: 'evict' | 'expire') => (key: string) => {
      if (!this.memory.has(key)) {
        this.forget(key);
      }
      this.emit(kind, { hash: key, tier: 'disk' });
    };

    this.memory.on('evict', onMemoryGone('evict'));
    this.memory.on('expire', onMemoryGone('expire'));
    this.disk.on('evict', onDiskGone('evict'));
    this.disk.on('expire', onDiskGone('expire'));
  }

  private forget(hash: ContentHash): void {
    this.index.remove(hash);
    this.tracker.delete(hash);
  }

  /**
   * Read a value by exact hash from memory, then disk (promoting it).
   * Undecodable entries are dropped and read as a miss. Runs inside the
   * hash's lane.
   */
  private async readValue(hash: ContentHash, countAccess: boolean): Promise<ResolvedValue<T> | null> {
    const fromMemory = countAccess ? this.memory.get(hash) : this.memory.peek(hash);
    if (fromMemory) {
      return this.decodeOrDrop(hash, fromMemory.data, 'memory');
    }

    // An entry too large for memory may still be on its way to disk
    const pending = this.pendingWrites.get(hash);
    if (pending) {
      await pending;
    }

    const data = await this.disk.get(hash);
    return data ? this.promote(hash, data, countAccess) : null;
  }

  /**
   * Decode bytes read from disk and copy them into memory
   */
  private async promote(hash: ContentHash, data: Buffer, countAccess: boolean): Promise<ResolvedValue<T> | null> {
    const info = this.disk.entryInfo(hash);
    if (!info) return null;

    const resolved = await this.decodeOrDrop(hash, data, 'disk');
    if (!resolved) return null;

    const now = Date.now();
    const promoted = this.memory.set(hash, {
      data: Buffer.from(data),
      createdAt: now,
      expiresAt: info.expiresAt,
      accessCount: countAccess ? 1 : 0,
      lastAccessedAt: now,
      sizeBytes: data.length,
      compressed: false,
    });
    if (promoted) {
      this.counters.promotions++;
    }

    // The similarity index is not persisted; disk hits re-register
    if (resolved.perceptualHash !== null && !this.index.has(hash)) {
      this.index.insert(hash, resolved.perceptualHash);
    }

    return resolved;
  }

  /**
   * Serve a near-duplicate's result and write it back under the new hash.
   * The candidate is read in its own lane and the write-back happens in the
   * new hash's lane; neither lane is held while waiting on the other.
   */
  private async lookupSimilar(hash: ContentHash, perceptualHash: PerceptualHash | null): Promise<CacheLookup<T> | null> {
    if (perceptualHash === null) return null;

    const neighbors = this.index.neighborMatches(hash);
    const candidates = neighbors.length > 0
      ? neighbors
      : this.index.findSimilar(perceptualHash, { exclude: hash });

    for (const candidate of candidates) {
      const source = await this.lanes.run(candidate.hash, async () => {
        const resolved = await this.readValue(candidate.hash, true);
        // Stale node: neither tier still has it
        if (!resolved && !this.memory.has(candidate.hash) && !this.disk.has(candidate.hash)) {
          this.forget(candidate.hash);
        }
        return resolved;
      });
      if (!source) continue;

      const value = rescale(source.value, candidate.similarity, candidate.hash);
      const ttlMs = this.expiryPolicy(value, this.config.defaultTtlMs);
      await this.lanes.run(hash, async () => {
        // A result stored for this image since the exact miss is newer
        if (this.memory.has(hash) || this.disk.has(hash) || this.pendingWrites.has(hash)) return;

        const write = this.store(hash, perceptualHash, value, ttlMs);
        if (write) {
          this.scheduleDiskWrites([write]);
          this.index.link(hash, candidate.hash, candidate.similarity);
        }
      });

      return {
        value,
        matchKind: 'similar',
        contentHash: hash,
        tier: source.tier,
        similarity: candidate.similarity,
        sourceHash: candidate.hash,
      };
    }

    return null;
  }

  /**
   * Serialize a value into memory and the similarity index. Returns the disk
   * write for the caller to schedule inside the same lane, or null when the
   * value cannot be serialized.
   */
  private store(
    hash: ContentHash,
    perceptualHash: PerceptualHash | null,
    value: T,
    ttlMs: number
  ): DiskWrite | null {
    let data: Buffer;
    try {
      data = Buffer.from(JSON.stringify({ value, perceptualHash }), 'utf-8');
    } catch (error) {
      const failure = new SerializationError('encode', `Cannot serialize result: ${getErrorMessage(error)}`, {
        cause: error,
        key: hash,
      });
      logger.warn('Recognition result not cached', failure.logContext());
      return null;
    }

    const now = Date.now();
    this.memory.set(hash, {
      data,
      createdAt: now,
      expiresAt: now + ttlMs,
      accessCount: 0,
      lastAccessedAt: now,
      sizeBytes: data.length,
      compressed: false,
    });
    if (perceptualHash !== null) {
      this.index.insert(hash, perceptualHash);
    }
    return { key: hash, data: Buffer.from(data), ttlMs };
  }

  /**
   * Queue one disk batch behind any pending write for the same keys. Every
   * key maps to the batch until it lands, so removals wait for it.
   */
  private scheduleDiskWrites(writes: DiskWrite[]): void {
    const previous = Promise.all(writes.map(({ key }) => this.pendingWrites.get(key)));

    const batch: Promise<void> = previous
      .then(() => this.disk.batchSet(writes))
      .then(
        (written) => {
          if (written.length < new Set(writes.map(({ key }) => key)).size) {
            logger.debug('Some disk writes skipped, those entries stay memory-only', {
              requested: writes.length,
              written: written.length,
            });
          }
        },
        (error: unknown) => {
          logger.warn('Disk write failed', { keys: writes.length, reason: getErrorMessage(error) });
        }
      )
      .finally(() => {
        for (const { key } of writes) {
          if (this.pendingWrites.get(key) === batch) {
            this.pendingWrites.delete(key);
          }
        }
      });

    for (const { key } of writes) {
      this.pendingWrites.set(key, batch);
    }
  }

  /**
   * Remove a key everywhere; runs inside the key's lane
   */
  private async dropKey(hash: ContentHash): Promise<boolean> {
    const inMemory = this.memory.remove(hash);
    const inIndex = this.index.remove(hash);
    this.tracker.delete(hash);

    const pending = this.pendingWrites.get(hash);
    if (pending) {
      await pending;
    }
    const onDisk = await this.disk.remove(hash);

    return inMemory || inIndex || onDisk;
  }

  private async decodeOrDrop(hash: ContentHash, data: Buffer, tier: TierName): Promise<ResolvedValue<T> | null> {
    const decoded = this.decode(hash, data);
    if (decoded instanceof SerializationError) {
      logger.warn('Dropping undecodable cache entry', { tier, ...decoded.logContext() });
      await this.dropKey(hash);
      return null;
    }
    return { ...decoded, tier };
  }

  private decode(hash: ContentHash, data: Buffer): { value: T; perceptualHash: PerceptualHash | null } | SerializationError {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString('utf-8'));
    } catch (error) {
      return new SerializationError('decode', 'Cached entry is not valid JSON', { cause: error, key: hash });
    }

    const envelope = EnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return new SerializationError('decode', 'Cached entry has no result envelope', { cause: envelope.error, key: hash });
    }

    const value = this.schema.safeParse(envelope.data.value);
    if (!value.success) {
      return new SerializationError('decode', 'Cached result failed validation', { cause: value.error, key: hash });
    }

    return { value: value.data, perceptualHash: envelope.data.perceptualHash };
  }

  private recordHit(lookup: CacheLookup<T>): CacheLookup<T> {
    if (lookup.tier === 'memory') {
      this.counters.memoryHits++;
    } else {
      this.counters.diskHits++;
    }
    if (lookup.matchKind === 'exact') {
      this.counters.exactHits++;
    } else {
      this.counters.similarHits++;
    }

    this.emit('hit', {
      hash: lookup.contentHash,
      tier: lookup.tier,
      matchKind: lookup.matchKind,
      similarity: lookup.similarity,
    });
    this.publishStats();
    return lookup;
  }

  private recordMiss(hash: ContentHash): void {
    this.counters.misses++;
    this.emit('miss', { hash });
    this.publishStats();
  }

  private publishStats(): void {
    if (this.listenerCount('stats') > 0) {
      this.emit('stats', this.statistics());
    }
  }

  private async runMaintenance(): Promise<void> {
    const controller = new AbortController();
    this.maintenanceController = controller;
    this.sweepCount++;

    try {
      await this.sweepExpired(controller.signal);

      const every = this.config.indexRebuildEvery;
      if (every > 0 && this.sweepCount % every === 0 && !controller.signal.aborted) {
        await this.optimizeIndex(controller.signal);
      }
    } catch (error) {
      logger.warn('Cache maintenance pass failed', { reason: getErrorMessage(error) });
    } finally {
      this.maintenanceController = null;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * A near-duplicate's result, its confidence scaled by how similar the images are
 */
function rescale<T extends RecognitionResult>(value: T, similarity: number, sourceHash: ContentHash): T {
  return { ...value, confidence: value.confidence * similarity, matchedFrom: sourceHash };
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Cache for plain recognition results
 */
export function createRecognitionCache(
  config: Partial<RecognitionCacheConfig> = {},
  options: { expiryPolicy?: ExpiryPolicy; hasher?: ImageHasher } = {}
): RecognitionCache<RecognitionResult> {
  return new RecognitionCache<RecognitionResult>({ schema: RecognitionResultSchema, config, ...options });
}
