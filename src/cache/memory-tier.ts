/**
 * Memory Tier
 *
 * Byte-bounded, volatile key → entry store. When an insert would overflow
 * the budget, entries are evicted by a frequency-weighted recency score
 * (accessCount / time since last access, lowest first, oldest first on
 * ties) until the tier has drained to the hysteresis fraction of its budget.
 *
 * All mutations are synchronous, so the event loop serializes them.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import type { CacheEntry, TierStats } from './types.js';

export interface MemoryTierConfig {
  budgetBytes: number;
  /** Fraction of the budget eviction drains down to */
  hysteresis: number;
}

const DEFAULT_MEMORY_CONFIG: MemoryTierConfig = {
  budgetBytes: 50 * 1024 * 1024,
  hysteresis: 0.75,
};

/**
 * Keep-score of an entry; higher survives longer
 */
export function memoryRetentionScore(entry: CacheEntry, now: number): number {
  return entry.accessCount / Math.max(now - entry.lastAccessedAt, 1);
}

export class MemoryTier extends EventEmitter {
  private config: MemoryTierConfig;
  private entries: Map<string, CacheEntry> = new Map();
  private residentBytes = 0;
  private evictions = 0;
  private expired = 0;

  constructor(config: Partial<MemoryTierConfig> = {}) {
    super();
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
  }

  /**
   * Get a live entry and record the access. Expired entries are removed and
   * reported as a miss.
   */
  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    const now = Date.now();
    if (now > entry.expiresAt) {
      this.drop(key, entry);
      this.expired++;
      this.emit('expire', key);
      return undefined;
    }

    entry.accessCount++;
    entry.lastAccessedAt = now;
    return entry;
  }

  /**
   * Live entry without touching its access record
   */
  peek(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() > entry.expiresAt) return undefined;
    return entry;
  }

  has(key: string): boolean {
    return this.peek(key) !== undefined;
  }

  /**
   * Store an entry, evicting first when it would not fit. Returns false
   * when the entry alone exceeds the budget; any older entry for the key
   * is gone either way.
   */
  set(key: string, entry: CacheEntry): boolean {
    const existing = this.entries.get(key);
    if (existing) {
      this.drop(key, existing);
    }

    if (entry.sizeBytes > this.config.budgetBytes) {
      logger.debug('Entry larger than memory budget, not cached in memory', {
        key,
        sizeBytes: entry.sizeBytes,
        budgetBytes: this.config.budgetBytes,
      });
      return false;
    }

    if (this.residentBytes + entry.sizeBytes > this.config.budgetBytes) {
      this.evictTo(this.config.budgetBytes * this.config.hysteresis - entry.sizeBytes);
    }

    this.entries.set(key, entry);
    this.residentBytes += entry.sizeBytes;
    return true;
  }

  remove(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.drop(key, entry);
    return true;
  }

  clear(): void {
    this.entries.clear();
    this.residentBytes = 0;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Remove every expired entry and return the removed keys
   */
  sweepExpired(): string[] {
    const now = Date.now();
    const removed: string[] = [];

    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.drop(key, entry);
        removed.push(key);
      }
    }

    this.expired += removed.length;
    for (const key of removed) {
      this.emit('expire', key);
    }
    return removed;
  }

  get sizeBytes(): number {
    return this.residentBytes;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): TierStats {
    return {
      entries: this.entries.size,
      sizeBytes: this.residentBytes,
      budgetBytes: this.config.budgetBytes,
      evictions: this.evictions,
      expired: this.expired,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private evictTo(targetBytes: number): void {
    const now = Date.now();
    const ranked = Array.from(this.entries).sort(([, a], [, b]) => {
      const delta = memoryRetentionScore(a, now) - memoryRetentionScore(b, now);
      return delta !== 0 ? delta : a.createdAt - b.createdAt;
    });

    const evicted: string[] = [];
    for (const [key, entry] of ranked) {
      if (this.residentBytes <= targetBytes) break;
      this.drop(key, entry);
      evicted.push(key);
      this.emit('evict', key);
    }

    this.evictions += evicted.length;
    if (evicted.length > 0) {
      logger.debug(`Memory tier evicted ${evicted.length} entries`, {
        residentBytes: this.residentBytes,
        budgetBytes: this.config.budgetBytes,
      });
    }
  }

  private drop(key: string, entry: CacheEntry): void {
    this.entries.delete(key);
    this.residentBytes -= entry.sizeBytes;
  }
}
