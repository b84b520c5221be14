/**
 * Access Tracker
 *
 * Per-key access patterns: total accesses, hits, hit rate and hourly access
 * frequency. Disk eviction ranks entries by accessFrequency × hitRate.
 */

import type { AccessPattern, HitSource } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

export class AccessTracker {
  private patterns: Map<string, AccessPattern> = new Map();

  /**
   * Record one lookup of a key; `source` is where it hit, or 'none' on a miss
   */
  record(key: string, source: HitSource): AccessPattern {
    const now = Date.now();
    const pattern = this.patterns.get(key) ?? {
      key,
      createdAt: now,
      lastAccessedAt: now,
      totalAccesses: 0,
      hitCount: 0,
      hitRate: 0,
      accessFrequency: 0,
      lastHitTier: 'none',
    };

    pattern.totalAccesses++;
    pattern.lastAccessedAt = now;
    if (source !== 'none') {
      pattern.hitCount++;
      pattern.lastHitTier = source;
    }

    pattern.hitRate = pattern.hitCount / pattern.totalAccesses;
    const hoursSinceCreation = (now - pattern.createdAt) / HOUR_MS;
    pattern.accessFrequency = pattern.totalAccesses / Math.max(hoursSinceCreation, 1);

    this.patterns.set(key, pattern);
    return pattern;
  }

  get(key: string): AccessPattern | undefined {
    return this.patterns.get(key);
  }

  /**
   * Disk eviction score; keys never looked up score 0
   */
  score(key: string): number {
    const pattern = this.patterns.get(key);
    return pattern ? pattern.accessFrequency * pattern.hitRate : 0;
  }

  delete(key: string): boolean {
    return this.patterns.delete(key);
  }

  clear(): void {
    this.patterns.clear();
  }

  get size(): number {
    return this.patterns.size;
  }
}
