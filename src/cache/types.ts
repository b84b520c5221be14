/**
 * Shared cache types
 */

// ============================================================================
// Hashes
// ============================================================================

/** 64-char lowercase hex SHA-256 of the canonical raster */
export type ContentHash = string;

/** 63-character string of '0' / '1' */
export type PerceptualHash = string;

export interface ContentHashes {
  contentHash: ContentHash;
  /** null when the content could not be decoded */
  perceptualHash: PerceptualHash | null;
  /** true when contentHash is a random stand-in that must never be cached */
  fallback: boolean;
}

// ============================================================================
// Entries
// ============================================================================

/**
 * A cached value as held by one tier. Tiers never share entries; promotion
 * copies the payload.
 */
export interface CacheEntry {
  /** Serialized value */
  data: Buffer;
  createdAt: number;
  expiresAt: number;
  accessCount: number;
  lastAccessedAt: number;
  sizeBytes: number;
  compressed: boolean;
}

export type TierName = 'memory' | 'disk';

export type MatchKind = 'exact' | 'similar';

export type HitSource = TierName | 'similarity' | 'none';

/**
 * Per-key access counters used by disk eviction scoring
 */
export interface AccessPattern {
  key: string;
  createdAt: number;
  lastAccessedAt: number;
  totalAccesses: number;
  hitCount: number;
  hitRate: number;
  /** Accesses per hour since creation, with the elapsed time floored at one hour */
  accessFrequency: number;
  lastHitTier: HitSource;
}

// ============================================================================
// Values
// ============================================================================

/**
 * Minimum shape of a cacheable recognition outcome. Additional fields are
 * carried through untouched.
 */
export interface RecognitionResult {
  confidence: number;
  /** Set on values served from a near-duplicate; the hash the value came from */
  matchedFrom?: ContentHash;
  [field: string]: unknown;
}

export interface CacheLookup<T extends RecognitionResult> {
  value: T;
  matchKind: MatchKind;
  contentHash: ContentHash;
  /** Tier the value (or its near-duplicate source) was read from */
  tier: TierName;
  /** Present on similar hits */
  similarity?: number;
  /** Present on similar hits */
  sourceHash?: ContentHash;
}

export interface SetOptions {
  /** Explicit lifetime; bypasses the expiry policy */
  ttlMs?: number;
}

// ============================================================================
// Statistics
// ============================================================================

export interface TierStats {
  entries: number;
  sizeBytes: number;
  budgetBytes: number;
  evictions: number;
  expired: number;
}

export interface DiskTierStats extends TierStats {
  compressedEntries: number;
  /** Stored bytes over original bytes; 1 when nothing is stored */
  compressionRatio: number;
}

export interface CacheStatistics {
  hits: {
    memory: number;
    disk: number;
    exact: number;
    similar: number;
    total: number;
  };
  misses: number;
  hitRate: number;
  promotions: number;
  memory: TierStats;
  disk: DiskTierStats;
  similarityIndex: {
    nodes: number;
    edges: number;
  };
  hasher: {
    cachedHashes: number;
  };
  pendingDiskWrites: number;
  totalEntries: number;
  totalSizeBytes: number;
}
