/**
 * Cache Module
 *
 * Tiered cache for image-recognition results:
 * - content and perceptual hashing of image bytes
 * - memory tier with frequency-weighted recency eviction
 * - disk tier with compression and a persisted index
 * - similarity index for near-duplicate hits
 *
 * Usage:
 * ```typescript
 * import { createRecognitionCache } from 'recognition-cache';
 *
 * const cache = createRecognitionCache();
 * await cache.set(image, { confidence: 0.9, label: 'dog' });
 * const lookup = await cache.get(image);
 * ```
 */

export {
  RecognitionCache,
  RecognitionResultSchema,
  createRecognitionCache,
  formatBytes,
  type BatchItem,
  type RecognitionCacheOptions,
  type ResultSchema,
  type SimilarSearchOptions,
  type SweepResult,
} from './recognition-cache.js';

export {
  ImageHasher,
  FALLBACK_HASH_PREFIX,
  PERCEPTUAL_HASH_BITS,
  hammingDistance,
  similarity,
  isFallbackHash,
  type ImageHasherConfig,
} from './image-hasher.js';

export {
  SimilarityIndex,
  type SimilarityIndexConfig,
  type SimilarityEdge,
  type SimilarMatch,
  type RebuildResult,
} from './similarity-index.js';

export { MemoryTier, memoryRetentionScore, type MemoryTierConfig } from './memory-tier.js';

export {
  DiskTier,
  INDEX_FILE_NAME,
  ENTRY_FILE_SUFFIX,
  type DiskTierConfig,
  type DiskIndexEntry,
  type DiskWrite,
} from './disk-tier.js';

export { AccessTracker } from './access-tracker.js';

export { confidenceScaledTtl, fixedTtl, type ExpiryPolicy } from './expiry-policy.js';

export {
  RecognitionCacheConfigSchema,
  DEFAULT_CACHE_CONFIG,
  getCacheConfig,
  type RecognitionCacheConfig,
} from './cache-config.js';

export type * from './types.js';
