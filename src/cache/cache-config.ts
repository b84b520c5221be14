/**
 * Cache Configuration
 *
 * Centralized configuration for the recognition cache tiers, hashing and
 * maintenance scheduling. Values are validated with Zod; environment
 * variables prefixed RECOGNITION_CACHE_ override the defaults.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { formatZodError } from '../utils/json-validator.js';

const MiB = 1024 * 1024;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const RecognitionCacheConfigSchema = z.object({
  /** Directory holding one file per disk entry plus index.json */
  cacheDir: z.string().min(1),

  /** Byte budget of the in-memory tier */
  memoryBudgetBytes: z.number().int().positive(),
  /** Byte budget of the on-disk tier */
  diskBudgetBytes: z.number().int().positive(),

  /** Base lifetime before the expiry policy adjusts it */
  defaultTtlMs: z.number().int().positive(),
  /** Lower bound applied by the confidence-scaled expiry policy */
  minTtlMs: z.number().int().nonnegative(),

  /** Serialized values above this size are gzip-compressed on disk */
  compressionThresholdBytes: z.number().int().nonnegative(),
  compressionLevel: z.number().int().min(1).max(9),

  /** Minimum perceptual similarity (1 - Hamming distance) for a near-duplicate hit */
  similarityThreshold: z.number().min(0).max(1),
  /** Eviction drains a tier to this fraction of its budget */
  evictionHysteresis: z.number().gt(0).max(1),
  /** Bound on the candidates compared per similarity-index insert */
  maxSimilarityCandidates: z.number().int().positive(),

  /** Interval of the expiry sweep */
  maintenanceIntervalMs: z.number().int().positive(),
  /** Run a similarity-index rebuild every N sweeps (0 disables) */
  indexRebuildEvery: z.number().int().nonnegative(),

  /** Edge length of the canonical raster used for content hashing */
  canonicalSize: z.number().int().min(8).max(4096),
  /** Entries kept in the hasher's memo cache */
  hashCacheEntries: z.number().int().positive(),

  /** Debounce before the disk index is rewritten */
  indexSaveDebounceMs: z.number().int().nonnegative(),
});

export type RecognitionCacheConfig = z.infer<typeof RecognitionCacheConfigSchema>;

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: RecognitionCacheConfig = {
  cacheDir: path.join(os.homedir(), '.recognition-cache'),
  memoryBudgetBytes: 50 * MiB,
  diskBudgetBytes: 100 * MiB,
  defaultTtlMs: 7 * DAY_MS,
  minTtlMs: DAY_MS,
  compressionThresholdBytes: MiB,
  compressionLevel: 6,
  similarityThreshold: 0.8,
  evictionHysteresis: 0.75,
  maxSimilarityCandidates: 200,
  maintenanceIntervalMs: HOUR_MS,
  indexRebuildEvery: 24,
  canonicalSize: 256,
  hashCacheEntries: 500,
  indexSaveDebounceMs: 1000,
};

/**
 * Environment variable → config key. All values are numeric except cacheDir.
 */
const ENV_OVERRIDES: Array<[string, keyof RecognitionCacheConfig]> = [
  ['RECOGNITION_CACHE_DIR', 'cacheDir'],
  ['RECOGNITION_CACHE_MEMORY_BUDGET', 'memoryBudgetBytes'],
  ['RECOGNITION_CACHE_DISK_BUDGET', 'diskBudgetBytes'],
  ['RECOGNITION_CACHE_TTL_MS', 'defaultTtlMs'],
  ['RECOGNITION_CACHE_COMPRESSION_THRESHOLD', 'compressionThresholdBytes'],
  ['RECOGNITION_CACHE_SIMILARITY_THRESHOLD', 'similarityThreshold'],
  ['RECOGNITION_CACHE_EVICTION_HYSTERESIS', 'evictionHysteresis'],
  ['RECOGNITION_CACHE_MAINTENANCE_INTERVAL_MS', 'maintenanceIntervalMs'],
];

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  for (const [name, key] of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    overrides[key] = key === 'cacheDir' ? raw : Number(raw);
  }

  return overrides;
}

/**
 * Resolve the effective configuration: defaults, then environment, then
 * explicit overrides. Throws when the result fails validation.
 */
export function getCacheConfig(
  overrides: Partial<RecognitionCacheConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): RecognitionCacheConfig {
  const merged = {
    ...DEFAULT_CACHE_CONFIG,
    ...readEnvOverrides(env),
    ...overrides,
  };

  const result = RecognitionCacheConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid recognition cache configuration: ${formatZodError(result.error)}`);
  }

  return result.data;
}
