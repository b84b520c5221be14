/**
 * Image Hasher
 *
 * Computes the two keys the recognition cache works with:
 * - a content hash (SHA-256 of a canonical raster) for exact matches
 * - a 63-bit DCT perceptual hash for near-duplicate matches
 *
 * Decoding and resampling run on sharp's libuv thread pool, so hashing never
 * blocks the event loop for long. Results are memoized by a cheap structural
 * fingerprint, and concurrent requests for the same image share a single
 * computation.
 */

import * as crypto from 'crypto';
import sharp from 'sharp';
import { HashComputationError } from '../errors/index.js';
import { LRUCache } from '../utils/lru-cache.js';
import { logger } from '../utils/logger.js';
import type { ContentHash, ContentHashes, PerceptualHash } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Side of the grid the perceptual hash is computed on */
const PHASH_GRID = 32;
/** Side of the retained low-frequency DCT block */
const PHASH_BLOCK = 8;
/** Bits in a perceptual hash: the block minus its DC term */
export const PERCEPTUAL_HASH_BITS = PHASH_BLOCK * PHASH_BLOCK - 1;

/**
 * Coefficients closer than this to the block mean carry no structure
 * (flat regions, resampling noise). Their bits come from the luminance band.
 */
const FLAT_EPSILON = 1.0;
/** Period, in 0-255 luminance units, of the band code used for flat bits */
const BAND_PERIOD = 128;

export const FALLBACK_HASH_PREFIX = 'unhashable-';

export interface ImageHasherConfig {
  /** Edge of the canonical raster used for content hashing */
  canonicalSize: number;
  /** Memoized hash results kept */
  hashCacheEntries: number;
}

const DEFAULT_HASHER_CONFIG: ImageHasherConfig = {
  canonicalSize: 256,
  hashCacheEntries: 500,
};

// ============================================================================
// DCT
// ============================================================================

/**
 * Orthonormal DCT-II basis rows for the retained frequencies:
 * BASIS[k][n] = alpha(k) * cos(pi * (2n + 1) * k / 2N)
 */
const BASIS: number[][] = Array.from({ length: PHASH_BLOCK }, (_, k) => {
  const alpha = k === 0 ? Math.sqrt(1 / PHASH_GRID) : Math.sqrt(2 / PHASH_GRID);
  return Array.from({ length: PHASH_GRID }, (_, n) =>
    alpha * Math.cos((Math.PI * (2 * n + 1) * k) / (2 * PHASH_GRID))
  );
});

/**
 * 2-D DCT of a PHASH_GRID x PHASH_GRID row-major matrix, low-frequency block
 * only. Returned row-major, PHASH_BLOCK x PHASH_BLOCK.
 */
function lowFrequencyDct(pixels: Float64Array): Float64Array {
  // Rows first: rowPass[y][v] = sum_x BASIS[v][x] * f[y][x]
  const rowPass = new Float64Array(PHASH_GRID * PHASH_BLOCK);
  for (let y = 0; y < PHASH_GRID; y++) {
    for (let v = 0; v < PHASH_BLOCK; v++) {
      let sum = 0;
      for (let x = 0; x < PHASH_GRID; x++) {
        sum += BASIS[v][x] * pixels[y * PHASH_GRID + x];
      }
      rowPass[y * PHASH_BLOCK + v] = sum;
    }
  }

  const block = new Float64Array(PHASH_BLOCK * PHASH_BLOCK);
  for (let u = 0; u < PHASH_BLOCK; u++) {
    for (let v = 0; v < PHASH_BLOCK; v++) {
      let sum = 0;
      for (let y = 0; y < PHASH_GRID; y++) {
        sum += BASIS[u][y] * rowPass[y * PHASH_BLOCK + v];
      }
      block[u * PHASH_BLOCK + v] = sum;
    }
  }

  return block;
}

/**
 * Bit of a square wave over luminance, phase-shifted per bit position.
 * Nearby luminances agree on almost every position; distant ones disagree
 * on a share of positions proportional to the gap.
 */
function bandBit(position: number, luminance: number): '0' | '1' {
  const offset = (position * BAND_PERIOD) / PERCEPTUAL_HASH_BITS;
  return Math.floor((luminance + offset) / (BAND_PERIOD / 2)) % 2 === 1 ? '1' : '0';
}

// ============================================================================
// Public helpers
// ============================================================================

function countDifferences(a: PerceptualHash, b: PerceptualHash): number {
  let differences = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      differences++;
    }
  }
  return differences;
}

function comparable(a: PerceptualHash, b: PerceptualHash): boolean {
  return a.length === b.length && a.length > 0;
}

/**
 * Fraction of differing positions between two perceptual hashes.
 * Hashes of different length are not comparable and get the maximum
 * distance of 1.
 */
export function hammingDistance(a: PerceptualHash, b: PerceptualHash): number {
  return comparable(a, b) ? countDifferences(a, b) / a.length : 1;
}

/**
 * Fraction of matching positions; 0 for incomparable hashes
 */
export function similarity(a: PerceptualHash, b: PerceptualHash): number {
  return comparable(a, b) ? (a.length - countDifferences(a, b)) / a.length : 0;
}

export function isFallbackHash(hash: ContentHash): boolean {
  return hash.startsWith(FALLBACK_HASH_PREFIX);
}

// ============================================================================
// Image Hasher
// ============================================================================

export class ImageHasher {
  private config: ImageHasherConfig;
  private memo: LRUCache<ContentHashes>;
  private inFlight: Map<string, Promise<ContentHashes>> = new Map();
  private fallbacks = 0;

  constructor(config: Partial<ImageHasherConfig> = {}) {
    this.config = { ...DEFAULT_HASHER_CONFIG, ...config };
    this.memo = new LRUCache<ContentHashes>({ maxSize: this.config.hashCacheEntries });
  }

  /**
   * Compute both hashes for an encoded image. Never rejects: undecodable
   * content yields a random fallback key flagged `fallback: true`.
   */
  async hashContent(bytes: Buffer): Promise<ContentHashes> {
    if (bytes.length === 0) {
      return this.fallback(new HashComputationError(0));
    }

    let fingerprint: string;
    try {
      fingerprint = await this.fingerprint(bytes);
    } catch (error) {
      return this.fallback(new HashComputationError(bytes.length, { cause: error }));
    }

    const memoized = this.memo.get(fingerprint);
    if (memoized) {
      return memoized;
    }

    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      return pending;
    }

    const computation = this.compute(bytes)
      .then((hashes) => {
        this.memo.set(fingerprint, hashes);
        return hashes;
      })
      .catch((error: unknown) => this.fallback(new HashComputationError(bytes.length, { cause: error })))
      .finally(() => {
        this.inFlight.delete(fingerprint);
      });

    this.inFlight.set(fingerprint, computation);
    return computation;
  }

  async contentHash(bytes: Buffer): Promise<ContentHash> {
    return (await this.hashContent(bytes)).contentHash;
  }

  /**
   * Perceptual hash, or an empty string for undecodable content (which is
   * at maximum distance from every real hash)
   */
  async perceptualHash(bytes: Buffer): Promise<PerceptualHash> {
    return (await this.hashContent(bytes)).perceptualHash ?? '';
  }

  /**
   * Perceptual distance between two encoded images
   */
  async distance(a: Buffer, b: Buffer): Promise<number> {
    const [ha, hb] = await Promise.all([this.perceptualHash(a), this.perceptualHash(b)]);
    return hammingDistance(ha, hb);
  }

  clearCache(): void {
    this.memo.clear();
  }

  getCacheStatistics(): { cachedHashes: number; fallbacks: number; memoryUsage: number } {
    // fingerprint (~100 chars) + 64-char hash + 63-char phash per entry
    return {
      cachedHashes: this.memo.size,
      fallbacks: this.fallbacks,
      memoryUsage: this.memo.size * 256,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Cheap identity of an encoded image: header metadata plus a fast digest of
   * the encoded bytes. Two different images of equal size never share one.
   */
  private async fingerprint(bytes: Buffer): Promise<string> {
    const meta = await sharp(bytes).metadata();
    if (!meta.width || !meta.height) {
      throw new Error('Image has no dimensions');
    }

    const digest = crypto.createHash('md5').update(bytes).digest('hex');
    return `${meta.width}x${meta.height}@${meta.density ?? 72}_${meta.orientation ?? 1}:${bytes.length}:${digest}`;
  }

  private async compute(bytes: Buffer): Promise<ContentHashes> {
    const [contentHash, perceptualHash] = await Promise.all([
      this.computeContentHash(bytes),
      this.computePerceptualHash(bytes),
    ]);

    return { contentHash, perceptualHash, fallback: false };
  }

  /**
   * SHA-256 over a canonical raster: EXIF orientation applied, fixed size,
   * sRGB, no alpha. Two encodings of the same picture hash identically.
   */
  private async computeContentHash(bytes: Buffer): Promise<ContentHash> {
    const size = this.config.canonicalSize;
    const { data, info } = await sharp(bytes)
      .rotate()
      .resize(size, size, { fit: 'fill' })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    return crypto
      .createHash('sha256')
      .update(`${info.width}x${info.height}x${info.channels}:`)
      .update(data)
      .digest('hex');
  }

  private async computePerceptualHash(bytes: Buffer): Promise<PerceptualHash> {
    const { data, info } = await sharp(bytes)
      .rotate()
      .resize(PHASH_GRID, PHASH_GRID, { fit: 'fill' })
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    const luminance = new Float64Array(PHASH_GRID * PHASH_GRID);
    let total = 0;
    for (let i = 0; i < luminance.length; i++) {
      const offset = i * info.channels;
      const value = info.channels >= 3
        ? 0.299 * data[offset] + 0.587 * data[offset + 1] + 0.114 * data[offset + 2]
        : data[offset];
      luminance[i] = value;
      total += value;
    }
    const meanLuminance = total / luminance.length;

    const block = lowFrequencyDct(luminance);

    // Mean of the AC terms; index 0 is DC
    let acSum = 0;
    for (let i = 1; i < block.length; i++) {
      acSum += block[i];
    }
    const acMean = acSum / PERCEPTUAL_HASH_BITS;

    let hash = '';
    for (let i = 1; i < block.length; i++) {
      const delta = block[i] - acMean;
      if (Math.abs(delta) < FLAT_EPSILON) {
        hash += bandBit(i - 1, meanLuminance);
      } else {
        hash += delta > 0 ? '1' : '0';
      }
    }

    return hash;
  }

  private fallback(error: HashComputationError): ContentHashes {
    this.fallbacks++;
    logger.debug('Image hashing failed, using fallback key', error.logContext());

    return {
      contentHash: `${FALLBACK_HASH_PREFIX}${crypto.randomUUID()}`,
      perceptualHash: null,
      fallback: true,
    };
  }
}
