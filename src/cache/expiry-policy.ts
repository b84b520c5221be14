/**
 * Expiry Policies
 *
 * Decide how long a recognition result stays cached. The default ties the
 * lifetime to the result's confidence: weak recognitions are recomputed
 * sooner.
 */

import type { RecognitionResult } from './types.js';

export type ExpiryPolicy<T extends RecognitionResult = RecognitionResult> = (
  value: T,
  baseTtlMs: number
) => number;

/**
 * Scale the base TTL by confidence (clamped to [0, 1]), never below `minTtlMs`
 */
export function confidenceScaledTtl(minTtlMs: number): ExpiryPolicy {
  return (value, baseTtlMs) => {
    const confidence = Number.isFinite(value.confidence)
      ? Math.min(Math.max(value.confidence, 0), 1)
      : 0;
    return Math.max(Math.round(baseTtlMs * confidence), minTtlMs);
  };
}

/**
 * Every entry lives for the base TTL
 */
export const fixedTtl: ExpiryPolicy = (_value, baseTtlMs) => baseTtlMs;
