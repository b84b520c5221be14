/**
 * Concurrency Module
 *
 * Per-key serialization of async cache operations.
 */

export type { LaneTask } from './lanes.js';
export { KeyedLanes } from './lanes.js';
