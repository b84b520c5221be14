/**
 * recognition-cache
 *
 * Content-addressed, similarity-aware cache for image-recognition results.
 */

export * from './cache/index.js';
export * from './errors/index.js';
export { KeyedLanes, type LaneTask } from './concurrency/index.js';
export { Logger, logger, type LogLevel } from './utils/logger.js';
