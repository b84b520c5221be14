/**
 * Errors Module
 */

export { CacheError, getErrorMessage } from './base-error.js';
export {
  HashComputationError,
  SerializationError,
  StorageIOError,
  CorruptIndexError,
} from './cache-error.js';
