import { CacheError } from './base-error.js';

/**
 * Content could not be decoded or canonicalized for hashing
 */
export class HashComputationError extends CacheError {
  public readonly byteLength: number;

  constructor(byteLength: number, options: { cause?: unknown } = {}) {
    super(
      'HASH_COMPUTATION_FAILED',
      byteLength === 0
        ? 'Cannot hash empty content'
        : `Cannot decode ${byteLength} bytes of content for hashing`,
      { ...options, context: { byteLength } }
    );
    this.name = 'HashComputationError';
    this.byteLength = byteLength;
  }
}

/**
 * A cached value could not be encoded or decoded
 */
export class SerializationError extends CacheError {
  public readonly direction: 'encode' | 'decode';
  public readonly key?: string;

  constructor(
    direction: 'encode' | 'decode',
    message: string,
    options: { cause?: unknown; key?: string } = {}
  ) {
    super('SERIALIZATION_FAILED', message, {
      cause: options.cause,
      context: { direction, key: options.key },
    });
    this.name = 'SerializationError';
    this.direction = direction;
    this.key = options.key;
  }
}

/**
 * Disk read, write or delete failed
 */
export class StorageIOError extends CacheError {
  public readonly filePath: string;
  public readonly operation: 'read' | 'write' | 'delete' | 'mkdir';

  constructor(
    operation: 'read' | 'write' | 'delete' | 'mkdir',
    filePath: string,
    options: { cause?: unknown } = {}
  ) {
    super('STORAGE_IO_FAILED', `Failed to ${operation} ${filePath}`, {
      cause: options.cause,
      context: { operation, filePath },
    });
    this.name = 'StorageIOError';
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * The persisted disk index is unreadable or structurally invalid
 */
export class CorruptIndexError extends CacheError {
  public readonly indexPath: string;

  constructor(indexPath: string, reason: string, options: { cause?: unknown } = {}) {
    super('CORRUPT_INDEX', `Disk cache index ${indexPath} is unusable: ${reason}`, {
      cause: options.cause,
      context: { indexPath, reason },
    });
    this.name = 'CorruptIndexError';
    this.indexPath = indexPath;
  }
}
