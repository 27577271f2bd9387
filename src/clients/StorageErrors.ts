import { appendCauseStack } from '../utils/errors';

/**
 * Custom error classes for storage backend operations
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
    appendCauseStack(this, cause);
  }
}

export class DeliveryError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'delivery', cause);
    this.name = 'DeliveryError';
  }
}

export class UploadError extends DeliveryError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'UploadError';
  }
}

export class StorageUnreachableError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'connect', cause);
    this.name = 'StorageUnreachableError';
  }
}

export class StorageListingError extends StorageError {
  constructor(message: string, cause?: Error) {
    super(message, 'listing', cause);
    this.name = 'StorageListingError';
  }
}

/**
 * A single item that could not be deleted; logged and counted, never fatal
 */
export class CleanupError extends StorageError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'cleanup', cause);
    this.name = 'CleanupError';
  }
}
