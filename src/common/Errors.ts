/**
 * Custom error types for the sort pipeline.
 */

export class SortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SortError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidConfigError extends SortError {
  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'InvalidConfigError';
  }
}

export class HeapCapacityError extends SortError {
  constructor(capacity: number) {
    super(`Heap capacity exceeded: ${capacity}`);
    this.name = 'HeapCapacityError';
  }
}
