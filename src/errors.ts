/**
 * Error types shared across the service
 */

/**
 * Error thrown when a request or record fails validation
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when an event cannot be persisted
 */
export class StoreWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreWriteError';
  }
}

/**
 * Error thrown when the analytics store exists but cannot be decoded
 */
export class StoreCorruptError extends Error {
  location?: string;

  constructor(message: string, location?: string) {
    super(location ? `${message} (${location})` : message);
    this.name = 'StoreCorruptError';
    this.location = location;
  }
}

/**
 * Error thrown when the language model call fails or answers nothing usable
 */
export class LlmError extends Error {
  code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'LlmError';
    this.code = code;
  }
}

export class SearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SearchError';
  }
}

export class CatalogEmptyError extends Error {
  constructor(message = 'No jokes available in the collection') {
    super(message);
    this.name = 'CatalogEmptyError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
