type ErrorDetails = {
  path?: string;
  cause?: unknown;
};

function describeCause(cause: unknown): string | null {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  return null;
}

abstract class SliceStoreError extends Error {
  readonly path?: string;

  constructor(message: string, details: ErrorDetails = {}) {
    const causeMessage = describeCause(details.cause);
    super(causeMessage ? `${message}: ${causeMessage}` : message, { cause: details.cause });
    this.path = details.path;
  }
}

/** No source files were found for a series. Callers skip the series. */
export class DiscoveryError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'DiscoveryError';
  }
}

export class LoadError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'LoadError';
  }
}

export class WriteError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'WriteError';
  }
}

export class ReadError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'ReadError';
  }
}

export class IOError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'IOError';
  }
}

export class ParseError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'ParseError';
  }
}

export class ConfigError extends SliceStoreError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'ConfigError';
  }
}

/** A single tag could not be attached to a slice being written. */
export class TagAttachError extends SliceStoreError {
  readonly key: string;

  constructor(key: string, message: string, details?: ErrorDetails) {
    super(`Tag "${key}": ${message}`, details);
    this.name = 'TagAttachError';
    this.key = key;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

