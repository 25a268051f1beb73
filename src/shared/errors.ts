export class FeedmarkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FeedmarkError';
  }
}

export class ConfigError extends FeedmarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends FeedmarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * Why a document could not be turned into a channel.
 */
export type FeedParseErrorKind = 'UnknownFormat' | 'MalformedDocument' | 'MissingTitle' | 'MissingLink';

export class FeedParseError extends FeedmarkError {
  constructor(
    public readonly kind: FeedParseErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FEED_PARSE_ERROR', { kind, ...details });
    this.name = 'FeedParseError';
  }
}

export class TransportError extends FeedmarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
    this.name = 'TransportError';
  }
}

export class SubscriptionError extends FeedmarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SUBSCRIPTION_ERROR', details);
    this.name = 'SubscriptionError';
  }
}

export class StorageConsistencyError extends FeedmarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_CONSISTENCY_ERROR', details);
    this.name = 'StorageConsistencyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
