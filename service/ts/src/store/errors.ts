export class DeckLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeckLookupError';
  }
}

export class EventLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventLookupError';
  }
}

export class MatchLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatchLookupError';
  }
}

export class GameLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GameLookupError';
  }
}

/**
 * A commit lost a race with a concurrent writer (duplicate key or
 * serialization failure). The transaction was rolled back and may be retried.
 */
export class StoreConflictError extends Error {
  constructor(
    message: string,
    public readonly context: { table?: string; key?: string } = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreConflictError';
  }
}

export class InvalidCursorError extends Error {
  constructor(cursor: string) {
    super(`Invalid cursor: ${cursor}`);
    this.name = 'InvalidCursorError';
  }
}
