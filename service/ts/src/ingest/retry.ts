import { setTimeout as sleep } from 'timers/promises';

import type { StoreTransaction, TrackerStore } from '../store/index.js';
import { StoreConflictError } from '../store/index.js';

export type WriteAttempt<T> =
  | { status: 'ok'; value: T; attempts: number }
  | { status: 'conflict'; error: StoreConflictError; attempts: number };

export interface ConflictRetryPolicy {
  /** Extra attempts after the first conflict. */
  retries: number;
  backoffMs: number;
}

export const DEFAULT_CONFLICT_RETRY_POLICY: ConflictRetryPolicy = {
  retries: 1,
  backoffMs: 10,
};

/**
 * Runs `work` in its own transaction. A lost commit race comes back as a
 * `conflict` result; every other error propagates.
 */
export const attemptTransaction = async <T>(
  store: TrackerStore,
  work: (tx: StoreTransaction) => Promise<T>,
  attempts = 1
): Promise<WriteAttempt<T>> => {
  try {
    return { status: 'ok', value: await store.transaction(work), attempts };
  } catch (err) {
    if (err instanceof StoreConflictError) {
      return { status: 'conflict', error: err, attempts };
    }
    throw err;
  }
};

/**
 * Re-runs the whole unit of work after a conflict, up to `policy.retries`
 * times. The work re-reads before it writes, so a retry observes whatever the
 * winning writer committed.
 */
export const runWithConflictRetry = async <T>(
  store: TrackerStore,
  work: (tx: StoreTransaction) => Promise<T>,
  policy: ConflictRetryPolicy = DEFAULT_CONFLICT_RETRY_POLICY,
  onConflict?: (error: StoreConflictError, attempt: number) => void
): Promise<WriteAttempt<T>> => {
  let outcome = await attemptTransaction(store, work, 1);
  for (let retry = 1; outcome.status === 'conflict' && retry <= policy.retries; retry += 1) {
    onConflict?.(outcome.error, outcome.attempts);
    if (policy.backoffMs > 0) await sleep(policy.backoffMs * retry);
    outcome = await attemptTransaction(store, work, retry + 1);
  }
  return outcome;
};
