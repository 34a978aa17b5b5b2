import { setTimeout as sleep } from 'timers/promises';

import type { RowKind } from '../store/index.js';

export interface ReadinessOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  maxPollIntervalMs: number;
}

export interface WaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type RowProbe = (kind: RowKind, id: number) => Promise<boolean>;

export const DEFAULT_READINESS_OPTIONS: ReadinessOptions = {
  timeoutMs: 10_000,
  pollIntervalMs: 100,
  maxPollIntervalMs: 2_000,
};

interface ReadySignal {
  promise: Promise<void>;
  fire: () => void;
  waiters: number;
}

type WakeReason = 'ready' | 'tick' | 'aborted';

const createSignal = (): ReadySignal => {
  let fire: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    fire = resolve;
  });
  return { promise, fire, waiters: 0 };
};

const keyOf = (kind: RowKind, id: number) => `${kind}:${id}`;

/** Resolves on whichever comes first: the signal, the tick delay or the abort. */
const waitForWake = async (ready: Promise<void>, delayMs: number, signal?: AbortSignal): Promise<WakeReason> => {
  if (signal?.aborted) return 'aborted';
  const timer = new AbortController();
  const forwardAbort = () => timer.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    return await Promise.race([
      ready.then((): WakeReason => 'ready'),
      sleep(delayMs, undefined, { signal: timer.signal }).then(
        (): WakeReason => 'tick',
        (): WakeReason => (signal?.aborted ? 'aborted' : 'tick')
      ),
    ]);
  } finally {
    timer.abort();
    signal?.removeEventListener('abort', forwardAbort);
  }
};

/**
 * Tracks which events, matches and games are known to be durable, and lets
 * callers wait for one to become so.
 *
 * Rows committed through the owning writer fire a per-identity signal that is
 * created lazily on first wait. Rows committed elsewhere are picked up by a
 * store probe that backs off between checks.
 */
export class ReadinessRegistry {
  private readonly known: Record<RowKind, Set<number>> = {
    event: new Set(),
    match: new Set(),
    game: new Set(),
  };

  private readonly signals = new Map<string, ReadySignal>();

  constructor(
    private readonly probe: RowProbe,
    private readonly options: ReadinessOptions = DEFAULT_READINESS_OPTIONS
  ) {}

  isKnown(kind: RowKind, id: number): boolean {
    return this.known[kind].has(id);
  }

  markReady(kind: RowKind, id: number) {
    this.known[kind].add(id);
    const key = keyOf(kind, id);
    const signal = this.signals.get(key);
    if (signal) {
      this.signals.delete(key);
      signal.fire();
    }
  }

  /** Number of identities that currently have someone waiting on them. */
  pendingCount(): number {
    return this.signals.size;
  }

  /**
   * Resolves `true` once the row exists, `false` when the timeout elapses or
   * the signal aborts first. Never rejects.
   */
  async waitFor(kind: RowKind, id: number, options: WaitOptions = {}): Promise<boolean> {
    if (this.isKnown(kind, id)) return true;

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const deadline = Date.now() + timeoutMs;
    const key = keyOf(kind, id);
    let signal = this.signals.get(key);
    if (!signal) {
      signal = createSignal();
      this.signals.set(key, signal);
    }
    signal.waiters += 1;

    let interval = this.options.pollIntervalMs;
    try {
      for (;;) {
        if (options.signal?.aborted) return false;
        if (await this.probeSafely(kind, id)) {
          this.markReady(kind, id);
          return true;
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) return false;

        const reason = await waitForWake(signal.promise, Math.min(interval, remaining), options.signal);
        if (reason === 'ready') return true;
        if (reason === 'aborted') return false;
        interval = Math.min(interval * 2, this.options.maxPollIntervalMs);
      }
    } finally {
      signal.waiters -= 1;
      if (signal.waiters === 0 && this.signals.get(key) === signal) {
        this.signals.delete(key);
      }
    }
  }

  /** Forgets every known identity. Waiters already in flight keep waiting. */
  reset() {
    for (const set of Object.values(this.known)) set.clear();
  }

  private async probeSafely(kind: RowKind, id: number): Promise<boolean> {
    try {
      return await this.probe(kind, id);
    } catch (err) {
      console.warn('readiness_probe_error', {
        kind,
        id,
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
