import { once } from 'events';
import type { Response } from 'express';

import { SingleSlotLock } from './lock.js';

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

export interface DrainOptions {
  signal?: AbortSignal;
}

export interface SubscribeOptions<T, U = T> {
  /** Registers `deliver` with the source and returns the matching unsubscribe. */
  subscribe: (deliver: (item: T) => void) => () => void;
  /** Returning `undefined` skips the item. */
  map?: (item: T) => U | undefined;
  signal?: AbortSignal;
}

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/** Sends the streaming headers; every line written afterwards reaches the client as it is produced. */
export const openNdjsonStream = (res: Response) => {
  res.status(200);
  res.setHeader('Content-Type', NDJSON_CONTENT_TYPE);
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();
};

/**
 * Aborts when the client goes away before the response finished, or when
 * `parent` aborts first.
 */
export const responseAbortSignal = (res: Response, parent?: AbortSignal): AbortSignal => {
  const controller = new AbortController();
  const abort = () => controller.abort();

  if (parent?.aborted) controller.abort();
  else parent?.addEventListener('abort', abort, { once: true });

  res.once('close', () => {
    parent?.removeEventListener('abort', abort);
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
};

/**
 * Writes one item as a single line. When the socket buffer is full, waits for
 * it to drain before resolving. Resolves `false` once the stream can no longer
 * be written to.
 */
export const writeNdjsonLine = async <T>(res: Response, item: T, signal?: AbortSignal): Promise<boolean> => {
  if (signal?.aborted || res.destroyed || res.writableEnded) return false;

  if (!res.write(`${JSON.stringify(item)}\n`)) {
    try {
      await once(res, 'drain', { signal });
    } catch (err) {
      if (signal?.aborted) return false;
      throw err;
    }
  }
  return !res.destroyed;
};

const endResponse = (res: Response) => {
  if (!res.writableEnded && !res.destroyed) res.end();
};

/**
 * Drain mode: writes every item of `source`, then ends the response. Stops
 * early, without error, when the client disconnects.
 */
export const drainNdjson = async <T>(
  res: Response,
  source: Iterable<T> | AsyncIterable<T>,
  options: DrainOptions = {}
): Promise<number> => {
  const signal = responseAbortSignal(res, options.signal);
  openNdjsonStream(res);

  let written = 0;
  try {
    for await (const item of source) {
      if (!(await writeNdjsonLine(res, item, signal))) break;
      written += 1;
    }
  } catch (err) {
    // Headers are out, so the only signal left to the client is a cut connection.
    console.error('ndjson_drain_error', { written, message: describeError(err) });
    res.destroy(err instanceof Error ? err : new Error(describeError(err)));
    return written;
  }

  endResponse(res);
  return written;
};

/**
 * Subscribe mode: forwards items pushed by `subscribe` until the client
 * disconnects or `options.signal` aborts. Deliveries are written one at a
 * time. The unsubscribe runs exactly once, whichever way the stream ends.
 */
export const subscribeNdjson = <T, U = T>(res: Response, options: SubscribeOptions<T, U>): Promise<number> => {
  const signal = responseAbortSignal(res, options.signal);
  const lock = new SingleSlotLock();
  openNdjsonStream(res);

  let written = 0;
  let closed = false;
  let unsubscribe: (() => void) | undefined;

  const detach = () => {
    const release = unsubscribe;
    unsubscribe = undefined;
    if (!release) return;
    try {
      release();
    } catch (err) {
      console.warn('ndjson_unsubscribe_error', { message: describeError(err) });
    }
  };

  return new Promise<number>((resolve) => {
    const finish = () => {
      if (closed) return;
      closed = true;
      signal.removeEventListener('abort', finish);
      detach();
      // Let the write in flight settle before ending.
      void lock.runExclusive(() => {
        endResponse(res);
        resolve(written);
      });
    };

    const deliver = (item: T) => {
      if (closed) return;
      const value = options.map ? options.map(item) : item;
      if (value === undefined) return;

      void lock
        .runExclusive(async () => {
          if (closed) return;
          if (await writeNdjsonLine(res, value, signal)) written += 1;
          else finish();
        })
        .catch((err: unknown) => {
          console.error('ndjson_delivery_error', { message: describeError(err) });
          finish();
        });
    };

    if (signal.aborted) {
      finish();
      return;
    }
    signal.addEventListener('abort', finish, { once: true });

    try {
      unsubscribe = options.subscribe(deliver);
    } catch (err) {
      console.error('ndjson_subscribe_error', { message: describeError(err) });
      finish();
      return;
    }
    if (closed) detach();
  });
};
