import type { Express } from 'express';

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/** Serves `app` on an ephemeral loopback port. */
export const listen = (app: Express) =>
  new Promise<RunningServer>((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('server has no TCP address'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });

interface LineReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock(): void;
}

/** Reads a streamed body line by line; `next()` resolves `null` at the end. */
export const lineReader = (body: { getReader(): LineReader } | null) => {
  if (!body) throw new Error('response has no body');
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const ready: string[] = [];
  let buffer = '';

  const next = async (): Promise<string | null> => {
    while (!ready.length) {
      const { done, value } = await reader.read();
      if (done) return null;
      buffer += decoder.decode(value, { stream: true });
      const parts = buffer.split('\n');
      buffer = parts.pop() ?? '';
      ready.push(...parts.filter(Boolean));
    }
    return ready.shift() ?? null;
  };

  return { next };
};

export const waitUntil = async (condition: () => boolean, timeoutMs = 1_000) => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
};
