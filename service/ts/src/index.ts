import dotenv from 'dotenv';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { getStore } from './store/index.js';

dotenv.config();

const config = loadConfig();
const shutdown = new AbortController();

const { app, dispatcher } = createApp({
  store: getStore(config.databaseUrl ?? undefined),
  auth: config.auth,
  writerOptions: {
    readiness: config.parentWait,
    conflictRetry: { retries: config.writeConflictRetries },
  },
  streamPageSize: config.streamPageSize,
  signal: shutdown.signal,
});

export { app };

if (config.env !== 'test') {
  if (!config.databaseUrl) console.warn('store_memory_fallback', { reason: 'DATABASE_URL not set' });
  if (config.auth.disabled) console.warn('auth_disabled', {});

  const server = app.listen(config.port, () => console.log(`Playlog listening on :${config.port}`));

  const stop = (signal: NodeJS.Signals) => {
    console.info('shutdown_requested', { signal });
    shutdown.abort();
    server.close();
    void dispatcher
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('shutdown_error', err);
        process.exit(1);
      });
  };

  process.once('SIGTERM', stop);
  process.once('SIGINT', stop);
}
