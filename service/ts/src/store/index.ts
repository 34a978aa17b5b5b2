import { getDb } from '../db/client.js';
import type { TrackerStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';

export * from './types.js';

let store: TrackerStore | null = null;

export const getStore = (databaseUrl = process.env.DATABASE_URL): TrackerStore => {
  if (!store) {
    store = databaseUrl ? new PostgresStore(getDb(databaseUrl)) : new MemoryStore();
  }
  return store;
};
