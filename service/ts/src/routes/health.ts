import type { Express } from 'express';

import type { TrackerStore } from '../store/index.js';

export const registerHealthRoutes = (app: Express, deps: { store: TrackerStore }) => {
  app.get('/health', async (_req, res) => {
    try {
      await deps.store.listEventFormats();
      return res.status(200).send({ ok: true });
    } catch (err) {
      console.error('health_check_error', err);
      return res.status(503).send({ ok: false, error: 'store_unavailable' });
    }
  });
};
