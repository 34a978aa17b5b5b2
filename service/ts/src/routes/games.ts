import type { Express } from 'express';
import { z } from 'zod';

import type { TrackerStore } from '../store/index.js';
import { GameLookupError } from '../store/index.js';
import { drainNdjson } from '../streaming/ndjson.js';
import { toGameLogResponse, toGameResponse } from './helpers/responders.js';
import { IdParamSchema, StreamFlag } from './helpers/params.js';

const GameLogQuerySchema = z.object({ stream: StreamFlag });

export const registerGameRoutes = (app: Express, deps: { store: TrackerStore }) => {
  const { store } = deps;

  app.get('/v1/games/:id', async (req, res, next) => {
    const params = IdParamSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }

    try {
      const game = await store.getGame(params.data.id);
      if (!game) throw new GameLookupError(`Game not found: ${params.data.id}`);
      return res.send({ game: toGameResponse(game) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/games/:id/logs', async (req, res, next) => {
    const params = IdParamSchema.safeParse(req.params);
    const query = GameLogQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const gameId = params.data.id;
      if (!(await store.getGame(gameId))) throw new GameLookupError(`Game not found: ${gameId}`);

      const logs = (await store.listGameLogs(gameId)).map(toGameLogResponse);
      if (query.data.stream) {
        await drainNdjson(res, logs);
        return;
      }
      return res.send({ logs });
    } catch (err) {
      return next(err);
    }
  });
};
