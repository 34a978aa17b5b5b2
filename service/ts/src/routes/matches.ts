import type { Express } from 'express';

import type { TrackerStore } from '../store/index.js';
import { MatchLookupError } from '../store/index.js';
import { toMatchResponse } from './helpers/responders.js';
import { IdParamSchema } from './helpers/params.js';

export const registerMatchRoutes = (app: Express, deps: { store: TrackerStore }) => {
  const { store } = deps;

  app.get('/v1/matches/:id', async (req, res, next) => {
    const params = IdParamSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }

    try {
      const match = await store.getMatch(params.data.id);
      if (!match) throw new MatchLookupError(`Match not found: ${params.data.id}`);
      const games = await store.listGames(match.matchId);
      return res.send({ match: toMatchResponse(match, { games }) });
    } catch (err) {
      return next(err);
    }
  });
};
