import type { Express } from 'express';
import { z } from 'zod';

import type { TrackerStore } from '../store/index.js';
import { DeckLookupError } from '../store/index.js';
import { toDeckIdentifierResponse, toDeckResponse, toDeckSummaryResponse } from './helpers/responders.js';

const DeckParamSchema = z.object({
  hash: z.string().min(1).max(128),
});

type DeckSummaryResponse = ReturnType<typeof toDeckSummaryResponse>;

export const registerDeckRoutes = (app: Express, deps: { store: TrackerStore }) => {
  const { store } = deps;

  // Grouped by format; each group, like the key order, runs newest first.
  app.get('/v1/decks', async (_req, res, next) => {
    try {
      const grouped: Record<string, DeckSummaryResponse[]> = {};
      for (const deck of await store.listDecks()) {
        const group = grouped[deck.format] ?? [];
        group.push(toDeckSummaryResponse(deck));
        grouped[deck.format] = group;
      }
      return res.send({ decks: grouped });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/decks/identifiers', async (_req, res, next) => {
    try {
      const decks = await store.listDecks();
      return res.send({ decks: decks.map(toDeckIdentifierResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/decks/:hash', async (req, res, next) => {
    const params = DeckParamSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }

    try {
      const deck = await store.getDeck(params.data.hash);
      if (!deck) throw new DeckLookupError(`Deck not found: ${params.data.hash}`);
      return res.send({ deck: toDeckResponse(deck) });
    } catch (err) {
      return next(err);
    }
  });
};
