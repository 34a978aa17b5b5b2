import type { Express } from 'express';
import { z } from 'zod';

import type { FeedMessage, LiveFeed } from '../ingest/feed.js';
import { NOTIFICATION_TYPES } from '../ingest/notifications.js';
import { subscribeNdjson } from '../streaming/ndjson.js';

const LiveQuerySchema = z.object({
  types: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(',').map((type) => type.trim()).filter(Boolean) : []))
    .pipe(z.array(z.enum(NOTIFICATION_TYPES))),
});

interface LiveRouteDeps {
  feed: LiveFeed;
  /** Aborts every open feed connection, e.g. on shutdown. */
  signal?: AbortSignal;
}

const toFeedResponse = (message: FeedMessage) => ({
  type: message.type,
  accepted: message.accepted,
  ...(message.created !== undefined ? { created: message.created } : {}),
  ...(message.eventId !== undefined ? { event_id: message.eventId } : {}),
  ...(message.matchId !== undefined ? { match_id: message.matchId } : {}),
  ...(message.gameId !== undefined ? { game_id: message.gameId } : {}),
  at: message.at,
});

export const registerLiveRoutes = (app: Express, deps: LiveRouteDeps) => {
  const { feed, signal } = deps;

  app.get('/v1/live', async (req, res) => {
    const parsed = LiveQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const types = new Set<string>(parsed.data.types);
    const delivered = await subscribeNdjson(res, {
      subscribe: (deliver) => feed.subscribe(deliver),
      map: (message: FeedMessage) => (types.size && !types.has(message.type) ? undefined : toFeedResponse(message)),
      signal,
    });
    console.info('live_feed_closed', { delivered });
  });
};
