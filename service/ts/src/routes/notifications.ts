import type { Express } from 'express';

import { INGEST_SCOPE } from '../auth.js';
import type { AuthGuards } from '../auth.js';
import type { DispatchOutcome, NotificationDispatcher } from '../ingest/dispatcher.js';
import { NotificationBatchSchema } from '../ingest/notifications.js';

interface NotificationRouteDeps {
  dispatcher: NotificationDispatcher;
  auth: AuthGuards;
}

const toOutcomeResponse = (outcome: DispatchOutcome) => ({
  type: outcome.type,
  accepted: outcome.accepted,
  ...(outcome.created !== undefined ? { created: outcome.created } : {}),
  ...(outcome.eventId !== undefined ? { event_id: outcome.eventId } : {}),
  ...(outcome.matchId !== undefined ? { match_id: outcome.matchId } : {}),
  ...(outcome.gameId !== undefined ? { game_id: outcome.gameId } : {}),
  ...(outcome.error ? { error: outcome.error } : {}),
});

export const registerNotificationRoutes = (app: Express, deps: NotificationRouteDeps) => {
  const { dispatcher, auth } = deps;

  app.post('/v1/notifications', auth.requireAuth, auth.requireScope(INGEST_SCOPE), async (req, res) => {
    const parsed = NotificationBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const outcomes = await dispatcher.dispatchAll(parsed.data.notifications);
      return res.status(202).send({
        accepted: outcomes.filter((outcome) => outcome.accepted).length,
        outcomes: outcomes.map(toOutcomeResponse),
      });
    } catch (err) {
      console.error('notifications_dispatch_error', err);
      return res.status(500).send({ error: 'internal_error' });
    }
  });
};
