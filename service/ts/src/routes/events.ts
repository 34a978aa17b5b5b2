import type { Express } from 'express';
import { z } from 'zod';

import type { EventListQuery, TrackerStore } from '../store/index.js';
import { EventLookupError } from '../store/index.js';
import { parseEventCursor } from '../store/util/cursors.js';
import { MAX_PAGE_SIZE } from '../store/util/pagination.js';
import { drainNdjson } from '../streaming/ndjson.js';
import { toEventResponse } from './helpers/responders.js';
import { IdParamSchema, StreamFlag } from './helpers/params.js';

const EventListQuerySchema = z.object({
  format: z.string().min(1).optional(),
  cursor: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  stream: StreamFlag,
});

interface EventRouteDeps {
  store: TrackerStore;
  streamPageSize: number;
}

/** Every event matching `query`, fetched a page at a time. */
async function* eachEvent(store: TrackerStore, query: EventListQuery, pageSize: number) {
  let cursor = query.cursor;
  do {
    const page = await store.listEvents({ format: query.format, cursor, limit: pageSize });
    for (const event of page.items) yield toEventResponse(event);
    cursor = page.nextCursor;
  } while (cursor);
}

export const registerEventRoutes = (app: Express, deps: EventRouteDeps) => {
  const { store, streamPageSize } = deps;

  app.get('/v1/events', async (req, res, next) => {
    const parsed = EventListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { format, cursor, limit, stream } = parsed.data;
    if (cursor && !parseEventCursor(cursor)) {
      return res.status(400).send({ error: 'invalid_cursor', message: `Invalid cursor: ${cursor}` });
    }

    try {
      if (stream) {
        await drainNdjson(res, eachEvent(store, { format, cursor }, streamPageSize));
        return;
      }

      const result = await store.listEvents({ format, cursor, limit });
      return res.send({
        events: result.items.map((event) => toEventResponse(event)),
        ...(result.nextCursor ? { next_cursor: result.nextCursor } : {}),
      });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/events/formats', async (_req, res, next) => {
    try {
      const formats = await store.listEventFormats();
      return res.send({ formats });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/events/:id', async (req, res, next) => {
    const params = IdParamSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }

    try {
      const event = await store.getEvent(params.data.id);
      if (!event) throw new EventLookupError(`Event not found: ${params.data.id}`);

      const [deck, matches] = await Promise.all([
        event.deckHash ? store.getDeck(event.deckHash) : Promise.resolve(null),
        store.listMatches(event.eventId),
      ]);
      return res.send({ event: toEventResponse(event, { deck, matches }) });
    } catch (err) {
      return next(err);
    }
  });
};
