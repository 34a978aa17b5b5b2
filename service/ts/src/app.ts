import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import { createAuth } from './auth.js';
import type { AuthConfig } from './auth.js';
import { NotificationDispatcher } from './ingest/dispatcher.js';
import { LiveFeed } from './ingest/feed.js';
import { EventWriter } from './ingest/writer.js';
import type { EventWriterOptions } from './ingest/writer.js';
import type { TrackerStore } from './store/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerEventRoutes } from './routes/events.js';
import { registerDeckRoutes } from './routes/decks.js';
import { registerMatchRoutes } from './routes/matches.js';
import { registerGameRoutes } from './routes/games.js';
import { registerNotificationRoutes } from './routes/notifications.js';
import { registerLiveRoutes } from './routes/live.js';
import {
  DeckLookupError,
  EventLookupError,
  GameLookupError,
  InvalidCursorError,
  MatchLookupError,
  StoreConflictError,
} from './store/errors.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof DeckLookupError) {
    return { status: 404, body: { error: 'deck_not_found', message: err.message } };
  }

  if (err instanceof EventLookupError) {
    return { status: 404, body: { error: 'event_not_found', message: err.message } };
  }

  if (err instanceof MatchLookupError) {
    return { status: 404, body: { error: 'match_not_found', message: err.message } };
  }

  if (err instanceof GameLookupError) {
    return { status: 404, body: { error: 'game_not_found', message: err.message } };
  }

  if (err instanceof InvalidCursorError) {
    return { status: 400, body: { error: 'invalid_cursor', message: err.message } };
  }

  if (err instanceof StoreConflictError) {
    return { status: 409, body: { error: 'write_conflict', message: err.message } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export interface AppDeps {
  store: TrackerStore;
  auth: AuthConfig;
  writer?: EventWriter;
  writerOptions?: EventWriterOptions;
  feed?: LiveFeed;
  dispatcher?: NotificationDispatcher;
  streamPageSize?: number;
  /** Closes open live feed connections when aborted. */
  signal?: AbortSignal;
}

export interface AppContext {
  app: Express;
  writer: EventWriter;
  feed: LiveFeed;
  dispatcher: NotificationDispatcher;
}

export const createApp = (deps: AppDeps): AppContext => {
  const { store } = deps;
  const writer = deps.writer ?? new EventWriter(store, deps.writerOptions);
  const feed = deps.feed ?? new LiveFeed();
  const dispatcher = deps.dispatcher ?? new NotificationDispatcher(writer, { feed });
  const auth = createAuth(deps.auth);

  const app = express();
  app.use(express.json({ limit: '5mb' }));

  registerHealthRoutes(app, { store });
  registerNotificationRoutes(app, { dispatcher, auth });
  registerEventRoutes(app, { store, streamPageSize: deps.streamPageSize ?? 100 });
  registerDeckRoutes(app, { store });
  registerMatchRoutes(app, { store });
  registerGameRoutes(app, { store });
  registerLiveRoutes(app, { feed, signal: deps.signal });

  app.use(errorHandler);

  return { app, writer, feed, dispatcher };
};
