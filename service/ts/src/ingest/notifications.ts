import { z } from 'zod';

import { GAME_LOG_TYPES, MAX_ROW_ID } from '../store/index.js';

export const NOTIFICATION_TYPES = [
  'event.created',
  'event.completed',
  'event.released',
  'match.created',
  'match.results',
  'match.sideboard',
  'game.created',
  'game.results',
  'game.log',
] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

const Timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const Id = z.number().int().nonnegative().max(MAX_ROW_ID);

const Outcome = z.enum(['WIN', 'LOSS', 'DRAW']);

const CardEntrySchema = z.object({
  catalogId: z.number().int(),
  name: z.string().min(1),
  quantity: z.number().int(),
});

const DeckSchema = z.object({
  hash: z.string().min(1),
  deckId: Id,
  name: z.string(),
  format: z.string().min(1),
  timestamp: Timestamp,
  mainboard: z.array(CardEntrySchema),
  sideboard: z.array(CardEntrySchema).default([]),
});

const GamePlayerResultSchema = z.object({
  player: z.string().min(1),
  result: Outcome,
  playDraw: z.enum(['PLAY', 'DRAW']).nullable().optional(),
  clockSeconds: z.number().nonnegative().nullable().optional(),
});

const MatchPlayerResultSchema = z.object({
  player: z.string().min(1),
  result: Outcome,
  gameResults: z.array(Outcome).default([]),
});

const EventCreated = z.object({
  type: z.literal('event.created'),
  event: z.object({
    id: Id,
    format: z.string().min(1),
    description: z.string(),
    startTime: Timestamp.optional(),
    completed: z.boolean().optional(),
    endTime: Timestamp.nullable().optional(),
    deck: DeckSchema.nullable().optional(),
  }),
});

const EventCompleted = z.object({
  type: z.literal('event.completed'),
  eventId: Id,
  endTime: Timestamp.nullable().optional(),
});

const EventReleased = z.object({
  type: z.literal('event.released'),
  eventId: Id,
});

const MatchCreated = z.object({
  type: z.literal('match.created'),
  match: z.object({ id: Id }),
  eventId: Id,
});

const MatchResults = z.object({
  type: z.literal('match.results'),
  matchId: Id,
  results: z.array(MatchPlayerResultSchema),
});

const MatchSideboard = z.object({
  type: z.literal('match.sideboard'),
  matchId: Id,
  gameId: Id,
  changes: z.array(CardEntrySchema),
});

const GameCreated = z.object({
  type: z.literal('game.created'),
  game: z.object({ id: Id }),
  matchId: Id,
});

const GameResults = z.object({
  type: z.literal('game.results'),
  gameId: Id,
  results: z.array(GamePlayerResultSchema),
});

const GameLog = z.object({
  type: z.literal('game.log'),
  entry: z.object({
    gameId: Id,
    timestamp: Timestamp,
    type: z.enum(GAME_LOG_TYPES),
    data: z.string(),
  }),
});

export const NotificationSchema = z.discriminatedUnion('type', [
  EventCreated,
  EventCompleted,
  EventReleased,
  MatchCreated,
  MatchResults,
  MatchSideboard,
  GameCreated,
  GameResults,
  GameLog,
]);

export const NotificationBatchSchema = z.union([
  z.object({ notifications: z.array(NotificationSchema).min(1).max(500) }),
  NotificationSchema.transform((notification) => ({ notifications: [notification] })),
]);

export type Notification = z.infer<typeof NotificationSchema>;

export interface NotificationIds {
  eventId?: number;
  matchId?: number;
  gameId?: number;
}

/** The identities a notification refers to, for logs and feed messages. */
export const notificationIds = (notification: Notification): NotificationIds => {
  switch (notification.type) {
    case 'event.created':
      return { eventId: notification.event.id };
    case 'event.completed':
    case 'event.released':
      return { eventId: notification.eventId };
    case 'match.created':
      return { eventId: notification.eventId, matchId: notification.match.id };
    case 'match.results':
      return { matchId: notification.matchId };
    case 'match.sideboard':
      return { matchId: notification.matchId, gameId: notification.gameId };
    case 'game.created':
      return { matchId: notification.matchId, gameId: notification.game.id };
    case 'game.results':
      return { gameId: notification.gameId };
    case 'game.log':
      return { gameId: notification.entry.gameId };
  }
};
