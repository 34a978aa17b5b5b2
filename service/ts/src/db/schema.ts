import { pgTable, text, timestamp, integer, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';

import type {
  CardEntry,
  GamePlayerResult,
  MatchPlayerResult,
  SideboardChanges,
} from '../store/contracts/common.js';

export const decks = pgTable('decks', {
  hash: text('hash').primaryKey(),
  deckId: integer('deck_id').notNull(),
  name: text('name').notNull(),
  format: text('format').notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  mainboard: jsonb('mainboard').$type<CardEntry[]>().notNull(),
  sideboard: jsonb('sideboard').$type<CardEntry[]>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const events = pgTable(
  'events',
  {
    eventId: integer('event_id').primaryKey(),
    format: text('format').notNull(),
    description: text('description').notNull(),
    deckHash: text('deck_hash').references(() => decks.hash, { onDelete: 'set null' }),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    startIdx: index('events_start_time_idx').on(table.startTime, table.eventId),
  })
);

export const matches = pgTable(
  'matches',
  {
    matchId: integer('match_id').primaryKey(),
    eventId: integer('event_id')
      .references(() => events.eventId, { onDelete: 'cascade' })
      .notNull(),
    position: integer('position').notNull(),
    playerResults: jsonb('player_results').$type<MatchPlayerResult[]>().notNull(),
    sideboardChanges: jsonb('sideboard_changes').$type<SideboardChanges>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    eventIdx: uniqueIndex('matches_event_position_idx').on(table.eventId, table.position),
  })
);

export const games = pgTable(
  'games',
  {
    gameId: integer('game_id').primaryKey(),
    matchId: integer('match_id')
      .references(() => matches.matchId, { onDelete: 'cascade' })
      .notNull(),
    position: integer('position').notNull(),
    playerResults: jsonb('player_results').$type<GamePlayerResult[]>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    matchIdx: uniqueIndex('games_match_position_idx').on(table.matchId, table.position),
  })
);

export const gameLogs = pgTable(
  'game_logs',
  {
    logId: text('log_id').primaryKey(),
    gameId: integer('game_id')
      .references(() => games.gameId, { onDelete: 'cascade' })
      .notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true, precision: 3 }).notNull(),
    type: text('type').notNull(),
    data: text('data').notNull(),
  },
  (table) => ({
    gameTimeIdx: index('game_logs_game_time_idx').on(table.gameId, table.timestamp),
  })
);
