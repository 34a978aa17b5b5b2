import { and, asc, count, desc, eq, gt, isNull, or } from 'drizzle-orm';

import { getDb } from '../db/client.js';
import type { DbClient, DbTransaction } from '../db/client.js';
import { decks, events, gameLogs, games, matches } from '../db/schema.js';
import type {
  DeckInput,
  DeckRecord,
  EventInsert,
  EventListQuery,
  EventListResult,
  EventRecord,
  GameInsert,
  GameLogInsert,
  GameLogRecord,
  GameLogType,
  GamePlayerResult,
  GameRecord,
  MatchInsert,
  MatchRecord,
  MatchUpdate,
  RowKind,
  StoreTransaction,
  TrackerStore,
} from './types.js';
import { GAME_LOG_TYPES, InvalidCursorError, StoreConflictError } from './types.js';
import { buildEventCursor, parseEventCursor } from './util/cursors.js';
import { clampLimit } from './util/pagination.js';

type DeckRow = typeof decks.$inferSelect;
type EventRow = typeof events.$inferSelect;
type MatchRow = typeof matches.$inferSelect;
type GameRow = typeof games.$inferSelect;
type GameLogRow = typeof gameLogs.$inferSelect;

// unique_violation, serialization_failure, deadlock_detected
const CONFLICT_CODES = new Set(['23505', '40001', '40P01']);

const pgErrorCode = (err: unknown): string | null => {
  if (typeof err !== 'object' || err === null) return null;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return pgErrorCode(err.cause);
  return null;
};

const pgErrorDetail = (err: unknown) => {
  if (typeof err === 'object' && err !== null && 'table' in err && typeof err.table === 'string') {
    return { table: err.table };
  }
  return {};
};

const isGameLogType = (value: string): value is GameLogType =>
  (GAME_LOG_TYPES as readonly string[]).includes(value);

const toIso = (value: Date | null) => (value ? value.toISOString() : null);

const toDeckRecord = (row: DeckRow): DeckRecord => ({
  hash: row.hash,
  deckId: row.deckId,
  name: row.name,
  format: row.format,
  timestamp: row.timestamp.toISOString(),
  mainboard: row.mainboard,
  sideboard: row.sideboard,
});

const toEventRecord = (row: EventRow): EventRecord => ({
  eventId: row.eventId,
  format: row.format,
  description: row.description,
  deckHash: row.deckHash,
  startTime: row.startTime.toISOString(),
  endTime: toIso(row.endTime),
  createdAt: row.createdAt.toISOString(),
});

const toMatchRecord = (row: MatchRow): MatchRecord => ({
  matchId: row.matchId,
  eventId: row.eventId,
  position: row.position,
  playerResults: row.playerResults,
  sideboardChanges: row.sideboardChanges,
  createdAt: row.createdAt.toISOString(),
  updatedAt: row.updatedAt.toISOString(),
});

const toGameRecord = (row: GameRow): GameRecord => ({
  gameId: row.gameId,
  matchId: row.matchId,
  position: row.position,
  playerResults: row.playerResults,
  createdAt: row.createdAt.toISOString(),
  updatedAt: row.updatedAt.toISOString(),
});

const toGameLogRecord = (row: GameLogRow): GameLogRecord => {
  if (!isGameLogType(row.type)) {
    throw new Error(`Unknown game log type ${row.type} on ${row.logId}`);
  }
  return {
    logId: row.logId,
    gameId: row.gameId,
    timestamp: row.timestamp.toISOString(),
    type: row.type,
    data: row.data,
  };
};

class PostgresTransaction implements StoreTransaction {
  constructor(
    private readonly tx: DbTransaction,
    private readonly now: () => Date
  ) {}

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const [row] = await this.tx.select().from(events).where(eq(events.eventId, eventId)).limit(1);
    return row ? toEventRecord(row) : null;
  }

  async lockEvent(eventId: number): Promise<EventRecord | null> {
    const [row] = await this.tx
      .select()
      .from(events)
      .where(eq(events.eventId, eventId))
      .limit(1)
      .for('update');
    return row ? toEventRecord(row) : null;
  }

  async hasDeck(hash: string): Promise<boolean> {
    const rows = await this.tx.select({ hash: decks.hash }).from(decks).where(eq(decks.hash, hash)).limit(1);
    return rows.length > 0;
  }

  async insertDeck(deck: DeckInput): Promise<void> {
    await this.tx.insert(decks).values({
      hash: deck.hash,
      deckId: deck.deckId,
      name: deck.name,
      format: deck.format,
      timestamp: deck.timestamp,
      mainboard: deck.mainboard,
      sideboard: deck.sideboard,
      createdAt: this.now(),
    });
  }

  async insertEvent(input: EventInsert): Promise<EventRecord> {
    const [row] = await this.tx
      .insert(events)
      .values({
        eventId: input.eventId,
        format: input.format,
        description: input.description,
        deckHash: input.deckHash,
        startTime: input.startTime,
        endTime: null,
        createdAt: this.now(),
      })
      .returning();
    if (!row) throw new Error(`Insert returned no row for event ${input.eventId}`);
    return toEventRecord(row);
  }

  async setEventEndTime(eventId: number, endTime: Date): Promise<boolean> {
    const rows = await this.tx
      .update(events)
      .set({ endTime })
      .where(and(eq(events.eventId, eventId), isNull(events.endTime)))
      .returning({ eventId: events.eventId });
    return rows.length > 0;
  }

  async getMatch(matchId: number): Promise<MatchRecord | null> {
    const [row] = await this.tx.select().from(matches).where(eq(matches.matchId, matchId)).limit(1);
    return row ? toMatchRecord(row) : null;
  }

  async lockMatch(matchId: number): Promise<MatchRecord | null> {
    const [row] = await this.tx
      .select()
      .from(matches)
      .where(eq(matches.matchId, matchId))
      .limit(1)
      .for('update');
    return row ? toMatchRecord(row) : null;
  }

  async insertMatch(input: MatchInsert): Promise<MatchRecord> {
    const [counted] = await this.tx
      .select({ value: count() })
      .from(matches)
      .where(eq(matches.eventId, input.eventId));
    const timestamp = this.now();
    const [row] = await this.tx
      .insert(matches)
      .values({
        matchId: input.matchId,
        eventId: input.eventId,
        position: counted?.value ?? 0,
        playerResults: [],
        sideboardChanges: {},
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .returning();
    if (!row) throw new Error(`Insert returned no row for match ${input.matchId}`);
    return toMatchRecord(row);
  }

  async updateMatch(matchId: number, update: MatchUpdate): Promise<MatchRecord | null> {
    const [row] = await this.tx
      .update(matches)
      .set({
        updatedAt: this.now(),
        ...(update.playerResults ? { playerResults: update.playerResults } : {}),
        ...(update.sideboardChanges ? { sideboardChanges: update.sideboardChanges } : {}),
      })
      .where(eq(matches.matchId, matchId))
      .returning();
    return row ? toMatchRecord(row) : null;
  }

  async getGame(gameId: number): Promise<GameRecord | null> {
    const [row] = await this.tx.select().from(games).where(eq(games.gameId, gameId)).limit(1);
    return row ? toGameRecord(row) : null;
  }

  async insertGame(input: GameInsert): Promise<GameRecord> {
    const [counted] = await this.tx
      .select({ value: count() })
      .from(games)
      .where(eq(games.matchId, input.matchId));
    const timestamp = this.now();
    const [row] = await this.tx
      .insert(games)
      .values({
        gameId: input.gameId,
        matchId: input.matchId,
        position: counted?.value ?? 0,
        playerResults: [],
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .returning();
    if (!row) throw new Error(`Insert returned no row for game ${input.gameId}`);
    return toGameRecord(row);
  }

  async updateGameResults(gameId: number, results: GamePlayerResult[]): Promise<GameRecord | null> {
    const [row] = await this.tx
      .update(games)
      .set({ playerResults: results, updatedAt: this.now() })
      .where(eq(games.gameId, gameId))
      .returning();
    return row ? toGameRecord(row) : null;
  }

  async hasGameLog(logId: string): Promise<boolean> {
    const rows = await this.tx
      .select({ logId: gameLogs.logId })
      .from(gameLogs)
      .where(eq(gameLogs.logId, logId))
      .limit(1);
    return rows.length > 0;
  }

  async insertGameLog(input: GameLogInsert): Promise<GameLogRecord> {
    const [row] = await this.tx
      .insert(gameLogs)
      .values({
        logId: input.logId,
        gameId: input.gameId,
        timestamp: input.timestamp,
        type: input.type,
        data: input.data,
      })
      .returning();
    if (!row) throw new Error(`Insert returned no row for game log ${input.logId}`);
    return toGameLogRecord(row);
  }
}

export class PostgresStore implements TrackerStore {
  constructor(
    private readonly db: DbClient = getDb(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction((tx) => work(new PostgresTransaction(tx, this.now)));
    } catch (err) {
      const code = pgErrorCode(err);
      if (code && CONFLICT_CODES.has(code)) {
        throw new StoreConflictError(
          err instanceof Error ? err.message : `Write conflict (${code})`,
          pgErrorDetail(err),
          { cause: err }
        );
      }
      throw err;
    }
  }

  async rowExists(kind: RowKind, id: number): Promise<boolean> {
    switch (kind) {
      case 'event': {
        const rows = await this.db
          .select({ id: events.eventId })
          .from(events)
          .where(eq(events.eventId, id))
          .limit(1);
        return rows.length > 0;
      }
      case 'match': {
        const rows = await this.db
          .select({ id: matches.matchId })
          .from(matches)
          .where(eq(matches.matchId, id))
          .limit(1);
        return rows.length > 0;
      }
      case 'game': {
        const rows = await this.db.select({ id: games.gameId }).from(games).where(eq(games.gameId, id)).limit(1);
        return rows.length > 0;
      }
    }
  }

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const [row] = await this.db.select().from(events).where(eq(events.eventId, eventId)).limit(1);
    return row ? toEventRecord(row) : null;
  }

  async getDeck(hash: string): Promise<DeckRecord | null> {
    const [row] = await this.db.select().from(decks).where(eq(decks.hash, hash)).limit(1);
    return row ? toDeckRecord(row) : null;
  }

  async listDecks(): Promise<DeckRecord[]> {
    const rows = await this.db.select().from(decks).orderBy(desc(decks.timestamp), asc(decks.hash));
    return rows.map(toDeckRecord);
  }

  async listEvents(query: EventListQuery): Promise<EventListResult> {
    const limit = clampLimit(query.limit);
    const cursor = query.cursor ? parseEventCursor(query.cursor) : null;
    if (query.cursor && !cursor) throw new InvalidCursorError(query.cursor);

    const rows = await this.db
      .select()
      .from(events)
      .where(
        and(
          query.format ? eq(events.format, query.format) : undefined,
          cursor
            ? or(
                gt(events.startTime, cursor.startTime),
                and(eq(events.startTime, cursor.startTime), gt(events.eventId, cursor.eventId))
              )
            : undefined
        )
      )
      .orderBy(asc(events.startTime), asc(events.eventId))
      .limit(limit + 1);

    const page = rows.slice(0, limit);
    const last = page.at(-1);
    return {
      items: page.map(toEventRecord),
      ...(rows.length > limit && last ? { nextCursor: buildEventCursor(last) } : {}),
    };
  }

  async listEventFormats(): Promise<string[]> {
    const rows = await this.db.selectDistinct({ format: events.format }).from(events).orderBy(asc(events.format));
    return rows.map((row) => row.format);
  }

  async getMatch(matchId: number): Promise<MatchRecord | null> {
    const [row] = await this.db.select().from(matches).where(eq(matches.matchId, matchId)).limit(1);
    return row ? toMatchRecord(row) : null;
  }

  async listMatches(eventId: number): Promise<MatchRecord[]> {
    const rows = await this.db
      .select()
      .from(matches)
      .where(eq(matches.eventId, eventId))
      .orderBy(asc(matches.position));
    return rows.map(toMatchRecord);
  }

  async getGame(gameId: number): Promise<GameRecord | null> {
    const [row] = await this.db.select().from(games).where(eq(games.gameId, gameId)).limit(1);
    return row ? toGameRecord(row) : null;
  }

  async listGames(matchId: number): Promise<GameRecord[]> {
    const rows = await this.db.select().from(games).where(eq(games.matchId, matchId)).orderBy(asc(games.position));
    return rows.map(toGameRecord);
  }

  async listGameLogs(gameId: number): Promise<GameLogRecord[]> {
    const rows = await this.db
      .select()
      .from(gameLogs)
      .where(eq(gameLogs.gameId, gameId))
      .orderBy(asc(gameLogs.timestamp), asc(gameLogs.logId));
    return rows.map(toGameLogRecord);
  }
}
