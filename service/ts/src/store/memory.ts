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
  MatchPlayerResult,
  MatchRecord,
  MatchUpdate,
  RowKind,
  SideboardChanges,
  StoreTransaction,
  TrackerStore,
  CardEntry,
} from './types.js';
import { InvalidCursorError, StoreConflictError } from './types.js';
import { buildEventCursor, isAfterEventCursor, parseEventCursor } from './util/cursors.js';
import { clampLimit } from './util/pagination.js';

interface MemoryDeckRow {
  hash: string;
  deckId: number;
  name: string;
  format: string;
  timestamp: Date;
  mainboard: CardEntry[];
  sideboard: CardEntry[];
}

interface MemoryEventRow {
  eventId: number;
  format: string;
  description: string;
  deckHash: string | null;
  startTime: Date;
  endTime: Date | null;
  createdAt: Date;
}

interface MemoryMatchRow {
  matchId: number;
  eventId: number;
  position: number;
  playerResults: MatchPlayerResult[];
  sideboardChanges: SideboardChanges;
  createdAt: Date;
  updatedAt: Date;
}

interface MemoryGameRow {
  gameId: number;
  matchId: number;
  position: number;
  playerResults: GamePlayerResult[];
  createdAt: Date;
  updatedAt: Date;
}

interface MemoryGameLogRow {
  logId: string;
  gameId: number;
  timestamp: Date;
  type: GameLogType;
  data: string;
}

class MemoryTables {
  decks = new Map<string, MemoryDeckRow>();
  events = new Map<number, MemoryEventRow>();
  matches = new Map<number, MemoryMatchRow>();
  games = new Map<number, MemoryGameRow>();
  gameLogs = new Map<string, MemoryGameLogRow>();
}

/** Checked at commit time; a failing check rolls the whole transaction back. */
type CommitCheck = () => StoreConflictError | null;

const toIso = (value: Date | null) => (value ? value.toISOString() : null);

const countChildren = <T extends { position: number }>(
  rows: Iterable<T>,
  belongs: (row: T) => boolean
) => {
  let total = 0;
  for (const row of rows) if (belongs(row)) total += 1;
  return total;
};

const toEventRecord = (row: MemoryEventRow): EventRecord => ({
  eventId: row.eventId,
  format: row.format,
  description: row.description,
  deckHash: row.deckHash,
  startTime: row.startTime.toISOString(),
  endTime: toIso(row.endTime),
  createdAt: row.createdAt.toISOString(),
});

const toDeckRecord = (row: MemoryDeckRow): DeckRecord => ({
  hash: row.hash,
  deckId: row.deckId,
  name: row.name,
  format: row.format,
  timestamp: row.timestamp.toISOString(),
  mainboard: structuredClone(row.mainboard),
  sideboard: structuredClone(row.sideboard),
});

const toMatchRecord = (row: MemoryMatchRow): MatchRecord => ({
  matchId: row.matchId,
  eventId: row.eventId,
  position: row.position,
  playerResults: structuredClone(row.playerResults),
  sideboardChanges: structuredClone(row.sideboardChanges),
  createdAt: row.createdAt.toISOString(),
  updatedAt: row.updatedAt.toISOString(),
});

const toGameRecord = (row: MemoryGameRow): GameRecord => ({
  gameId: row.gameId,
  matchId: row.matchId,
  position: row.position,
  playerResults: structuredClone(row.playerResults),
  createdAt: row.createdAt.toISOString(),
  updatedAt: row.updatedAt.toISOString(),
});

const toGameLogRecord = (row: MemoryGameLogRow): GameLogRecord => ({
  logId: row.logId,
  gameId: row.gameId,
  timestamp: row.timestamp.toISOString(),
  type: row.type,
  data: row.data,
});

const conflict = (table: string, key: string | number) =>
  new StoreConflictError(`Concurrent write conflict on ${table} ${key}`, { table, key: String(key) });

const foreignKeyViolation = (table: string, column: string, value: number) =>
  new Error(`insert into ${table} violates foreign key ${column}=${value}`);

/**
 * Optimistic transaction over {@link MemoryTables}. Writes are staged and only
 * applied by {@link MemoryTransaction.commit}, which re-validates every read the
 * writes depended on, the way a serializable database would.
 */
class MemoryTransaction implements StoreTransaction {
  private readonly decks = new Map<string, MemoryDeckRow>();
  private readonly events = new Map<number, MemoryEventRow>();
  private readonly matches = new Map<number, MemoryMatchRow>();
  private readonly games = new Map<number, MemoryGameRow>();
  private readonly gameLogs = new Map<string, MemoryGameLogRow>();
  private readonly eventEndTimes = new Map<number, Date>();
  private readonly matchUpdates = new Map<number, MemoryMatchRow>();
  private readonly gameUpdates = new Map<number, MemoryGameRow>();
  private readonly checks: CommitCheck[] = [];

  constructor(
    private readonly tables: MemoryTables,
    private readonly now: () => Date
  ) {}

  private viewEvent(eventId: number): MemoryEventRow | null {
    const row = this.events.get(eventId) ?? this.tables.events.get(eventId);
    if (!row) return null;
    const endTime = this.eventEndTimes.get(eventId);
    return endTime ? { ...row, endTime } : row;
  }

  private viewMatch(matchId: number): MemoryMatchRow | null {
    return this.matchUpdates.get(matchId) ?? this.matches.get(matchId) ?? this.tables.matches.get(matchId) ?? null;
  }

  private viewGame(gameId: number): MemoryGameRow | null {
    return this.gameUpdates.get(gameId) ?? this.games.get(gameId) ?? this.tables.games.get(gameId) ?? null;
  }

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const row = this.viewEvent(eventId);
    return row ? toEventRecord(row) : null;
  }

  async lockEvent(eventId: number): Promise<EventRecord | null> {
    return this.getEvent(eventId);
  }

  async hasDeck(hash: string): Promise<boolean> {
    return this.decks.has(hash) || this.tables.decks.has(hash);
  }

  async insertDeck(deck: DeckInput): Promise<void> {
    if (await this.hasDeck(deck.hash)) throw conflict('decks', deck.hash);
    this.decks.set(deck.hash, {
      hash: deck.hash,
      deckId: deck.deckId,
      name: deck.name,
      format: deck.format,
      timestamp: new Date(deck.timestamp),
      mainboard: structuredClone(deck.mainboard),
      sideboard: structuredClone(deck.sideboard),
    });
    this.checks.push(() => (this.tables.decks.has(deck.hash) ? conflict('decks', deck.hash) : null));
  }

  async insertEvent(input: EventInsert): Promise<EventRecord> {
    if (this.viewEvent(input.eventId)) throw conflict('events', input.eventId);
    if (input.deckHash && !(await this.hasDeck(input.deckHash))) {
      throw new Error(`insert into events violates foreign key deck_hash=${input.deckHash}`);
    }

    const row: MemoryEventRow = {
      eventId: input.eventId,
      format: input.format,
      description: input.description,
      deckHash: input.deckHash,
      startTime: new Date(input.startTime),
      endTime: null,
      createdAt: this.now(),
    };
    this.events.set(row.eventId, row);
    this.checks.push(() => (this.tables.events.has(row.eventId) ? conflict('events', row.eventId) : null));
    return toEventRecord(row);
  }

  async setEventEndTime(eventId: number, endTime: Date): Promise<boolean> {
    const row = this.viewEvent(eventId);
    if (!row || row.endTime) return false;

    this.eventEndTimes.set(eventId, new Date(endTime));
    this.checks.push(() => {
      const committed = this.tables.events.get(eventId);
      return committed && committed.endTime ? conflict('events', eventId) : null;
    });
    return true;
  }

  async getMatch(matchId: number): Promise<MatchRecord | null> {
    const row = this.viewMatch(matchId);
    return row ? toMatchRecord(row) : null;
  }

  async lockMatch(matchId: number): Promise<MatchRecord | null> {
    return this.getMatch(matchId);
  }

  async insertMatch(input: MatchInsert): Promise<MatchRecord> {
    if (this.viewMatch(input.matchId)) throw conflict('matches', input.matchId);
    if (!this.viewEvent(input.eventId)) throw foreignKeyViolation('matches', 'event_id', input.eventId);

    const belongs = (row: MemoryMatchRow) => row.eventId === input.eventId;
    const committedSiblings = countChildren(this.tables.matches.values(), belongs);
    const position = committedSiblings + countChildren(this.matches.values(), belongs);
    const timestamp = this.now();
    const row: MemoryMatchRow = {
      matchId: input.matchId,
      eventId: input.eventId,
      position,
      playerResults: [],
      sideboardChanges: {},
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.matches.set(row.matchId, row);
    this.checks.push(() => {
      if (this.tables.matches.has(row.matchId)) return conflict('matches', row.matchId);
      if (countChildren(this.tables.matches.values(), belongs) !== committedSiblings) {
        return conflict('events', input.eventId);
      }
      return null;
    });
    return toMatchRecord(row);
  }

  async updateMatch(matchId: number, update: MatchUpdate): Promise<MatchRecord | null> {
    const current = this.viewMatch(matchId);
    if (!current) return null;

    const row: MemoryMatchRow = {
      ...current,
      playerResults: update.playerResults ? structuredClone(update.playerResults) : current.playerResults,
      sideboardChanges: update.sideboardChanges
        ? structuredClone(update.sideboardChanges)
        : current.sideboardChanges,
      updatedAt: this.now(),
    };
    this.matchUpdates.set(matchId, row);
    this.guardUnchanged(this.tables.matches, matchId, 'matches');
    return toMatchRecord(row);
  }

  async getGame(gameId: number): Promise<GameRecord | null> {
    const row = this.viewGame(gameId);
    return row ? toGameRecord(row) : null;
  }

  async insertGame(input: GameInsert): Promise<GameRecord> {
    if (this.viewGame(input.gameId)) throw conflict('games', input.gameId);
    if (!this.viewMatch(input.matchId)) throw foreignKeyViolation('games', 'match_id', input.matchId);

    const belongs = (row: MemoryGameRow) => row.matchId === input.matchId;
    const committedSiblings = countChildren(this.tables.games.values(), belongs);
    const position = committedSiblings + countChildren(this.games.values(), belongs);
    const timestamp = this.now();
    const row: MemoryGameRow = {
      gameId: input.gameId,
      matchId: input.matchId,
      position,
      playerResults: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.games.set(row.gameId, row);
    this.checks.push(() => {
      if (this.tables.games.has(row.gameId)) return conflict('games', row.gameId);
      if (countChildren(this.tables.games.values(), belongs) !== committedSiblings) {
        return conflict('matches', input.matchId);
      }
      return null;
    });
    return toGameRecord(row);
  }

  async updateGameResults(gameId: number, results: GamePlayerResult[]): Promise<GameRecord | null> {
    const current = this.viewGame(gameId);
    if (!current) return null;

    const row: MemoryGameRow = { ...current, playerResults: structuredClone(results), updatedAt: this.now() };
    this.gameUpdates.set(gameId, row);
    this.guardUnchanged(this.tables.games, gameId, 'games');
    return toGameRecord(row);
  }

  async hasGameLog(logId: string): Promise<boolean> {
    return this.gameLogs.has(logId) || this.tables.gameLogs.has(logId);
  }

  async insertGameLog(input: GameLogInsert): Promise<GameLogRecord> {
    if (await this.hasGameLog(input.logId)) throw conflict('game_logs', input.logId);
    if (!this.viewGame(input.gameId)) throw foreignKeyViolation('game_logs', 'game_id', input.gameId);

    const row: MemoryGameLogRow = {
      logId: input.logId,
      gameId: input.gameId,
      timestamp: new Date(input.timestamp),
      type: input.type,
      data: input.data,
    };
    this.gameLogs.set(row.logId, row);
    this.checks.push(() => (this.tables.gameLogs.has(row.logId) ? conflict('game_logs', row.logId) : null));
    return toGameLogRecord(row);
  }

  /** Read-modify-write on a committed row fails if someone else committed it first. */
  private guardUnchanged<K, V>(table: Map<K, V>, key: K, name: string) {
    const base = table.get(key);
    if (!base) return;
    this.checks.push(() => (table.get(key) === base ? null : conflict(name, String(key))));
  }

  /** Validates and applies every staged write, or none of them. */
  commit() {
    for (const check of this.checks) {
      const error = check();
      if (error) throw error;
    }

    for (const [hash, row] of this.decks) this.tables.decks.set(hash, row);
    for (const [id, row] of this.events) this.tables.events.set(id, row);
    for (const [id, endTime] of this.eventEndTimes) {
      const row = this.tables.events.get(id);
      if (row) this.tables.events.set(id, { ...row, endTime });
    }
    for (const [id, row] of this.matches) this.tables.matches.set(id, row);
    for (const [id, row] of this.matchUpdates) {
      const committed = this.tables.matches.get(id);
      if (committed) {
        this.tables.matches.set(id, {
          ...committed,
          playerResults: row.playerResults,
          sideboardChanges: row.sideboardChanges,
          updatedAt: row.updatedAt,
        });
      }
    }
    for (const [id, row] of this.games) this.tables.games.set(id, row);
    for (const [id, row] of this.gameUpdates) {
      const committed = this.tables.games.get(id);
      if (committed) {
        this.tables.games.set(id, { ...committed, playerResults: row.playerResults, updatedAt: row.updatedAt });
      }
    }
    for (const [id, row] of this.gameLogs) this.tables.gameLogs.set(id, row);
  }
}

export class MemoryStore implements TrackerStore {
  private readonly tables = new MemoryTables();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryTransaction(this.tables, this.now);
    const result = await work(tx);
    tx.commit();
    return result;
  }

  async rowExists(kind: RowKind, id: number): Promise<boolean> {
    switch (kind) {
      case 'event':
        return this.tables.events.has(id);
      case 'match':
        return this.tables.matches.has(id);
      case 'game':
        return this.tables.games.has(id);
    }
  }

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const row = this.tables.events.get(eventId);
    return row ? toEventRecord(row) : null;
  }

  async getDeck(hash: string): Promise<DeckRecord | null> {
    const row = this.tables.decks.get(hash);
    return row ? toDeckRecord(row) : null;
  }

  async listDecks(): Promise<DeckRecord[]> {
    return [...this.tables.decks.values()]
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || a.hash.localeCompare(b.hash))
      .map(toDeckRecord);
  }

  async listEvents(query: EventListQuery): Promise<EventListResult> {
    const limit = clampLimit(query.limit);
    const cursor = query.cursor ? parseEventCursor(query.cursor) : null;
    if (query.cursor && !cursor) throw new InvalidCursorError(query.cursor);

    const rows = [...this.tables.events.values()]
      .filter((row) => !query.format || row.format === query.format)
      .filter((row) => !cursor || isAfterEventCursor(row, cursor))
      .sort((a, b) => a.startTime.getTime() - b.startTime.getTime() || a.eventId - b.eventId);

    const page = rows.slice(0, limit);
    const last = page.at(-1);
    return {
      items: page.map(toEventRecord),
      ...(rows.length > limit && last ? { nextCursor: buildEventCursor(last) } : {}),
    };
  }

  async listEventFormats(): Promise<string[]> {
    const formats = new Set<string>();
    for (const row of this.tables.events.values()) formats.add(row.format);
    return [...formats].sort((a, b) => a.localeCompare(b));
  }

  async getMatch(matchId: number): Promise<MatchRecord | null> {
    const row = this.tables.matches.get(matchId);
    return row ? toMatchRecord(row) : null;
  }

  async listMatches(eventId: number): Promise<MatchRecord[]> {
    return [...this.tables.matches.values()]
      .filter((row) => row.eventId === eventId)
      .sort((a, b) => a.position - b.position)
      .map(toMatchRecord);
  }

  async getGame(gameId: number): Promise<GameRecord | null> {
    const row = this.tables.games.get(gameId);
    return row ? toGameRecord(row) : null;
  }

  async listGames(matchId: number): Promise<GameRecord[]> {
    return [...this.tables.games.values()]
      .filter((row) => row.matchId === matchId)
      .sort((a, b) => a.position - b.position)
      .map(toGameRecord);
  }

  async listGameLogs(gameId: number): Promise<GameLogRecord[]> {
    return [...this.tables.gameLogs.values()]
      .filter((row) => row.gameId === gameId)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.logId.localeCompare(b.logId))
      .map(toGameLogRecord);
  }
}
