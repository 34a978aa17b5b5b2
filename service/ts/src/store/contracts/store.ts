import type { GamePlayerResult, RowKind } from './common.js';
import type {
  DeckInput,
  DeckRecord,
  EventInsert,
  EventListQuery,
  EventListResult,
  EventRecord,
} from './events.js';
import type { MatchInsert, MatchRecord, MatchUpdate } from './matches.js';
import type { GameInsert, GameLogInsert, GameLogRecord, GameRecord } from './games.js';

/**
 * Unit of work handed to {@link TrackerStore.transaction}. Reads see the
 * transaction's own writes. Conflicting commits reject with `StoreConflictError`.
 */
export interface StoreTransaction {
  getEvent(eventId: number): Promise<EventRecord | null>;
  /** Reads the event and holds it until commit so sibling appends serialize. */
  lockEvent(eventId: number): Promise<EventRecord | null>;
  hasDeck(hash: string): Promise<boolean>;
  insertDeck(deck: DeckInput): Promise<void>;
  insertEvent(input: EventInsert): Promise<EventRecord>;
  /** Sets the end time only while it is unset. Resolves whether this call set it. */
  setEventEndTime(eventId: number, endTime: Date): Promise<boolean>;

  getMatch(matchId: number): Promise<MatchRecord | null>;
  lockMatch(matchId: number): Promise<MatchRecord | null>;
  /** Appends the match to its event's collection. */
  insertMatch(input: MatchInsert): Promise<MatchRecord>;
  updateMatch(matchId: number, update: MatchUpdate): Promise<MatchRecord | null>;

  getGame(gameId: number): Promise<GameRecord | null>;
  /** Appends the game to its match's collection. */
  insertGame(input: GameInsert): Promise<GameRecord>;
  updateGameResults(gameId: number, results: GamePlayerResult[]): Promise<GameRecord | null>;

  hasGameLog(logId: string): Promise<boolean>;
  insertGameLog(input: GameLogInsert): Promise<GameLogRecord>;
}

export interface TrackerStore {
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  rowExists(kind: RowKind, id: number): Promise<boolean>;

  getEvent(eventId: number): Promise<EventRecord | null>;
  getDeck(hash: string): Promise<DeckRecord | null>;
  /** Newest first. */
  listDecks(): Promise<DeckRecord[]>;
  listEvents(query: EventListQuery): Promise<EventListResult>;
  listEventFormats(): Promise<string[]>;

  getMatch(matchId: number): Promise<MatchRecord | null>;
  listMatches(eventId: number): Promise<MatchRecord[]>;

  getGame(gameId: number): Promise<GameRecord | null>;
  listGames(matchId: number): Promise<GameRecord[]>;
  listGameLogs(gameId: number): Promise<GameLogRecord[]>;
}
