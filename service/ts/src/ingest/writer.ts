import type {
  CardEntry,
  EventInput,
  EventRecord,
  GameInput,
  GamePlayerResult,
  GameRecord,
  MatchInput,
  MatchPlayerResult,
  MatchRecord,
  RowKind,
  StoreConflictError,
  StoreTransaction,
  TrackerStore,
  WriteResult,
} from '../store/index.js';
import { deriveGameLogId } from './log-entry.js';
import type { GameLogEntry } from './log-entry.js';
import { DEFAULT_READINESS_OPTIONS, ReadinessRegistry } from './readiness.js';
import type { ReadinessOptions, WaitOptions } from './readiness.js';
import { DEFAULT_CONFLICT_RETRY_POLICY, runWithConflictRetry } from './retry.js';
import type { ConflictRetryPolicy, WriteAttempt } from './retry.js';

export interface EventWriterOptions {
  readiness?: Partial<ReadinessOptions>;
  conflictRetry?: Partial<ConflictRetryPolicy>;
}

type LogContext = Record<string, string | number>;

const NOT_WRITTEN = { created: false, record: null } as const;

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * The only path from notifications to rows. Every call runs in its own
 * transaction, is safe to repeat, and reports failure through its result
 * instead of throwing.
 */
export class EventWriter {
  readonly readiness: ReadinessRegistry;
  private readonly retryPolicy: ConflictRetryPolicy;

  constructor(
    private readonly store: TrackerStore,
    options: EventWriterOptions = {}
  ) {
    this.readiness = new ReadinessRegistry((kind, id) => store.rowExists(kind, id), {
      ...DEFAULT_READINESS_OPTIONS,
      ...options.readiness,
    });
    this.retryPolicy = { ...DEFAULT_CONFLICT_RETRY_POLICY, ...options.conflictRetry };
  }

  async addEvent(event: EventInput): Promise<WriteResult<EventRecord>> {
    const context = { eventId: event.id };
    try {
      const outcome = await this.write('event_add', context, async (tx): Promise<WriteResult<EventRecord>> => {
        const existing = await tx.getEvent(event.id);
        if (existing) return { created: false, record: existing };

        let deckHash: string | null = null;
        if (event.deck) {
          if (!(await tx.hasDeck(event.deck.hash))) {
            await tx.insertDeck(event.deck);
          }
          deckHash = event.deck.hash;
        }

        const record = await tx.insertEvent({
          eventId: event.id,
          format: event.format,
          description: event.description,
          deckHash,
          startTime: event.startTime,
        });
        return { created: true, record };
      });

      return await this.settle('event', event.id, outcome, () => this.store.getEvent(event.id));
    } catch (err) {
      console.error('event_add_error', { ...context, message: describeError(err) });
      return NOT_WRITTEN;
    }
  }

  async updateEventEndTime(eventId: number, endTime: Date): Promise<boolean> {
    try {
      const outcome = await this.write('event_end_time', { eventId }, (tx) => tx.setEventEndTime(eventId, endTime));
      // A conflict here means another writer set it first.
      return outcome.status === 'ok' && outcome.value;
    } catch (err) {
      console.error('event_end_time_error', { eventId, message: describeError(err) });
      return false;
    }
  }

  async addMatch(match: MatchInput, eventId: number, wait: WaitOptions = {}): Promise<WriteResult<MatchRecord>> {
    const context = { matchId: match.id, eventId };
    if (!(await this.waitForEvent(eventId, wait))) {
      console.warn('match_parent_missing', context);
      return NOT_WRITTEN;
    }

    try {
      const outcome = await this.write('match_add', context, async (tx): Promise<WriteResult<MatchRecord>> => {
        const existing = await tx.getMatch(match.id);
        if (existing) return { created: false, record: existing };

        if (!(await tx.lockEvent(eventId))) return NOT_WRITTEN;
        const record = await tx.insertMatch({ matchId: match.id, eventId });
        return { created: true, record };
      });

      const result = await this.settle('match', match.id, outcome, () => this.store.getMatch(match.id));
      if (!result.record) console.warn('match_parent_missing', context);
      return result;
    } catch (err) {
      console.error('match_add_error', { ...context, message: describeError(err) });
      return NOT_WRITTEN;
    }
  }

  async addGame(game: GameInput, matchId: number, wait: WaitOptions = {}): Promise<WriteResult<GameRecord>> {
    const context = { gameId: game.id, matchId };
    if (!(await this.waitForMatch(matchId, wait))) {
      console.warn('game_parent_missing', context);
      return NOT_WRITTEN;
    }

    try {
      const outcome = await this.write('game_add', context, async (tx): Promise<WriteResult<GameRecord>> => {
        const existing = await tx.getGame(game.id);
        if (existing) return { created: false, record: existing };

        if (!(await tx.lockMatch(matchId))) return NOT_WRITTEN;
        const record = await tx.insertGame({ gameId: game.id, matchId });
        return { created: true, record };
      });

      const result = await this.settle('game', game.id, outcome, () => this.store.getGame(game.id));
      if (!result.record) console.warn('game_parent_missing', context);
      return result;
    } catch (err) {
      console.error('game_add_error', { ...context, message: describeError(err) });
      return NOT_WRITTEN;
    }
  }

  /** Resolves `false` for a duplicate entry as well as for a failed write. */
  async addGameLog(entry: GameLogEntry): Promise<boolean> {
    const logId = deriveGameLogId(entry);
    const context = { gameId: entry.gameId, logId };
    try {
      const outcome = await this.write('game_log_add', context, async (tx) => {
        if (await tx.hasGameLog(logId)) return false;
        await tx.insertGameLog({
          logId,
          gameId: entry.gameId,
          timestamp: entry.timestamp,
          type: entry.type,
          data: entry.data,
        });
        return true;
      });
      return outcome.status === 'ok' && outcome.value;
    } catch (err) {
      console.error('game_log_add_error', { ...context, message: describeError(err) });
      return false;
    }
  }

  async updateGameResults(gameId: number, results: GamePlayerResult[]): Promise<boolean> {
    return this.update('game_results', { gameId }, async (tx) => (await tx.updateGameResults(gameId, results)) !== null);
  }

  async updateMatchResults(matchId: number, results: MatchPlayerResult[]): Promise<boolean> {
    return this.update(
      'match_results',
      { matchId },
      async (tx) => (await tx.updateMatch(matchId, { playerResults: results })) !== null
    );
  }

  /** Replaces the changes recorded for `gameId`; other games' entries are kept. */
  async updateSideboardChanges(matchId: number, gameId: number, changes: CardEntry[]): Promise<boolean> {
    return this.update('sideboard_changes', { matchId, gameId }, async (tx) => {
      const current = await tx.lockMatch(matchId);
      if (!current) return false;
      const sideboardChanges = { ...current.sideboardChanges, [String(gameId)]: changes };
      return (await tx.updateMatch(matchId, { sideboardChanges })) !== null;
    });
  }

  async getEvent(eventId: number): Promise<EventRecord | null> {
    return this.store.getEvent(eventId);
  }

  async getGames(matchId: number): Promise<GameRecord[]> {
    return this.store.listGames(matchId);
  }

  waitForEvent(eventId: number, options?: WaitOptions): Promise<boolean> {
    return this.readiness.waitFor('event', eventId, options);
  }

  waitForMatch(matchId: number, options?: WaitOptions): Promise<boolean> {
    return this.readiness.waitFor('match', matchId, options);
  }

  waitForGame(gameId: number, options?: WaitOptions): Promise<boolean> {
    return this.readiness.waitFor('game', gameId, options);
  }

  /** Drops the cached identities; the store stays the source of truth. */
  reset() {
    this.readiness.reset();
  }

  private write<T>(
    operation: string,
    context: LogContext,
    work: (tx: StoreTransaction) => Promise<T>
  ): Promise<WriteAttempt<T>> {
    return runWithConflictRetry(this.store, work, this.retryPolicy, (error: StoreConflictError, attempt) => {
      console.warn('write_conflict', { operation, ...context, attempt, message: error.message });
    });
  }

  private async update(
    operation: string,
    context: LogContext,
    work: (tx: StoreTransaction) => Promise<boolean>
  ): Promise<boolean> {
    try {
      const outcome = await this.write(operation, context, work);
      if (outcome.status === 'conflict') {
        console.warn('write_conflict_unresolved', { operation, ...context, attempts: outcome.attempts });
        return false;
      }
      if (!outcome.value) console.warn(`${operation}_missing_row`, context);
      return outcome.value;
    } catch (err) {
      console.error(`${operation}_error`, { ...context, message: describeError(err) });
      return false;
    }
  }

  /**
   * Marks a row durable once a create settles. When retries ran out on a
   * conflict the competing writer won, so the row is re-read.
   */
  private async settle<T>(
    kind: RowKind,
    id: number,
    outcome: WriteAttempt<WriteResult<T>>,
    reread: () => Promise<T | null>
  ): Promise<WriteResult<T>> {
    const result: WriteResult<T> =
      outcome.status === 'ok' ? outcome.value : { created: false, record: await reread() };
    if (result.record) this.readiness.markReady(kind, id);
    return result;
  }
}
