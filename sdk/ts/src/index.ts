import { readNdjson } from './ndjson.js';

export { readNdjson, NdjsonParseError } from './ndjson.js';
export type { ByteStream, NdjsonSource } from './ndjson.js';

export type GameLogType = 'PhaseChange' | 'TurnChange' | 'ZoneChange' | 'GameAction' | 'LifeChange' | 'LogMessage';
export type MatchOutcome = 'WIN' | 'LOSS' | 'DRAW';

export interface CardEntry {
  catalogId: number;
  name: string;
  quantity: number;
}

export interface DeckPayload {
  hash: string;
  deckId: number;
  name: string;
  format: string;
  timestamp: string;
  mainboard: CardEntry[];
  sideboard?: CardEntry[];
}

export interface GamePlayerResult {
  player: string;
  result: MatchOutcome;
  playDraw?: 'PLAY' | 'DRAW' | null;
  clockSeconds?: number | null;
}

export interface MatchPlayerResult {
  player: string;
  result: MatchOutcome;
  gameResults?: MatchOutcome[];
}

export type Notification =
  | {
      type: 'event.created';
      event: {
        id: number;
        format: string;
        description: string;
        startTime?: string;
        completed?: boolean;
        endTime?: string | null;
        deck?: DeckPayload | null;
      };
    }
  | { type: 'event.completed'; eventId: number; endTime?: string | null }
  | { type: 'event.released'; eventId: number }
  | { type: 'match.created'; match: { id: number }; eventId: number }
  | { type: 'match.results'; matchId: number; results: MatchPlayerResult[] }
  | { type: 'match.sideboard'; matchId: number; gameId: number; changes: CardEntry[] }
  | { type: 'game.created'; game: { id: number }; matchId: number }
  | { type: 'game.results'; gameId: number; results: GamePlayerResult[] }
  | { type: 'game.log'; entry: { gameId: number; timestamp: string; type: GameLogType; data: string } };

export type NotificationType = Notification['type'];

export interface HealthResponse {
  ok: boolean;
}

export interface NotificationOutcome {
  type: NotificationType;
  accepted: boolean;
  created?: boolean;
  event_id?: number;
  match_id?: number;
  game_id?: number;
  error?: string;
}

export interface NotificationsResponse {
  accepted: number;
  outcomes: NotificationOutcome[];
}

export interface CardResponse {
  catalog_id: number;
  name: string;
  quantity: number;
}

export interface GameResponse {
  game_id: number;
  match_id: number;
  position: number;
  player_results: Array<{
    player: string;
    result: MatchOutcome;
    play_draw: 'PLAY' | 'DRAW' | null;
    clock_seconds: number | null;
  }>;
  created_at: string | null;
  updated_at: string | null;
}

export interface MatchResponse {
  match_id: number;
  event_id: number;
  position: number;
  player_results: Array<{ player: string; result: MatchOutcome; game_results: MatchOutcome[] }>;
  sideboard_changes: Record<string, CardResponse[]>;
  created_at: string | null;
  updated_at: string | null;
  games?: GameResponse[];
}

export interface DeckIdentifierResponse {
  hash: string;
  deck_id: number;
  name: string;
  format: string;
}

export interface DeckSummaryResponse extends DeckIdentifierResponse {
  timestamp: string;
  mainboard_count: number;
  sideboard_count: number;
}

export interface DeckResponse extends DeckIdentifierResponse {
  timestamp: string;
  mainboard: CardResponse[];
  sideboard: CardResponse[];
}

export interface EventResponse {
  event_id: number;
  format: string;
  description: string;
  deck_hash: string | null;
  start_time: string;
  end_time: string | null;
  completed: boolean;
  created_at: string | null;
  deck?: DeckResponse | null;
  matches?: MatchResponse[];
}

export interface EventListResponse {
  events: EventResponse[];
  next_cursor?: string;
}

export interface GameLogResponse {
  log_id: string;
  game_id: number;
  timestamp: string;
  type: GameLogType;
  data: string;
}

export interface FeedMessage {
  type: NotificationType;
  accepted: boolean;
  created?: boolean;
  event_id?: number;
  match_id?: number;
  game_id?: number;
  at: string;
}

export interface EventListQuery {
  format?: string;
  cursor?: string;
  limit?: number;
}

export interface RetryPolicy {
  attempts?: number;
  backoffMs?: number;
  retryOnStatuses?: number[];
}

export interface PlaylogClientOptions {
  baseUrl: string;
  token?: string;
  fetchImpl?: typeof fetch;
  retry?: RetryPolicy;
  defaultHeaders?: Record<string, string>;
}

export class PlaylogError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'PlaylogError';
  }
}

export class PlaylogClient {
  private readonly baseUrl: URL;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: Required<RetryPolicy>;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: PlaylogClientOptions) {
    this.baseUrl = new URL(options.baseUrl);
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);

    this.retry = {
      attempts: Math.max(1, options.retry?.attempts ?? 1),
      backoffMs: Math.max(0, options.retry?.backoffMs ?? 250),
      retryOnStatuses: options.retry?.retryOnStatuses ?? [408, 429, 500, 502, 503, 504],
    };

    this.defaultHeaders = {
      'Content-Type': 'application/json',
      ...options.defaultHeaders,
    };
  }

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>('/health', { method: 'GET' });
  }

  async sendNotification(notification: Notification): Promise<NotificationOutcome | undefined> {
    const response = await this.sendNotifications([notification]);
    return response.outcomes[0];
  }

  async sendNotifications(notifications: Notification[]): Promise<NotificationsResponse> {
    return this.request<NotificationsResponse>('/v1/notifications', {
      method: 'POST',
      body: JSON.stringify({ notifications }),
    });
  }

  async listEvents(query: EventListQuery = {}): Promise<EventListResponse> {
    return this.request<EventListResponse>(`/v1/events${toQueryString({ ...query })}`, { method: 'GET' });
  }

  async listEventFormats(): Promise<string[]> {
    const response = await this.request<{ formats: string[] }>('/v1/events/formats', { method: 'GET' });
    return response.formats;
  }

  async getEvent(eventId: number): Promise<EventResponse> {
    const response = await this.request<{ event: EventResponse }>(`/v1/events/${eventId}`, { method: 'GET' });
    return response.event;
  }

  /** Decks keyed by format, newest first within each format. */
  async listDecks(): Promise<Record<string, DeckSummaryResponse[]>> {
    const response = await this.request<{ decks: Record<string, DeckSummaryResponse[]> }>('/v1/decks', {
      method: 'GET',
    });
    return response.decks;
  }

  async listDeckIdentifiers(): Promise<DeckIdentifierResponse[]> {
    const response = await this.request<{ decks: DeckIdentifierResponse[] }>('/v1/decks/identifiers', {
      method: 'GET',
    });
    return response.decks;
  }

  async getDeck(hash: string): Promise<DeckResponse> {
    const response = await this.request<{ deck: DeckResponse }>(`/v1/decks/${encodeURIComponent(hash)}`, {
      method: 'GET',
    });
    return response.deck;
  }

  async getMatch(matchId: number): Promise<MatchResponse> {
    const response = await this.request<{ match: MatchResponse }>(`/v1/matches/${matchId}`, { method: 'GET' });
    return response.match;
  }

  async getGame(gameId: number): Promise<GameResponse> {
    const response = await this.request<{ game: GameResponse }>(`/v1/games/${gameId}`, { method: 'GET' });
    return response.game;
  }

  /** Every event matching the filter, read from the server's NDJSON stream. */
  streamEvents(query: Omit<EventListQuery, 'limit'> = {}, signal?: AbortSignal): AsyncGenerator<EventResponse> {
    return this.stream<EventResponse>(`/v1/events${toQueryString({ ...query, stream: 'true' })}`, signal);
  }

  /** A game's log entries in chronological order. */
  streamGameLogs(gameId: number, signal?: AbortSignal): AsyncGenerator<GameLogResponse> {
    return this.stream<GameLogResponse>(`/v1/games/${gameId}/logs?stream=true`, signal);
  }

  /** Follows the live feed until `signal` aborts or the server closes the stream. */
  watchLive(options: { types?: NotificationType[]; signal?: AbortSignal } = {}): AsyncGenerator<FeedMessage> {
    const types = options.types?.length ? options.types.join(',') : undefined;
    return this.stream<FeedMessage>(`/v1/live${toQueryString({ types })}`, options.signal);
  }

  private async *stream<T>(path: string, signal?: AbortSignal): AsyncGenerator<T> {
    const url = new URL(path, this.baseUrl);
    const response = await this.fetchImpl(url, {
      method: 'GET',
      headers: this.buildHeaders({ Accept: 'application/x-ndjson' }),
      signal,
    });

    if (!response.ok) {
      throw new PlaylogError(
        `Request to ${url.pathname} failed with status ${response.status}`,
        response.status,
        await this.safeParseBody(response)
      );
    }
    if (!response.body) return;

    try {
      yield* readNdjson<T>(response.body);
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  }

  private buildHeaders(extra?: RequestInit['headers']): Headers {
    const headers = new Headers(this.defaultHeaders);
    if (extra) {
      new Headers(extra).forEach((value, key) => headers.set(key, value));
    }
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }
    return headers;
  }

  private async request<T>(path: string, init: RequestInit): Promise<T> {
    const url = new URL(path, this.baseUrl);
    const headers = this.buildHeaders(init.headers);

    const attemptRequest = async (attempt: number): Promise<T> => {
      const response = await this.fetchImpl(url, { ...init, headers });

      if (!response.ok) {
        const body = await this.safeParseBody(response);
        const shouldRetry =
          attempt + 1 < this.retry.attempts &&
          this.retry.retryOnStatuses.includes(response.status);

        if (shouldRetry) {
          await this.delay(this.retry.backoffMs * Math.pow(2, attempt));
          return attemptRequest(attempt + 1);
        }

        throw new PlaylogError(
          `Request to ${url.pathname} failed with status ${response.status}`,
          response.status,
          body
        );
      }

      return (await this.safeParseBody(response)) as T;
    };

    return attemptRequest(0);
  }

  private async safeParseBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return null;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      return response.json();
    }

    return response.text();
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

const toQueryString = (query: Record<string, string | number | undefined>): string => {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== '') params.set(key, String(value));
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
};
