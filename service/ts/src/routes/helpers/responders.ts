import type {
  CardEntry,
  DeckRecord,
  EventRecord,
  GameLogRecord,
  GamePlayerResult,
  GameRecord,
  MatchPlayerResult,
  MatchRecord,
  SideboardChanges,
} from '../../store/index.js';

const toCardResponse = (card: CardEntry) => ({
  catalog_id: card.catalogId,
  name: card.name,
  quantity: card.quantity,
});

export const toDeckResponse = (deck: DeckRecord) => ({
  hash: deck.hash,
  deck_id: deck.deckId,
  name: deck.name,
  format: deck.format,
  timestamp: deck.timestamp,
  mainboard: deck.mainboard.map(toCardResponse),
  sideboard: deck.sideboard.map(toCardResponse),
});

const totalQuantity = (cards: CardEntry[]) => cards.reduce((sum, card) => sum + card.quantity, 0);

export const toDeckIdentifierResponse = (deck: DeckRecord) => ({
  hash: deck.hash,
  deck_id: deck.deckId,
  name: deck.name,
  format: deck.format,
});

export const toDeckSummaryResponse = (deck: DeckRecord) => ({
  ...toDeckIdentifierResponse(deck),
  timestamp: deck.timestamp,
  mainboard_count: totalQuantity(deck.mainboard),
  sideboard_count: totalQuantity(deck.sideboard),
});

export const toEventResponse = (
  event: EventRecord,
  options: { deck?: DeckRecord | null; matches?: MatchRecord[] } = {}
) => {
  const response: Record<string, unknown> = {
    event_id: event.eventId,
    format: event.format,
    description: event.description,
    deck_hash: event.deckHash,
    start_time: event.startTime,
    end_time: event.endTime,
    completed: event.endTime !== null,
    created_at: event.createdAt ?? null,
  };

  if (options.deck !== undefined) {
    response.deck = options.deck ? toDeckResponse(options.deck) : null;
  }
  if (options.matches) {
    response.matches = options.matches.map((match) => toMatchResponse(match));
  }

  return response;
};

const toMatchPlayerResponse = (result: MatchPlayerResult) => ({
  player: result.player,
  result: result.result,
  game_results: result.gameResults,
});

const toSideboardResponse = (changes: SideboardChanges) =>
  Object.fromEntries(Object.entries(changes).map(([gameId, cards]) => [gameId, cards.map(toCardResponse)]));

export const toMatchResponse = (match: MatchRecord, options: { games?: GameRecord[] } = {}) => {
  const response: Record<string, unknown> = {
    match_id: match.matchId,
    event_id: match.eventId,
    position: match.position,
    player_results: match.playerResults.map(toMatchPlayerResponse),
    sideboard_changes: toSideboardResponse(match.sideboardChanges),
    created_at: match.createdAt ?? null,
    updated_at: match.updatedAt ?? null,
  };

  if (options.games) {
    response.games = options.games.map(toGameResponse);
  }

  return response;
};

const toGamePlayerResponse = (result: GamePlayerResult) => ({
  player: result.player,
  result: result.result,
  play_draw: result.playDraw ?? null,
  clock_seconds: result.clockSeconds ?? null,
});

export const toGameResponse = (game: GameRecord) => ({
  game_id: game.gameId,
  match_id: game.matchId,
  position: game.position,
  player_results: game.playerResults.map(toGamePlayerResponse),
  created_at: game.createdAt ?? null,
  updated_at: game.updatedAt ?? null,
});

export const toGameLogResponse = (log: GameLogRecord) => ({
  log_id: log.logId,
  game_id: log.gameId,
  timestamp: log.timestamp,
  type: log.type,
  data: log.data,
});
