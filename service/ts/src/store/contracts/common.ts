export const GAME_LOG_TYPES = [
  'PhaseChange',
  'TurnChange',
  'ZoneChange',
  'GameAction',
  'LifeChange',
  'LogMessage',
] as const;

export type GameLogType = (typeof GAME_LOG_TYPES)[number];

export type MatchOutcome = 'WIN' | 'LOSS' | 'DRAW';

export type PlayDraw = 'PLAY' | 'DRAW';

export type RowKind = 'event' | 'match' | 'game';

/** Largest id the `integer` id columns hold. */
export const MAX_ROW_ID = 2_147_483_647;

/** A card and a quantity. In sideboard changes the quantity is the signed difference. */
export interface CardEntry {
  catalogId: number;
  name: string;
  quantity: number;
}

export interface GamePlayerResult {
  player: string;
  result: MatchOutcome;
  playDraw?: PlayDraw | null;
  clockSeconds?: number | null;
}

export interface MatchPlayerResult {
  player: string;
  result: MatchOutcome;
  gameResults: MatchOutcome[];
}

/** Keyed by the id of the game the changes were made heading into. */
export type SideboardChanges = Record<string, CardEntry[]>;

/** Outcome of an idempotent create: `created` is true only for the call that inserted. */
export interface WriteResult<T> {
  created: boolean;
  record: T | null;
}
