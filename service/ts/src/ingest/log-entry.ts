import { createHash } from 'crypto';

import type { GameLogType } from '../store/index.js';

export { GAME_LOG_TYPES } from '../store/index.js';
export type { GameLogType } from '../store/index.js';

/** One observed state change inside a game. */
export interface GameLogEntry {
  readonly gameId: number;
  readonly timestamp: Date;
  readonly type: GameLogType;
  readonly data: string;
}

// 64 bits of the digest; collisions are only deduplicated within one game.
const LOG_ID_HEX_LENGTH = 16;

export const createGameLogEntry = (
  gameId: number,
  timestamp: Date,
  type: GameLogType,
  data: string
): GameLogEntry =>
  Object.freeze({
    gameId,
    timestamp: new Date(timestamp.getTime()),
    type,
    data,
  });

/** Chronological order, ties broken by game id. */
export const compareGameLogEntries = (a: GameLogEntry, b: GameLogEntry): number => {
  const diff = a.timestamp.getTime() - b.timestamp.getTime();
  if (diff !== 0) return diff;
  return a.gameId - b.gameId;
};

/**
 * Content-derived identity: redelivered copies of an entry map to the same id,
 * so duplicates collapse on insert without a read-modify-write.
 */
export const deriveGameLogId = (entry: GameLogEntry): string => {
  const digest = createHash('sha256')
    .update(JSON.stringify([entry.gameId, entry.timestamp.toISOString(), entry.type, entry.data]))
    .digest('hex');
  return `${entry.gameId}-${digest.slice(0, LOG_ID_HEX_LENGTH)}`;
};
