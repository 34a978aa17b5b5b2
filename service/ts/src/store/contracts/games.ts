import type { GameLogType, GamePlayerResult } from './common.js';

export interface GameInput {
  id: number;
}

export interface GameInsert {
  gameId: number;
  matchId: number;
}

export interface GameRecord {
  gameId: number;
  matchId: number;
  position: number;
  playerResults: GamePlayerResult[];
  createdAt?: string | null;
  updatedAt?: string | null;
}

export interface GameLogInsert {
  logId: string;
  gameId: number;
  timestamp: Date;
  type: GameLogType;
  data: string;
}

export interface GameLogRecord {
  logId: string;
  gameId: number;
  timestamp: string;
  type: GameLogType;
  data: string;
}
