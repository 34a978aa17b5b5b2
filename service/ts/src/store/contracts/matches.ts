import type { MatchPlayerResult, SideboardChanges } from './common.js';

export interface MatchInput {
  id: number;
}

export interface MatchInsert {
  matchId: number;
  eventId: number;
}

export interface MatchRecord {
  matchId: number;
  eventId: number;
  position: number;
  playerResults: MatchPlayerResult[];
  sideboardChanges: SideboardChanges;
  createdAt?: string | null;
  updatedAt?: string | null;
}

export interface MatchUpdate {
  playerResults?: MatchPlayerResult[];
  sideboardChanges?: SideboardChanges;
}
