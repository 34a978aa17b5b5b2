import type { CardEntry } from './common.js';

export interface DeckInput {
  hash: string;
  deckId: number;
  name: string;
  format: string;
  timestamp: Date;
  mainboard: CardEntry[];
  sideboard: CardEntry[];
}

export interface DeckRecord {
  hash: string;
  deckId: number;
  name: string;
  format: string;
  timestamp: string;
  mainboard: CardEntry[];
  sideboard: CardEntry[];
}

export interface EventInput {
  id: number;
  format: string;
  description: string;
  startTime: Date;
  deck?: DeckInput | null;
}

export interface EventInsert {
  eventId: number;
  format: string;
  description: string;
  deckHash: string | null;
  startTime: Date;
}

export interface EventRecord {
  eventId: number;
  format: string;
  description: string;
  deckHash: string | null;
  startTime: string;
  endTime: string | null;
  createdAt?: string | null;
}

export interface EventListQuery {
  format?: string | null;
  cursor?: string;
  limit?: number;
}

export interface EventListResult {
  items: EventRecord[];
  nextCursor?: string;
}
