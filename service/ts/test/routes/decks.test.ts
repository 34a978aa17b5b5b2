import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

import type { EventWriter } from '../../src/ingest/writer.js';
import { createTestApp } from '../helpers/app.js';

let context: ReturnType<typeof createTestApp>;
let agent: ReturnType<typeof request>;

beforeEach(() => {
  context = createTestApp();
  agent = request(context.app);
});

const burn = {
  hash: 'deck-a',
  deckId: 1,
  name: 'Burn',
  format: 'Modern',
  timestamp: new Date('2024-02-28T12:00:00.000Z'),
  mainboard: [
    { catalogId: 10, name: 'Mountain', quantity: 20 },
    { catalogId: 11, name: 'Lightning Bolt', quantity: 4 },
  ],
  sideboard: [{ catalogId: 12, name: 'Smash to Smithereens', quantity: 3 }],
};

const seed = async (writer: EventWriter) => {
  await writer.addEvent({
    id: 100,
    format: 'Modern',
    description: 'Modern Challenge',
    startTime: new Date('2024-03-01T10:00:00.000Z'),
    deck: burn,
  });
  await writer.addEvent({
    id: 101,
    format: 'Pauper',
    description: 'Pauper League',
    startTime: new Date('2024-03-02T10:00:00.000Z'),
    deck: {
      hash: 'deck-b',
      deckId: 2,
      name: 'Faeries',
      format: 'Pauper',
      timestamp: new Date('2024-03-01T12:00:00.000Z'),
      mainboard: [{ catalogId: 20, name: 'Island', quantity: 16 }],
      sideboard: [],
    },
  });
  await writer.addEvent({
    id: 102,
    format: 'Modern',
    description: 'Modern League',
    startTime: new Date('2024-03-03T10:00:00.000Z'),
    deck: {
      hash: 'deck-c',
      deckId: 3,
      name: 'Elves',
      format: 'Modern',
      timestamp: new Date('2024-03-02T12:00:00.000Z'),
      mainboard: [{ catalogId: 30, name: 'Forest', quantity: 18 }],
      sideboard: [
        { catalogId: 31, name: 'Pick Your Poison', quantity: 2 },
        { catalogId: 32, name: 'Choke', quantity: 1 },
      ],
    },
  });
  await writer.addEvent({
    id: 103,
    format: 'Modern',
    description: 'Modern Preliminary',
    startTime: new Date('2024-03-04T10:00:00.000Z'),
    deck: burn,
  });
};

test('decks are grouped by format, newest first, with card counts', async () => {
  await seed(context.writer);

  const res = await agent.get('/v1/decks');

  assert.equal(res.status, 200, res.text);
  assert.deepEqual(Object.keys(res.body.decks), ['Modern', 'Pauper']);
  assert.deepEqual(res.body.decks.Modern, [
    {
      hash: 'deck-c',
      deck_id: 3,
      name: 'Elves',
      format: 'Modern',
      timestamp: '2024-03-02T12:00:00.000Z',
      mainboard_count: 18,
      sideboard_count: 3,
    },
    {
      hash: 'deck-a',
      deck_id: 1,
      name: 'Burn',
      format: 'Modern',
      timestamp: '2024-02-28T12:00:00.000Z',
      mainboard_count: 24,
      sideboard_count: 3,
    },
  ]);
  assert.deepEqual(
    res.body.decks.Pauper.map((deck: { hash: string; sideboard_count: number }) => [deck.hash, deck.sideboard_count]),
    [['deck-b', 0]]
  );
});

test('deck identifiers are listed newest first', async () => {
  await seed(context.writer);

  const res = await agent.get('/v1/decks/identifiers');

  assert.equal(res.status, 200, res.text);
  assert.deepEqual(res.body, {
    decks: [
      { hash: 'deck-c', deck_id: 3, name: 'Elves', format: 'Modern' },
      { hash: 'deck-b', deck_id: 2, name: 'Faeries', format: 'Pauper' },
      { hash: 'deck-a', deck_id: 1, name: 'Burn', format: 'Modern' },
    ],
  });
});

test('a deck is returned with its cards', async () => {
  await seed(context.writer);

  const res = await agent.get('/v1/decks/deck-a');

  assert.equal(res.status, 200, res.text);
  assert.deepEqual(res.body, {
    deck: {
      hash: 'deck-a',
      deck_id: 1,
      name: 'Burn',
      format: 'Modern',
      timestamp: '2024-02-28T12:00:00.000Z',
      mainboard: [
        { catalog_id: 10, name: 'Mountain', quantity: 20 },
        { catalog_id: 11, name: 'Lightning Bolt', quantity: 4 },
      ],
      sideboard: [{ catalog_id: 12, name: 'Smash to Smithereens', quantity: 3 }],
    },
  });
});

test('an unknown deck hash is not found', async () => {
  const res = await agent.get('/v1/decks/missing');

  assert.equal(res.status, 404);
  assert.equal(res.body.error, 'deck_not_found');
});

test('no decks yields an empty grouping', async () => {
  const res = await agent.get('/v1/decks');

  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { decks: {} });
});
