import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { createGameLogEntry } from '../../src/ingest/log-entry.js';
import { EventWriter } from '../../src/ingest/writer.js';
import type { DeckInput, EventInput } from '../../src/store/index.js';
import { MemoryStore } from '../../src/store/memory.js';
import { TEST_WRITER_OPTIONS } from '../helpers/app.js';

let store: MemoryStore;
let writer: EventWriter;

beforeEach(() => {
  store = new MemoryStore();
  writer = new EventWriter(store, TEST_WRITER_OPTIONS);
});

const deck: DeckInput = {
  hash: 'deck-hash-1',
  deckId: 9,
  name: 'Mono Red',
  format: 'Modern',
  timestamp: new Date('2024-02-28T12:00:00.000Z'),
  mainboard: [{ catalogId: 1, name: 'Mountain', quantity: 20 }],
  sideboard: [{ catalogId: 2, name: 'Smash to Smithereens', quantity: 3 }],
};

const event = (id: number, overrides: Partial<EventInput> = {}): EventInput => ({
  id,
  format: 'Modern',
  description: `Modern Challenge ${id}`,
  startTime: new Date('2024-03-01T10:00:00.000Z'),
  ...overrides,
});

test('adding an event twice creates it once', async () => {
  const first = await writer.addEvent(event(100));
  const second = await writer.addEvent(event(100, { description: 'renamed' }));

  assert.equal(first.created, true);
  assert.equal(second.created, false);
  assert.equal(second.record?.description, 'Modern Challenge 100');
  assert.deepEqual(second.record, first.record);
});

test('concurrent adds of one event report created exactly once', async () => {
  const results = await Promise.all([writer.addEvent(event(100)), writer.addEvent(event(100))]);

  assert.deepEqual(
    results.map((result) => result.created).sort(),
    [false, true]
  );
  assert.ok(results.every((result) => result.record?.eventId === 100));
});

test('events sharing a deck store it once', async () => {
  await writer.addEvent(event(100, { deck }));
  const second = await writer.addEvent(event(101, { deck }));

  assert.equal(second.created, true);
  assert.equal(second.record?.deckHash, 'deck-hash-1');
  assert.deepEqual((await store.getDeck('deck-hash-1'))?.mainboard, deck.mainboard);
});

test('children arriving before their parents attach once the parents land', async () => {
  const game = writer.addGame({ id: 300 }, 200);
  const matches = Promise.all([writer.addMatch({ id: 200 }, 100), writer.addMatch({ id: 201 }, 100)]);
  await new Promise<void>((resolve) => setTimeout(resolve, 20));
  const created = await writer.addEvent(event(100));

  const [match200, match201] = await matches;
  const game300 = await game;

  assert.equal(created.created, true);
  assert.equal(match200.created, true);
  assert.equal(match201.created, true);
  assert.deepEqual(
    [match200.record?.position, match201.record?.position].sort(),
    [0, 1]
  );
  assert.equal(game300.created, true);
  assert.equal(game300.record?.matchId, 200);
  assert.equal(game300.record?.position, 0);

  const stored = await store.listMatches(100);
  assert.deepEqual(
    stored.map((match) => match.position),
    [0, 1]
  );
  assert.deepEqual(
    (await writer.getGames(200)).map((row) => row.gameId),
    [300]
  );
});

test('a parent that never appears leaves no child behind', async (t) => {
  const warn = t.mock.method(console, 'warn', () => undefined);

  const result = await writer.addMatch({ id: 200 }, 404, { timeoutMs: 30 });

  assert.deepEqual(result, { created: false, record: null });
  assert.equal(await store.getMatch(200), null);
  assert.equal(warn.mock.calls[0]?.arguments[0], 'match_parent_missing');
});

test('an aborted wait gives up without writing', async (t) => {
  t.mock.method(console, 'warn', () => undefined);
  const controller = new AbortController();

  const pending = writer.addGame({ id: 300 }, 200, { signal: controller.signal });
  controller.abort();

  assert.deepEqual(await pending, { created: false, record: null });
  assert.equal(await store.getGame(300), null);
});

test('an event end time is set once', async () => {
  await writer.addEvent(event(100));

  const results = await Promise.all([
    writer.updateEventEndTime(100, new Date('2024-03-01T18:00:00.000Z')),
    writer.updateEventEndTime(100, new Date('2024-03-01T19:00:00.000Z')),
  ]);

  assert.deepEqual(results, [true, false]);
  assert.equal((await store.getEvent(100))?.endTime, '2024-03-01T18:00:00.000Z');
  assert.equal(await writer.updateEventEndTime(100, new Date('2024-03-02T00:00:00.000Z')), false);
});

test('duplicate log entries delivered concurrently are stored once', async () => {
  await writer.addEvent(event(100));
  await writer.addMatch({ id: 200 }, 100);
  await writer.addGame({ id: 300 }, 200);
  const entry = createGameLogEntry(300, new Date('2024-03-01T10:05:00.000Z'), 'ZoneChange', 'Bolt -> Graveyard');

  const inserted = await Promise.all([writer.addGameLog(entry), writer.addGameLog(entry), writer.addGameLog(entry)]);

  assert.deepEqual(
    [...inserted].sort(),
    [false, false, true]
  );
  assert.equal((await store.listGameLogs(300)).length, 1);
});

test('results and sideboard changes update their rows', async () => {
  await writer.addEvent(event(100));
  await writer.addMatch({ id: 200 }, 100);
  await writer.addGame({ id: 300 }, 200);
  await writer.addGame({ id: 301 }, 200);

  assert.equal(
    await writer.updateGameResults(300, [{ player: 'alice', result: 'WIN', playDraw: 'PLAY', clockSeconds: 1200 }]),
    true
  );
  assert.equal(
    await writer.updateMatchResults(200, [{ player: 'alice', result: 'WIN', gameResults: ['WIN', 'LOSS', 'WIN'] }]),
    true
  );

  const changes = [{ catalogId: 2, name: 'Smash to Smithereens', quantity: 2 }];
  const swapped = await Promise.all([
    writer.updateSideboardChanges(200, 300, changes),
    writer.updateSideboardChanges(200, 301, [{ catalogId: 1, name: 'Mountain', quantity: -2 }]),
  ]);
  assert.deepEqual(swapped, [true, true]);

  const match = await store.getMatch(200);
  assert.deepEqual(Object.keys(match?.sideboardChanges ?? {}).sort(), ['300', '301']);
  assert.deepEqual(match?.sideboardChanges['300'], changes);
  assert.deepEqual(match?.playerResults[0]?.gameResults, ['WIN', 'LOSS', 'WIN']);
  assert.equal((await store.getGame(300))?.playerResults[0]?.clockSeconds, 1200);
});

test('updates against missing rows report false', async (t) => {
  const warn = t.mock.method(console, 'warn', () => undefined);

  assert.equal(await writer.updateMatchResults(404, []), false);
  assert.equal(await writer.updateGameResults(404, []), false);
  assert.equal(await writer.updateSideboardChanges(404, 1, []), false);
  assert.deepEqual(
    warn.mock.calls.map((call) => call.arguments[0]),
    ['match_results_missing_row', 'game_results_missing_row', 'sideboard_changes_missing_row']
  );
});

test('store failures are reported in the result', async (t) => {
  const error = t.mock.method(console, 'error', () => undefined);
  t.mock.method(store, 'transaction', async () => {
    throw new Error('connection refused');
  });

  assert.deepEqual(await writer.addEvent(event(100)), { created: false, record: null });
  assert.equal(await writer.updateEventEndTime(100, new Date()), false);
  assert.equal(error.mock.calls[0]?.arguments[0], 'event_add_error');
});
