import { mock, test } from 'node:test';
import assert from 'node:assert/strict';

import { EventLifecycle, LifecycleRegistry } from '../../src/ingest/lifecycle.js';
import { EventWriter } from '../../src/ingest/writer.js';
import { MemoryStore } from '../../src/store/memory.js';
import { TEST_WRITER_OPTIONS } from '../helpers/app.js';

const NOW = new Date('2024-03-01T20:00:00.000Z');
const clock = () => NOW;

const recordingWriter = () => ({
  updateEventEndTime: mock.fn(async (_eventId: number, _endTime: Date) => true),
  getEvent: mock.fn(async (_eventId: number) => null),
});

const createEvent = (writer: EventWriter) =>
  writer.addEvent({
    id: 100,
    format: 'Modern',
    description: 'Modern Challenge',
    startTime: new Date('2024-03-01T10:00:00.000Z'),
  });

test('an event that is already complete finalizes on construction', async () => {
  const writer = recordingWriter();
  const endTime = new Date('2024-03-01T18:00:00.000Z');

  const lifecycle = new EventLifecycle({ id: 100, completed: true, endTime }, writer, clock);
  await lifecycle.settled();

  assert.equal(lifecycle.state, 'finalized');
  assert.deepEqual(
    writer.updateEventEndTime.mock.calls.map((call) => call.arguments),
    [[100, endTime]]
  );
});

test('completion finalizes once, however often it is reported', async () => {
  const writer = recordingWriter();
  const lifecycle = new EventLifecycle({ id: 100, completed: false }, writer, clock);
  assert.equal(lifecycle.state, 'active');

  await lifecycle.complete();
  await lifecycle.complete(new Date('2024-03-01T21:00:00.000Z'));
  await lifecycle.dispose();
  await lifecycle.dispose();

  assert.equal(writer.updateEventEndTime.mock.callCount(), 1);
  assert.deepEqual(writer.updateEventEndTime.mock.calls[0]?.arguments, [100, NOW]);
});

test('teardown of an unfinished event writes nothing', async () => {
  const writer = recordingWriter();
  const lifecycle = new EventLifecycle({ id: 100, completed: false }, writer, clock);

  assert.equal(await lifecycle.dispose(), false);
  assert.equal(lifecycle.state, 'active');
  assert.equal(writer.updateEventEndTime.mock.callCount(), 0);
});

test('teardown re-reads completion from the source', async () => {
  const writer = recordingWriter();
  const source: { id: number; completed: boolean; endTime: Date | null } = { id: 100, completed: false, endTime: null };
  const lifecycle = new EventLifecycle(source, writer, clock);

  source.completed = true;
  source.endTime = new Date('2024-03-01T17:30:00.000Z');
  await lifecycle.dispose();

  assert.deepEqual(writer.updateEventEndTime.mock.calls[0]?.arguments, [100, source.endTime]);
});

test('a failed end time write is logged, not thrown', async (t) => {
  const error = t.mock.method(console, 'error', () => undefined);
  const writer = {
    updateEventEndTime: async () => {
      throw new Error('store offline');
    },
    getEvent: async () => null,
  };

  const lifecycle = new EventLifecycle({ id: 100, completed: false }, writer, clock);

  assert.equal(await lifecycle.complete(), false);
  assert.equal(lifecycle.state, 'active');
  assert.equal(error.mock.calls[0]?.arguments[0], 'event_finalize_error');
});

test('the registry routes completion and finalizes completed events on shutdown', async () => {
  const writer = recordingWriter();
  const registry = new LifecycleRegistry(writer, clock);

  const tracked = registry.track({ id: 100, completed: false });
  assert.equal(registry.track({ id: 100, completed: false }), tracked);
  registry.track({ id: 101, completed: false });
  await registry.complete(102, new Date('2024-03-01T16:00:00.000Z'));
  assert.equal(registry.size, 3);

  assert.equal(await registry.release(101), false);
  assert.equal(await registry.release(101), false);
  assert.equal(registry.size, 2);

  await registry.disposeAll();

  assert.equal(registry.size, 0);
  assert.deepEqual(
    writer.updateEventEndTime.mock.calls.map((call) => call.arguments[0]),
    [102]
  );
});

test('competing trackers for one event store the first end time only', async () => {
  const store = new MemoryStore();
  const writer = new EventWriter(store, TEST_WRITER_OPTIONS);
  await createEvent(writer);

  const first = new EventLifecycle({ id: 100, completed: false }, writer, clock);
  const second = new EventLifecycle({ id: 100, completed: false }, writer, clock);

  const results = await Promise.all([
    first.complete(new Date('2024-03-01T18:00:00.000Z')),
    second.complete(new Date('2024-03-01T18:05:00.000Z')),
  ]);

  assert.deepEqual(results, [true, true]);
  assert.equal(first.state, 'finalized');
  assert.equal(second.state, 'finalized');
  assert.equal((await store.getEvent(100))?.endTime, '2024-03-01T18:00:00.000Z');
});

test('a completion that beats the event row is applied once the event is tracked', async (t) => {
  const warn = t.mock.method(console, 'warn', () => undefined);
  const store = new MemoryStore();
  const writer = new EventWriter(store, TEST_WRITER_OPTIONS);
  const registry = new LifecycleRegistry(writer, clock);

  assert.equal(await registry.complete(100, new Date('2024-03-01T18:00:00.000Z')), false);
  assert.equal(registry.get(100)?.state, 'active');
  assert.equal(warn.mock.calls[0]?.arguments[0], 'event_end_time_deferred');

  await createEvent(writer);
  const tracker = registry.track({ id: 100, completed: false });

  assert.equal(await tracker.settled(), true);
  assert.equal(tracker.state, 'finalized');
  assert.equal((await store.getEvent(100))?.endTime, '2024-03-01T18:00:00.000Z');
});
