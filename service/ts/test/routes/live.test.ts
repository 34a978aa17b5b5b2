import { test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

import { NotificationSchema } from '../../src/ingest/notifications.js';
import { createTestApp } from '../helpers/app.js';
import { lineReader, listen, waitUntil } from '../helpers/http.js';

test('the live feed streams dispatch outcomes filtered by type', async () => {
  const { app, dispatcher, feed } = createTestApp();
  const server = await listen(app);
  const controller = new AbortController();

  try {
    const res = await fetch(`${server.baseUrl}/v1/live?types=event.created,match.created`, {
      signal: controller.signal,
    });
    assert.equal(res.headers.get('content-type'), 'application/x-ndjson');
    await waitUntil(() => feed.subscriberCount === 1);

    await dispatcher.dispatch(
      NotificationSchema.parse({
        type: 'event.created',
        event: { id: 100, format: 'Modern', description: 'Modern Challenge', startTime: '2024-03-01T10:00:00Z' },
      })
    );
    await dispatcher.dispatch(NotificationSchema.parse({ type: 'event.released', eventId: 100 }));
    await dispatcher.dispatch(NotificationSchema.parse({ type: 'match.created', match: { id: 200 }, eventId: 100 }));

    const lines = lineReader(res.body);
    const first = JSON.parse((await lines.next()) ?? 'null');
    const second = JSON.parse((await lines.next()) ?? 'null');

    assert.deepEqual(
      [first.type, first.accepted, first.created, first.event_id],
      ['event.created', true, true, 100]
    );
    assert.deepEqual(
      [second.type, second.match_id, second.event_id],
      ['match.created', 200, 100]
    );

    controller.abort();
    await waitUntil(() => feed.subscriberCount === 0);
  } finally {
    await server.close();
  }
});

test('unknown feed types are rejected', async () => {
  const { app } = createTestApp();

  const res = await request(app).get('/v1/live').query({ types: 'event.created,event.deleted' });

  assert.equal(res.status, 400);
  assert.equal(res.body.error, 'validation_error');
});
