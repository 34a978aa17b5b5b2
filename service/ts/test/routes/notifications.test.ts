import { test } from 'node:test';
import assert from 'node:assert/strict';
import jwt from 'jsonwebtoken';
import request from 'supertest';

import { createTestApp } from '../helpers/app.js';

const SECRET = 'test-secret';
const AUTH_ENABLED = { disabled: false, sharedSecret: SECRET, audience: 'playlog-test', issuer: null };

const token = (scope: string, audience = 'playlog-test') =>
  jwt.sign({ sub: 'ingest-worker', scope }, SECRET, { algorithm: 'HS256', audience, expiresIn: 60 });

const eventCreated = {
  type: 'event.created',
  event: { id: 100, format: 'Modern', description: 'Modern Challenge', startTime: '2024-03-01T10:00:00Z' },
};

test('a single notification is dispatched and its outcome returned', async () => {
  const { app, store } = createTestApp();

  const res = await request(app).post('/v1/notifications').send(eventCreated);

  assert.equal(res.status, 202, res.text);
  assert.deepEqual(res.body, {
    accepted: 1,
    outcomes: [{ type: 'event.created', accepted: true, created: true, event_id: 100 }],
  });
  assert.equal((await store.getEvent(100))?.startTime, '2024-03-01T10:00:00.000Z');
});

test('a batch may carry children ahead of their parents', async () => {
  const { app, store } = createTestApp();

  const res = await request(app)
    .post('/v1/notifications')
    .send({
      notifications: [
        { type: 'game.created', game: { id: 300 }, matchId: 200 },
        { type: 'match.created', match: { id: 200 }, eventId: 100 },
        eventCreated,
        {
          type: 'game.results',
          gameId: 404,
          results: [{ player: 'alice', result: 'WIN' }],
        },
      ],
    });

  assert.equal(res.status, 202, res.text);
  assert.equal(res.body.accepted, 3);
  assert.deepEqual(res.body.outcomes[3], { type: 'game.results', accepted: false, game_id: 404 });
  assert.equal((await store.getGame(300))?.matchId, 200);
});

test('invalid notifications are rejected before anything is written', async () => {
  const { app, store } = createTestApp();

  const res = await request(app)
    .post('/v1/notifications')
    .send({ notifications: [eventCreated, { type: 'match.created', match: { id: 'x' }, eventId: 100 }] });

  assert.equal(res.status, 400);
  assert.equal(res.body.error, 'validation_error');
  assert.equal(await store.getEvent(100), null);
});

test('ids beyond the integer column range are rejected', async () => {
  const { app, store } = createTestApp();

  const res = await request(app)
    .post('/v1/notifications')
    .send({ ...eventCreated, event: { ...eventCreated.event, id: 2_147_483_648 } });
  const lookup = await request(app).get('/v1/events/2147483648');

  assert.equal(res.status, 400);
  assert.equal(res.body.error, 'validation_error');
  assert.equal(await store.rowExists('event', 2_147_483_648), false);
  assert.equal(lookup.status, 400);
  assert.equal(lookup.body.error, 'validation_error');
});

test('ingestion requires a bearer token carrying the write scope', async (t) => {
  t.mock.method(console, 'warn', () => undefined);
  const { app } = createTestApp({ auth: AUTH_ENABLED });

  const missing = await request(app).post('/v1/notifications').send(eventCreated);
  assert.equal(missing.status, 401);
  assert.equal(missing.body.error, 'missing_token');

  const wrongAudience = await request(app)
    .post('/v1/notifications')
    .set('Authorization', `Bearer ${token('notifications:write', 'someone-else')}`)
    .send(eventCreated);
  assert.equal(wrongAudience.status, 401);
  assert.equal(wrongAudience.body.error, 'invalid_token');

  const readOnly = await request(app)
    .post('/v1/notifications')
    .set('Authorization', `Bearer ${token('events:read')}`)
    .send(eventCreated);
  assert.equal(readOnly.status, 403);
  assert.deepEqual(readOnly.body, { error: 'insufficient_scope', required: 'notifications:write' });

  const allowed = await request(app)
    .post('/v1/notifications')
    .set('Authorization', `Bearer ${token('events:read notifications:write')}`)
    .send(eventCreated);
  assert.equal(allowed.status, 202, allowed.text);

  const reads = await request(app).get('/v1/events/100');
  assert.equal(reads.status, 200);
});
