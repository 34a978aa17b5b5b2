import { test } from 'node:test';
import assert from 'node:assert/strict';
import jwt from 'jsonwebtoken';
import request from 'supertest';

import { signIngestToken } from '../src/auth.js';
import type { AuthConfig } from '../src/auth.js';
import { createTestApp } from './helpers/app.js';

const AUTH: AuthConfig = { disabled: false, sharedSecret: 'test-secret', audience: 'playlog-test', issuer: 'playlog-dev' };

const eventCreated = {
  type: 'event.created',
  event: { id: 100, format: 'Modern', description: 'Modern Challenge', startTime: '2024-03-01T10:00:00Z' },
};

test('a signed ingest token carries the write scope and the configured claims', () => {
  const minted = signIngestToken(AUTH, {
    subject: 'league-feed',
    expiresInSeconds: 600,
    now: () => new Date('2024-03-01T10:00:00.000Z'),
  });

  assert.deepEqual(minted.scopes, ['notifications:write']);
  assert.equal(minted.expiresAt, '2024-03-01T10:10:00.000Z');
  assert.deepEqual(jwt.decode(minted.token), {
    sub: 'league-feed',
    scope: 'notifications:write',
    iat: 1709287200,
    exp: 1709287800,
    aud: 'playlog-test',
    iss: 'playlog-dev',
  });
});

test('requested scopes replace the default and are deduplicated', () => {
  const minted = signIngestToken(AUTH, { subject: 'reader', scopes: ['events:read', 'events:read'] });

  assert.deepEqual(minted.scopes, ['events:read']);
});

test('signing without a shared secret fails', () => {
  assert.throws(
    () => signIngestToken({ ...AUTH, sharedSecret: null }, { subject: 'league-feed' }),
    /AUTH_DEV_SHARED_SECRET is not set/
  );
});

test('the guards accept signed tokens until they expire', async (t) => {
  t.mock.method(console, 'warn', () => undefined);
  const { app } = createTestApp({ auth: AUTH });
  const post = (token: string) =>
    request(app).post('/v1/notifications').set('Authorization', `Bearer ${token}`).send(eventCreated);

  const fresh = signIngestToken(AUTH, { subject: 'league-feed' });
  const accepted = await post(fresh.token);
  assert.equal(accepted.status, 202, accepted.text);

  const stale = signIngestToken(AUTH, {
    subject: 'league-feed',
    expiresInSeconds: 60,
    now: () => new Date(Date.now() - 3_600_000),
  });
  const expired = await post(stale.token);
  assert.equal(expired.status, 401);
  assert.equal(expired.body.error, 'invalid_token');

  const readOnly = signIngestToken(AUTH, { subject: 'dashboard', scopes: ['events:read'] });
  const forbidden = await post(readOnly.token);
  assert.equal(forbidden.status, 403);
  assert.deepEqual(forbidden.body, { error: 'insufficient_scope', required: 'notifications:write' });
});
