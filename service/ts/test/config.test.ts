import { test } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError, loadConfig } from '../src/config.js';

test('defaults apply when nothing is set', () => {
  const config = loadConfig({});

  assert.deepEqual(config, {
    env: 'development',
    port: 8080,
    databaseUrl: null,
    parentWait: { timeoutMs: 10_000, pollIntervalMs: 100, maxPollIntervalMs: 2_000 },
    writeConflictRetries: 1,
    streamPageSize: 100,
    auth: { disabled: true, sharedSecret: null, audience: null, issuer: null },
  });
});

test('values are read from the environment', () => {
  const config = loadConfig({
    NODE_ENV: 'production',
    PORT: '9090',
    DATABASE_URL: 'postgres://localhost/playlog',
    PARENT_WAIT_TIMEOUT_MS: '2500',
    WRITE_CONFLICT_RETRIES: '0',
    AUTH_DEV_SHARED_SECRET: 'test-secret',
    AUTH_DEV_AUDIENCE: 'playlog',
    AUTH_DEV_ISSUER: '',
  });

  assert.equal(config.port, 9090);
  assert.equal(config.databaseUrl, 'postgres://localhost/playlog');
  assert.equal(config.parentWait.timeoutMs, 2500);
  assert.equal(config.writeConflictRetries, 0);
  assert.deepEqual(config.auth, { disabled: false, sharedSecret: 'test-secret', audience: 'playlog', issuer: null });
});

test('AUTH_DISABLE turns auth off even with a secret', () => {
  assert.equal(loadConfig({ AUTH_DISABLE: '1', AUTH_DEV_SHARED_SECRET: 'test-secret' }).auth.disabled, true);
});

test('invalid values fail fast', () => {
  assert.throws(
    () => loadConfig({ PORT: 'eighty' }),
    (err: unknown) => err instanceof ConfigError && err.issues.length === 1 && err.issues[0]?.startsWith('PORT: ') === true
  );
  assert.throws(() => loadConfig({ WRITE_CONFLICT_RETRIES: '11' }), ConfigError);
  assert.throws(
    () => loadConfig({ PARENT_WAIT_POLL_MS: '500', PARENT_WAIT_MAX_POLL_MS: '100' }),
    (err: unknown) =>
      err instanceof ConfigError && err.issues[0] === 'PARENT_WAIT_MAX_POLL_MS must be >= PARENT_WAIT_POLL_MS'
  );
});
