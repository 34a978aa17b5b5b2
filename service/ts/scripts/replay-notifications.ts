#!/usr/bin/env tsx
import 'dotenv/config';
import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';
import { getPool } from '../src/db/client.js';
import { NotificationDispatcher } from '../src/ingest/dispatcher.js';
import { replayNotifications } from '../src/ingest/replay.js';
import { EventWriter } from '../src/ingest/writer.js';
import { getStore } from '../src/store/index.js';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('replay-notifications')
    .usage('$0 <file> [options]')
    .option('batch-size', {
      type: 'number',
      alias: 'b',
      default: 1,
      describe: 'Notifications dispatched concurrently per batch',
    })
    .option('wait-timeout-ms', {
      type: 'number',
      describe: 'Override PARENT_WAIT_TIMEOUT_MS for this run',
    })
    .demandCommand(1, 'Provide the NDJSON file to replay, one notification per line')
    .help()
    .parseAsync();

  const file = String(argv._[0]);
  const config = loadConfig();
  const store = getStore(config.databaseUrl ?? undefined);
  const writer = new EventWriter(store, {
    readiness: {
      ...config.parentWait,
      ...(argv['wait-timeout-ms'] ? { timeoutMs: argv['wait-timeout-ms'] } : {}),
    },
    conflictRetry: { retries: config.writeConflictRetries },
  });
  const dispatcher = new NotificationDispatcher(writer);

  const lines = createInterface({ input: createReadStream(file, 'utf8'), crlfDelay: Infinity });
  try {
    const report = await replayNotifications(lines, dispatcher, { batchSize: argv['batch-size'] });
    console.log(
      `Replayed ${report.dispatched} of ${report.lines} notification(s) from ${file}; ${report.accepted} accepted.`
    );
    for (const failure of report.invalid) {
      console.warn(`- line ${failure.line}: ${failure.message}`);
    }
    if (report.invalid.length) process.exitCode = 2;
  } finally {
    await dispatcher.close();
  }
}

main()
  .catch((err) => {
    console.error('replay_notifications_failed', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(async () => {
    if (!process.env.DATABASE_URL) return;
    try {
      await getPool().end();
    } catch (err) {
      console.error('Failed to close database connection', err);
    }
  });
