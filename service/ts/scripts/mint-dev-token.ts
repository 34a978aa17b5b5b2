#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { INGEST_SCOPE, signIngestToken } from '../src/auth.js';
import { loadConfig } from '../src/config.js';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('mint-dev-token')
    .usage('$0 --subject <name> [options]')
    .option('subject', {
      type: 'string',
      alias: 's',
      describe: 'Name of the notification source the token is for',
      demandOption: true,
    })
    .option('scope', {
      type: 'string',
      array: true,
      describe: `Scopes to grant; defaults to ${INGEST_SCOPE}`,
    })
    .option('expires-in', {
      type: 'number',
      alias: 'e',
      default: 3600,
      describe: 'Lifetime in seconds',
    })
    .help()
    .parseAsync();

  // Signed against the service's own auth settings so the guards accept it.
  const { auth } = loadConfig();
  const minted = signIngestToken(auth, {
    subject: argv.subject,
    scopes: (argv.scope ?? []).flatMap((entry) => entry.split(/[\s,]+/)).filter(Boolean),
    expiresInSeconds: argv['expires-in'],
  });

  console.log(JSON.stringify({ ...minted, audience: auth.audience, issuer: auth.issuer }, null, 2));
}

main().catch((err) => {
  console.error('mint_dev_token_failed', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
