#!/usr/bin/env tsx

/**
 * Print the browser login URL and, once a request token is available,
 * exchange it for a session and print the profile.
 *
 * Usage:
 *   tsx examples/print-login-url.ts
 *   KITE_REQUEST_TOKEN=... npm run example:login
 */

import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { KiteClient, isClassifiedError } from '../src/index';

// Load environment variables from examples/.env
dotenv.config({ path: path.join(path.dirname(fileURLToPath(import.meta.url)), '.env') });

const BANNER_WIDTH = 80;

function printBanner(title: string) {
  const padding = Math.floor((BANNER_WIDTH - title.length - 2) / 2);
  const border = '='.repeat(BANNER_WIDTH);
  console.log('\n' + border);
  console.log(
    '=' + ' '.repeat(padding) + title + ' '.repeat(BANNER_WIDTH - padding - title.length - 2) + '='
  );
  console.log(border + '\n');
}

function printError(message: string) {
  console.error(`❌ ${message}`);
}

async function main(): Promise<void> {
  const apiKey = process.env.KITE_API_KEY;
  if (!apiKey) {
    printError('KITE_API_KEY is not set');
    process.exitCode = 1;
    return;
  }

  const client = KiteClient.create({ apiKey, logging: { level: 'warn', format: 'pretty' } });

  printBanner('Kite Connect Login');
  console.log(`Open this URL and log in:\n\n  ${client.loginUrl()}\n`);

  const requestToken = process.env.KITE_REQUEST_TOKEN;
  const apiSecret = process.env.KITE_API_SECRET;
  if (!requestToken || !apiSecret) {
    console.log('Set KITE_REQUEST_TOKEN and KITE_API_SECRET to exchange the redirect token.');
    await client.close();
    return;
  }

  try {
    const session = await client.session.generateSession(requestToken, apiSecret);
    console.log(`✅ Session created for ${session.user_id}`);
    console.log(JSON.stringify(await client.session.profile(), null, 2));
  } catch (error: unknown) {
    if (isClassifiedError(error)) {
      printError(`${error.kind}: ${error.message}`);
    } else {
      throw error;
    }
    process.exitCode = 1;
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  printError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
