import 'dotenv/config';

import { readFile } from 'node:fs/promises';

import pg from 'pg';

import { loadConfig, requireDatabaseUrl } from './config';
import { errorString, normalizeError } from './errors';
import { configureLogging, getLogger } from './logger';

const SCHEMA_FILES = ['001-inventory-schema.sql'] as const;

const logger = getLogger('migrate');

async function main(): Promise<void> {
  const config = loadConfig();
  await configureLogging({ level: config.logLevel });
  const client = new pg.Client({ connectionString: requireDatabaseUrl(config) });
  await client.connect();
  try {
    for (const file of SCHEMA_FILES) {
      const sql = await readFile(new URL(`../sql/${file}`, import.meta.url), 'utf8');
      await client.query(sql);
      logger.info`Applied ${file}`;
    }
  } finally {
    await client.end();
  }
}

// Logging may not be configured yet when startup fails, so this goes straight to stderr.
main().catch((error: unknown) => {
  console.error(`Migration failed: ${errorString(normalizeError(error))}`);
  process.exitCode = 1;
});
