import 'dotenv/config';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import pg from 'pg';

import { loadConfig, requireDatabaseUrl } from './config';
import { createMotorpool } from './create-motorpool';
import { errorString, normalizeError } from './errors';
import { instrument } from './instrumentation';
import { configureLogging, getLogger } from './logger';
import { createMCP } from './mcp';
import { fromPool, PostgresInventoryStore } from './store/postgres-store';

const logger = getLogger('server');

async function main(): Promise<void> {
  const config = loadConfig();
  await configureLogging({ level: config.logLevel });

  const pool = new pg.Pool({
    connectionString: requireDatabaseUrl(config),
    max: config.poolMax,
    // server-side limit; query_timeout only stops the client from waiting
    statement_timeout: config.storageTimeoutMs,
    query_timeout: config.storageTimeoutMs,
  });
  pool.on('error', (error) => {
    logger.error`Idle PostgreSQL client failed: ${errorString(normalizeError(error))}`;
  });

  const { gateway } = createMotorpool({
    store: new PostgresInventoryStore(fromPool(pool)),
    storageTimeoutMs: config.storageTimeoutMs,
    maxPageSize: config.maxPageSize,
    defaultPageSize: config.defaultPageSize,
  });
  const uninstrument = instrument(gateway);
  const server = createMCP(gateway);

  const shutdown = async () => {
    uninstrument();
    await server.close();
    await pool.end();
  };
  process.once('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      logger.error`Shutdown failed: ${errorString(normalizeError(error))}`;
      process.exitCode = 1;
    });
  });

  await server.connect(new StdioServerTransport());
  logger.info`Serving ${gateway.operations().length} operations over stdio`;
}

// Logging may not be configured yet when startup fails, so this goes straight to stderr.
main().catch((error: unknown) => {
  console.error(`Server failed to start: ${errorString(normalizeError(error))}`);
  process.exitCode = 1;
});
