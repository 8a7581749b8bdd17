import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createDbClient, ensureSchema, PostgresOutboxStore } from './infrastructure/index.js';

export interface ProcessContext {
  config: AppConfig;
  log: Logger;
  store: PostgresOutboxStore;
  signal: AbortSignal;
}

// Upper bound on how long a stopping loop may take before we force exit
const SHUTDOWN_GRACE_MS = 10_000;

/**
 * Shared lifecycle for the standalone processes.
 *
 * 1) Load config, create the logger and the database client.
 * 2) Ensure tables exist.
 * 3) Run `main` until it returns (its loop ends once the signal aborts).
 * 4) Close the connection pool.
 *
 * SIGINT / SIGTERM abort the signal; loops finish their current cycle
 * and return.
 */
export function runProcess(
  name: string,
  main: (ctx: ProcessContext) => Promise<void>,
): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    pino({ name }).fatal({ err }, 'Invalid configuration');
    process.exit(1);
  }

  const log = pino({ name, level: config.logLevel });
  const { sql, db } = createDbClient(config.databaseUrl, { log });
  const store = new PostgresOutboxStore(db);

  const ac = new AbortController();

  const shutdown = (signal: NodeJS.Signals): void => {
    if (ac.signal.aborted) return;
    log.info({ signal }, `Shutting down ${name}...`);
    ac.abort();

    setTimeout(() => {
      log.warn('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const run = async (): Promise<void> => {
    try {
      await ensureSchema(sql);
      log.info('Database ready (outbox_events + invoices tables)');

      await main({ config, log, store, signal: ac.signal });
    } finally {
      await sql.end({ timeout: 5 });
      log.info('Database disconnected');
    }
  };

  run().catch((err: unknown) => {
    log.fatal({ err }, `${name} crashed`);
    process.exit(1);
  });
}
