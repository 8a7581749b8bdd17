import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { Logger } from 'pino';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. Each process runs one serial loop, so a few connections suffice. */
  maxConnections?: number;
  /** Receives server notices (e.g. "relation already exists, skipping") at debug level. */
  log?: Logger;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns the raw `sql` connection, used for bootstrap DDL and to close
 * the pool, and the typed `db` instance the outbox store queries through.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const { log } = options;

  const sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 5,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => {
      log?.debug({ code: notice['code'] }, notice['message'] ?? 'Postgres notice');
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];
