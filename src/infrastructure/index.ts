export { createDbClient, ensureSchema, PostgresOutboxStore, outboxEvents, invoices } from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { InMemoryOutboxStore, DuplicateKeyError } from './memory/index.js';
export { HttpFanoutSender, LoggingSender, fanoutUrl } from './notifications/index.js';
export type { FanoutConfig } from './notifications/index.js';
