export { outboxEvents, invoices } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export { PostgresOutboxStore } from './outbox-repository.js';
