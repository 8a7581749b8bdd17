import type { SqlClient } from './client.js';

/**
 * Creates the outbox and invoice tables if they don't exist yet.
 *
 * Lightweight bootstrap for local runs; schema changes go through
 * drizzle-kit (see drizzle.config.ts). Both entry points call this, so
 * whichever process starts first prepares the database.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS outbox_events (
      id            UUID PRIMARY KEY,
      business_id   VARCHAR(255) NOT NULL,
      event_type    VARCHAR(255) NOT NULL,
      payload       TEXT         NOT NULL,
      created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      processed_at  TIMESTAMPTZ,
      status        VARCHAR(20)  NOT NULL DEFAULT 'pending',
      attempts      INTEGER      NOT NULL DEFAULT 0,
      last_error    TEXT
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS invoices (
      id           VARCHAR(64)  PRIMARY KEY,
      business_id  VARCHAR(255) NOT NULL,
      amount       DOUBLE PRECISION NOT NULL,
      currency     VARCHAR(3)   NOT NULL,
      status       VARCHAR(20)  NOT NULL,
      description  TEXT,
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_outbox_events_status ON outbox_events (status)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_outbox_events_business_id ON outbox_events (business_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_outbox_events_created_at ON outbox_events (created_at)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_invoices_business_id ON invoices (business_id)`);
}
