import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  doublePrecision,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { CURRENCIES, EVENT_STATUSES, INVOICE_STATUSES } from '../../domain/index.js';

/**
 * Drizzle schema for the `outbox_events` table.
 *
 * `id` is generated by the writer and sent downstream as the idempotency
 * key. `business_id` is routing metadata, not a foreign key.
 * The status / created_at indexes keep the pending-batch query cheap as
 * processed rows accumulate.
 */
export const outboxEvents = pgTable('outbox_events', {
  id: uuid('id').primaryKey(),
  business_id: varchar('business_id', { length: 255 }).notNull(),
  event_type: varchar('event_type', { length: 255 }).notNull(),
  payload: text('payload').notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  processed_at: timestamp('processed_at', { withTimezone: true }),
  status: varchar('status', { length: 20, enum: EVENT_STATUSES }).notNull().default('pending'),
  attempts: integer('attempts').notNull().default(0),
  last_error: text('last_error'),
}, (table) => [
  index('idx_outbox_events_status').on(table.status),
  index('idx_outbox_events_business_id').on(table.business_id),
  index('idx_outbox_events_created_at').on(table.created_at),
]);

/**
 * Drizzle schema for the `invoices` table, the business rows written in
 * the same transaction as their `invoice.created` events.
 */
export const invoices = pgTable('invoices', {
  id: varchar('id', { length: 64 }).primaryKey(),
  business_id: varchar('business_id', { length: 255 }).notNull(),
  amount: doublePrecision('amount').notNull(),
  currency: varchar('currency', { length: 3, enum: CURRENCIES }).notNull(),
  status: varchar('status', { length: 20, enum: INVOICE_STATUSES }).notNull(),
  description: text('description'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_invoices_business_id').on(table.business_id),
]);
