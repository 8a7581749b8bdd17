import { and, asc, count, eq, sql } from 'drizzle-orm';
import type {
  Invoice,
  NewInvoice,
  NewOutboxEvent,
  OutboxEvent,
  StatusCounts,
} from '../../domain/index.js';
import type { OutboxStore, OutboxTransaction } from '../../application/index.js';
import { clampBatchSize } from '../../application/index.js';
import type { Database } from './client.js';
import { invoices, outboxEvents } from './schema.js';

function firstRow<T>(rows: T[], table: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`INSERT into ${table} returned no row`);
  }
  return row;
}

function isPending(eventId: string) {
  return and(eq(outboxEvents.id, eventId), eq(outboxEvents.status, 'pending'));
}

/** Oldest pending events first; `id` breaks `created_at` ties. */
export function selectPendingBatch(db: Database, limit: number) {
  return db
    .select()
    .from(outboxEvents)
    .where(eq(outboxEvents.status, 'pending'))
    .orderBy(asc(outboxEvents.created_at), asc(outboxEvents.id))
    .limit(clampBatchSize(limit));
}

export function updateMarkProcessed(db: Database, eventId: string) {
  return db
    .update(outboxEvents)
    .set({ status: 'processed', processed_at: sql`now()` })
    .where(isPending(eventId))
    .returning({ id: outboxEvents.id });
}

export function updateRecordFailure(db: Database, eventId: string, error: string) {
  return db
    .update(outboxEvents)
    .set({ attempts: sql`${outboxEvents.attempts} + 1`, last_error: error })
    .where(isPending(eventId))
    .returning({ attempts: outboxEvents.attempts });
}

export function updateMarkDeadLetter(db: Database, eventId: string, reason: string) {
  return db
    .update(outboxEvents)
    .set({ status: 'dead_letter', last_error: reason })
    .where(isPending(eventId))
    .returning({ id: outboxEvents.id });
}

export function selectStatusCounts(db: Database) {
  return db
    .select({ status: outboxEvents.status, count: count() })
    .from(outboxEvents)
    .groupBy(outboxEvents.status);
}

/**
 * OutboxStore backed by Postgres through Drizzle.
 *
 * Status transitions are conditional updates (`WHERE status = 'pending'`),
 * so concurrent workers racing on the same event settle it once and a
 * repeated `markProcessed` leaves `processed_at` untouched.
 */
export class PostgresOutboxStore implements OutboxStore {
  constructor(private readonly db: Database) {}

  async transaction<T>(work: (tx: OutboxTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) =>
      work({
        insertInvoice: async (invoice: NewInvoice): Promise<Invoice> => {
          const rows = await tx.insert(invoices).values({
            id: invoice.id,
            business_id: invoice.business_id,
            amount: invoice.amount,
            currency: invoice.currency,
            status: invoice.status,
            description: invoice.description,
          }).returning();
          return firstRow(rows, 'invoices');
        },
        insertPending: async (event: NewOutboxEvent): Promise<OutboxEvent> => {
          const rows = await tx.insert(outboxEvents).values({
            id: event.id,
            business_id: event.business_id,
            event_type: event.event_type,
            payload: event.payload,
            status: 'pending',
          }).returning();
          return firstRow(rows, 'outbox_events');
        },
      }),
    );
  }

  async fetchPendingBatch(limit: number): Promise<OutboxEvent[]> {
    return selectPendingBatch(this.db, limit);
  }

  async markProcessed(eventId: string): Promise<boolean> {
    const rows = await updateMarkProcessed(this.db, eventId);
    return rows.length > 0;
  }

  async recordDeliveryFailure(eventId: string, error: string): Promise<number> {
    const rows = await updateRecordFailure(this.db, eventId, error);
    return rows[0]?.attempts ?? 0;
  }

  async markDeadLetter(eventId: string, reason: string): Promise<boolean> {
    const rows = await updateMarkDeadLetter(this.db, eventId, reason);
    return rows.length > 0;
  }

  async countByStatus(): Promise<StatusCounts> {
    const rows = await selectStatusCounts(this.db);

    const counts: StatusCounts = { pending: 0, processed: 0, dead_letter: 0 };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }

  async countInvoices(): Promise<number> {
    const rows = await this.db.select({ count: count() }).from(invoices);
    return Number(rows[0]?.count ?? 0);
  }

  async findEventById(eventId: string): Promise<OutboxEvent | undefined> {
    const rows = await this.db
      .select()
      .from(outboxEvents)
      .where(eq(outboxEvents.id, eventId))
      .limit(1);

    return rows[0];
  }

  async findInvoiceById(invoiceId: string): Promise<Invoice | undefined> {
    const rows = await this.db
      .select()
      .from(invoices)
      .where(eq(invoices.id, invoiceId))
      .limit(1);

    return rows[0];
  }
}
