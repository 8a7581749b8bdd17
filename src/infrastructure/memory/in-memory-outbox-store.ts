import type {
  Invoice,
  NewInvoice,
  NewOutboxEvent,
  OutboxEvent,
  StatusCounts,
} from '../../domain/index.js';
import type { OutboxStore, OutboxTransaction } from '../../application/index.js';
import { clampBatchSize } from '../../application/index.js';

/** Stored row plus the insertion sequence used to break `created_at` ties. */
interface EventRecord {
  seq: number;
  row: OutboxEvent;
}

export interface InMemoryOutboxStoreOptions {
  /** Clock for `created_at` / `processed_at`. Defaults to wall time. */
  now?: () => Date;
}

export class DuplicateKeyError extends Error {
  override name = 'DuplicateKeyError';

  constructor(table: string, id: string) {
    super(`duplicate key value violates unique constraint on ${table}: ${id}`);
  }
}

/**
 * In-process OutboxStore with the same transactional contract as the
 * Postgres store.
 *
 * Inserts made inside `transaction()` are staged and only become visible
 * on commit, so readers never observe a half-finished unit of work.
 * Primary keys are checked against committed rows again at commit time,
 * which lets overlapping transactions run without a global lock.
 *
 * Backs the test suite, which runs without a database.
 */
export class InMemoryOutboxStore implements OutboxStore {
  private readonly events = new Map<string, EventRecord>();
  private readonly invoices = new Map<string, Invoice>();
  private readonly now: () => Date;
  private seq = 0;

  constructor(options: InMemoryOutboxStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async transaction<T>(work: (tx: OutboxTransaction) => Promise<T>): Promise<T> {
    const stagedInvoices = new Map<string, Invoice>();
    const stagedEvents = new Map<string, OutboxEvent>();

    const tx: OutboxTransaction = {
      insertInvoice: async (invoice: NewInvoice) => {
        if (this.invoices.has(invoice.id) || stagedInvoices.has(invoice.id)) {
          throw new DuplicateKeyError('invoices', invoice.id);
        }
        const row: Invoice = { ...invoice, created_at: this.now() };
        stagedInvoices.set(row.id, row);
        return { ...row };
      },
      insertPending: async (event: NewOutboxEvent) => {
        if (this.events.has(event.id) || stagedEvents.has(event.id)) {
          throw new DuplicateKeyError('outbox_events', event.id);
        }
        const row: OutboxEvent = {
          ...event,
          created_at: this.now(),
          processed_at: null,
          status: 'pending',
          attempts: 0,
          last_error: null,
        };
        stagedEvents.set(row.id, row);
        return { ...row };
      },
    };

    const result = await work(tx);

    // Commit: everything below runs synchronously, so it is all-or-nothing.
    for (const id of stagedInvoices.keys()) {
      if (this.invoices.has(id)) throw new DuplicateKeyError('invoices', id);
    }
    for (const id of stagedEvents.keys()) {
      if (this.events.has(id)) throw new DuplicateKeyError('outbox_events', id);
    }
    for (const [id, row] of stagedInvoices) {
      this.invoices.set(id, row);
    }
    for (const [id, row] of stagedEvents) {
      this.events.set(id, { seq: this.seq++, row });
    }

    return result;
  }

  async fetchPendingBatch(limit: number): Promise<OutboxEvent[]> {
    return [...this.events.values()]
      .filter((record) => record.row.status === 'pending')
      .sort((a, b) => a.row.created_at.getTime() - b.row.created_at.getTime() || a.seq - b.seq)
      .slice(0, clampBatchSize(limit))
      .map((record) => ({ ...record.row }));
  }

  async markProcessed(eventId: string): Promise<boolean> {
    return this.transition(eventId, (row) => ({ ...row, status: 'processed', processed_at: this.now() }));
  }

  async recordDeliveryFailure(eventId: string, error: string): Promise<number> {
    const record = this.events.get(eventId);
    if (record === undefined || record.row.status !== 'pending') return 0;

    const attempts = record.row.attempts + 1;
    record.row = { ...record.row, attempts, last_error: error };
    return attempts;
  }

  async markDeadLetter(eventId: string, reason: string): Promise<boolean> {
    return this.transition(eventId, (row) => ({ ...row, status: 'dead_letter', last_error: reason }));
  }

  async countByStatus(): Promise<StatusCounts> {
    const counts: StatusCounts = { pending: 0, processed: 0, dead_letter: 0 };
    for (const { row } of this.events.values()) {
      counts[row.status]++;
    }
    return counts;
  }

  async countInvoices(): Promise<number> {
    return this.invoices.size;
  }

  async findEventById(eventId: string): Promise<OutboxEvent | undefined> {
    const record = this.events.get(eventId);
    return record === undefined ? undefined : { ...record.row };
  }

  async findInvoiceById(invoiceId: string): Promise<Invoice | undefined> {
    const row = this.invoices.get(invoiceId);
    return row === undefined ? undefined : { ...row };
  }

  /** Applies `next` only to a pending event, mirroring `WHERE status = 'pending'`. */
  private transition(eventId: string, next: (row: OutboxEvent) => OutboxEvent): boolean {
    const record = this.events.get(eventId);
    if (record === undefined || record.row.status !== 'pending') return false;
    record.row = next(record.row);
    return true;
  }
}
