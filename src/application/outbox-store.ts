import type {
  Invoice,
  NewInvoice,
  NewOutboxEvent,
  OutboxEvent,
  StatusCounts,
} from '../domain/index.js';

/**
 * Writes available inside one atomic unit of work.
 *
 * Rows inserted here become visible to other readers only when the
 * surrounding `OutboxStore.transaction()` commits.
 */
export interface OutboxTransaction {
  /** Business store: inserts the invoice and returns it as stored. */
  insertInvoice(invoice: NewInvoice): Promise<Invoice>;
  /** Event store: inserts the event with status `pending`. */
  insertPending(event: NewOutboxEvent): Promise<OutboxEvent>;
}

/**
 * Durable store shared by the ingestion driver and the dispatch worker.
 * It is the only coordination point between the two loops.
 */
export interface OutboxStore {
  /**
   * Runs `work` in one transaction. Commits if it resolves, rolls back
   * every write made through `tx` if it rejects, then rethrows.
   */
  transaction<T>(work: (tx: OutboxTransaction) => Promise<T>): Promise<T>;

  /** Committed pending events, oldest `created_at` first, at most `limit`. */
  fetchPendingBatch(limit: number): Promise<OutboxEvent[]>;

  /**
   * pending → processed, stamping `processed_at`.
   * Returns false when the event was not pending, in which case nothing changes.
   */
  markProcessed(eventId: string): Promise<boolean>;

  /**
   * Increments `attempts` and stores `last_error` on a pending event.
   * Returns the new attempt count, or 0 if the event is no longer pending.
   */
  recordDeliveryFailure(eventId: string, error: string): Promise<number>;

  /** pending → dead_letter. Returns false when the event was not pending. */
  markDeadLetter(eventId: string, reason: string): Promise<boolean>;

  countByStatus(): Promise<StatusCounts>;
  countInvoices(): Promise<number>;

  findEventById(eventId: string): Promise<OutboxEvent | undefined>;
  findInvoiceById(invoiceId: string): Promise<Invoice | undefined>;
}

const MAX_BATCH_SIZE = 1000;

/** Clamps a requested batch size to [1, MAX_BATCH_SIZE]. */
export function clampBatchSize(limit: number): number {
  if (!Number.isFinite(limit)) return 1;
  return Math.min(Math.max(Math.floor(limit), 1), MAX_BATCH_SIZE);
}

/** Keeps stored error text bounded. */
export function truncateError(message: string, max = 1024): string {
  return message.length > max ? `${message.slice(0, max - 1)}…` : message;
}
