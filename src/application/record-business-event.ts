import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { CURRENCIES, INVOICE_STATUSES } from '../domain/index.js';
import type { EventEnvelope, Invoice, NewInvoice, OutboxEvent } from '../domain/index.js';
import type { OutboxStore } from './outbox-store.js';
import { withDeadline } from './deadline.js';
import { OutboxWriteError } from './errors.js';

export const DEFAULT_WRITE_TIMEOUT_MS = 5000;

/** Zod schema for an invoice submitted to the writer. */
export const newInvoiceSchema = z.object({
  id: z.string().min(1).max(64),
  business_id: z.string().min(1).max(255),
  amount: z.number().finite(),
  currency: z.enum(CURRENCIES),
  status: z.enum(INVOICE_STATUSES),
  description: z.string().max(1024).nullable(),
});

export const eventTypeSchema = z.string().min(1).max(255);

export interface RecordOptions {
  timeoutMs?: number;
  /** Event id factory; defaults to a random UUID. */
  newId?: () => string;
}

export interface RecordedBusinessEvent {
  readonly invoice: Invoice;
  readonly event: OutboxEvent;
}

/**
 * Inserts an invoice and its pending outbox event in one transaction.
 *
 * The event payload is the envelope `{ event_type, data: <stored invoice> }`.
 * Either both rows commit or neither does. Every failure, including input
 * validation and an expired deadline, surfaces as OutboxWriteError.
 *
 * `timeoutMs` bounds the work inside the transaction. A unit that runs out
 * of time rejects its transaction, which rolls back; the commit itself is
 * never raced, so a resolved call always means both rows are durable and a
 * rejected one means neither is.
 */
export async function recordBusinessEventAtomically(
  store: OutboxStore,
  invoice: NewInvoice,
  eventType: string,
  options: RecordOptions = {},
): Promise<RecordedBusinessEvent> {
  const parsedInvoice = newInvoiceSchema.safeParse(invoice);
  if (!parsedInvoice.success) {
    throw new OutboxWriteError('Invalid invoice', { cause: parsedInvoice.error });
  }

  const parsedType = eventTypeSchema.safeParse(eventType);
  if (!parsedType.success) {
    throw new OutboxWriteError('Invalid event type', { cause: parsedType.error });
  }

  const eventId = (options.newId ?? randomUUID)();
  const timeoutMs = options.timeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;

  try {
    return await store.transaction((tx) =>
      withDeadline(timeoutMs, `record ${parsedType.data}`, async (signal) => {
        const stored = await tx.insertInvoice(parsedInvoice.data);
        signal.throwIfAborted();

        const envelope: EventEnvelope<Invoice> = {
          event_type: parsedType.data,
          data: stored,
        };

        const event = await tx.insertPending({
          id: eventId,
          business_id: stored.business_id,
          event_type: parsedType.data,
          payload: JSON.stringify(envelope),
        });

        return { invoice: stored, event };
      }),
    );
  } catch (err: unknown) {
    throw new OutboxWriteError(
      `Failed to record ${parsedType.data} for business ${parsedInvoice.data.business_id}`,
      { cause: err },
    );
  }
}
