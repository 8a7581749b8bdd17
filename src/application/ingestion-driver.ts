import type { Logger } from 'pino';
import type { NewInvoice } from '../domain/index.js';
import type { OutboxStore } from './outbox-store.js';
import { recordBusinessEventAtomically } from './record-business-event.js';
import type { RecordedBusinessEvent } from './record-business-event.js';
import { generateInvoice } from './invoice-generator.js';
import { sleep } from './deadline.js';

export const INVOICE_CREATED = 'invoice.created';

export interface IngestionDeps {
  store: OutboxStore;
  log: Logger;
  rateMs: number;
  writeTimeoutMs: number;
  /** Invoice factory; defaults to `generateInvoice()`. */
  generate?: () => NewInvoice;
}

/**
 * Records one synthetic `invoice.created` business event.
 * Returns null when the write failed; the failure is logged, not thrown.
 */
export async function runIngestionTick(deps: IngestionDeps): Promise<RecordedBusinessEvent | null> {
  const invoice = (deps.generate ?? generateInvoice)();

  try {
    const recorded = await recordBusinessEventAtomically(deps.store, invoice, INVOICE_CREATED, {
      timeoutMs: deps.writeTimeoutMs,
    });

    deps.log.info(
      { business_id: recorded.invoice.business_id, invoice_id: recorded.invoice.id, event_id: recorded.event.id },
      'Created invoice and event',
    );
    return recorded;
  } catch (err: unknown) {
    deps.log.error({ err, business_id: invoice.business_id, invoice_id: invoice.id }, 'Failed to record invoice event');
    return null;
  }
}

/**
 * Demo producer loop: waits `rateMs`, records one invoice + event, repeats
 * until `signal` aborts.
 */
export async function startIngestion(deps: IngestionDeps, signal: AbortSignal): Promise<void> {
  deps.log.info({ rateMs: deps.rateMs }, 'Ingestion started');

  while (!signal.aborted) {
    await sleep(deps.rateMs, signal);
    if (signal.aborted) break;
    await runIngestionTick(deps);
  }

  deps.log.info('Ingestion stopped');
}
