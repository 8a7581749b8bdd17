import { describe, it, expect, beforeEach } from 'vitest';
import { runIngestionTick, startIngestion, INVOICE_CREATED } from '../../src/application/ingestion-driver.js';
import type { IngestionDeps } from '../../src/application/ingestion-driver.js';
import type { NewInvoice } from '../../src/domain/index.js';
import { InMemoryOutboxStore } from '../../src/infrastructure/memory/index.js';
import { fakeLogger, makeInvoice } from '../helpers.js';

describe('runIngestionTick', () => {
  let store: InMemoryOutboxStore;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    store = new InMemoryOutboxStore();
    log = fakeLogger();
  });

  function deps(generate: () => NewInvoice): IngestionDeps {
    return { store, log, rateMs: 10, writeTimeoutMs: 200, generate };
  }

  it('records an invoice.created event for the generated invoice', async () => {
    const recorded = await runIngestionTick(deps(() => makeInvoice({ id: 'INV-1', business_id: 'biz-9' })));

    expect(recorded?.event.event_type).toBe(INVOICE_CREATED);
    expect(recorded?.event.business_id).toBe('biz-9');
    expect(await store.findInvoiceById('INV-1')).toBeDefined();
    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ invoice_id: 'INV-1', business_id: 'biz-9' }),
      'Created invoice and event',
    );
  });

  it('logs and returns null when the write fails', async () => {
    const generate = () => makeInvoice({ id: 'INV-1' });
    await runIngestionTick(deps(generate));

    const second = await runIngestionTick(deps(generate));

    expect(second).toBeNull();
    expect(await store.countInvoices()).toBe(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ invoice_id: 'INV-1' }),
      'Failed to record invoice event',
    );
  });

  it('uses the synthetic generator by default', async () => {
    const recorded = await runIngestionTick({ store, log, rateMs: 10, writeTimeoutMs: 200 });

    expect(recorded?.invoice.id).toMatch(/^INV-\d+$/);
    expect(recorded?.invoice.description).toBe('Sample invoice for demonstration');
  });
});

describe('startIngestion', () => {
  it('records one pair per tick until the signal aborts', async () => {
    const store = new InMemoryOutboxStore();
    const log = fakeLogger();
    const ac = new AbortController();
    let ticks = 0;

    await startIngestion(
      {
        store,
        log,
        rateMs: 5,
        writeTimeoutMs: 200,
        generate: () => {
          ticks++;
          if (ticks === 3) ac.abort();
          return makeInvoice({ id: `INV-tick-${ticks}` });
        },
      },
      ac.signal,
    );

    expect(ticks).toBe(3);
    expect(await store.countInvoices()).toBe(3);
    expect((await store.countByStatus()).pending).toBe(3);
    expect(log.info).toHaveBeenCalledWith('Ingestion stopped');
  });

  it('returns without writing when already aborted', async () => {
    const store = new InMemoryOutboxStore();
    const ac = new AbortController();
    ac.abort();

    await startIngestion({ store, log: fakeLogger(), rateMs: 5, writeTimeoutMs: 200 }, ac.signal);

    expect(await store.countInvoices()).toBe(0);
  });
});
