import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryOutboxStore, DuplicateKeyError } from '../../src/infrastructure/memory/index.js';
import { makeInvoice, seedEvent, steppingClock, captureError } from '../helpers.js';

describe('InMemoryOutboxStore', () => {
  let store: InMemoryOutboxStore;

  beforeEach(() => {
    store = new InMemoryOutboxStore({ now: steppingClock() });
  });

  it('returns pending events oldest first, capped at the limit', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });
    await seedEvent(store, { id: 'E2', business_id: 'B2' });
    await seedEvent(store, { id: 'E3', business_id: 'B3' });
    await store.markProcessed('E1');

    expect((await store.fetchPendingBatch(10)).map((e) => e.id)).toEqual(['E2', 'E3']);
    expect((await store.fetchPendingBatch(1)).map((e) => e.id)).toEqual(['E2']);
  });

  it('breaks created_at ties by commit order', async () => {
    const fixed = new InMemoryOutboxStore({ now: () => new Date('2026-03-01T00:00:00.000Z') });
    await seedEvent(fixed, { id: 'Z', business_id: 'B1' });
    await seedEvent(fixed, { id: 'A', business_id: 'B1' });

    expect((await fixed.fetchPendingBatch(10)).map((e) => e.id)).toEqual(['Z', 'A']);
  });

  it('clamps a non-positive limit to one event', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });
    await seedEvent(store, { id: 'E2', business_id: 'B1' });

    expect(await store.fetchPendingBatch(0)).toHaveLength(1);
  });

  it('hides writes from a transaction that has not committed', async () => {
    let seenInside: number | undefined;

    await store.transaction(async (tx) => {
      await tx.insertInvoice(makeInvoice({ id: 'INV-1' }));
      await tx.insertPending({ id: 'E1', business_id: 'biz-1', event_type: 'demo.created', payload: '{}' });
      seenInside = (await store.fetchPendingBatch(10)).length;
    });

    expect(seenInside).toBe(0);
    expect(await store.fetchPendingBatch(10)).toHaveLength(1);
  });

  it('discards every staged write when the work rejects', async () => {
    const err = await captureError(
      store.transaction(async (tx) => {
        await tx.insertInvoice(makeInvoice({ id: 'INV-1' }));
        throw new Error('abort');
      }),
    );

    expect(err).toEqual(new Error('abort'));
    expect(await store.countInvoices()).toBe(0);
  });

  it('rejects a duplicate primary key', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });

    const err = await captureError(seedEvent(store, { id: 'E1', business_id: 'B1' }));

    expect(err).toBeInstanceOf(DuplicateKeyError);
    expect(await store.countInvoices()).toBe(1);
  });

  it('keeps the first processed_at when markProcessed repeats', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });

    expect(await store.markProcessed('E1')).toBe(true);
    const first = (await store.findEventById('E1'))?.processed_at;

    expect(await store.markProcessed('E1')).toBe(false);
    expect((await store.findEventById('E1'))?.processed_at).toEqual(first);
  });

  it('never moves a processed event back or sideways', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });
    await store.markProcessed('E1');

    expect(await store.recordDeliveryFailure('E1', 'late failure')).toBe(0);
    expect(await store.markDeadLetter('E1', 'late reason')).toBe(false);
    expect(await store.findEventById('E1')).toMatchObject({ status: 'processed', attempts: 0, last_error: null });
  });

  it('returns false or 0 for unknown events', async () => {
    expect(await store.markProcessed('missing')).toBe(false);
    expect(await store.markDeadLetter('missing', 'x')).toBe(false);
    expect(await store.recordDeliveryFailure('missing', 'x')).toBe(0);
    expect(await store.findEventById('missing')).toBeUndefined();
  });

  it('counts events per status', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });
    await seedEvent(store, { id: 'E2', business_id: 'B1' });
    await seedEvent(store, { id: 'E3', business_id: 'B1' });
    await store.markProcessed('E1');
    await store.markDeadLetter('E2', 'empty payload');

    expect(await store.countByStatus()).toEqual({ pending: 1, processed: 1, dead_letter: 1 });
  });

  it('hands out copies that callers cannot use to mutate stored rows', async () => {
    await seedEvent(store, { id: 'E1', business_id: 'B1' });

    const [event] = await store.fetchPendingBatch(10);
    Object.assign(event ?? {}, { status: 'processed' });

    expect((await store.findEventById('E1'))?.status).toBe('pending');
  });
});
