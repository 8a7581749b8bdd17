import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { NewInvoice } from '../src/domain/index.js';
import type { OutboxStore } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/** Clock that advances `stepMs` on every read, starting at `start`. */
export function steppingClock(start = '2026-03-01T00:00:00.000Z', stepMs = 1000): () => Date {
  let t = Date.parse(start);
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

let counter = 0;

/**
 * Factory for test invoices with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeInvoice(overrides: Partial<NewInvoice> = {}): NewInvoice {
  counter++;
  return {
    id: overrides.id ?? `INV-test-${counter}`,
    business_id: overrides.business_id ?? 'biz-1',
    amount: overrides.amount ?? 120.5,
    currency: overrides.currency ?? 'USD',
    status: overrides.status ?? 'draft',
    description: overrides.description ?? 'Test invoice',
  };
}

/**
 * Commits an invoice and an event with an explicit id and payload,
 * bypassing the writer's envelope so tests control the exact payload.
 */
export async function seedEvent(
  store: OutboxStore,
  event: { id: string; business_id: string; event_type?: string; payload?: string },
): Promise<void> {
  await store.transaction(async (tx) => {
    await tx.insertInvoice(makeInvoice({ business_id: event.business_id }));
    await tx.insertPending({
      id: event.id,
      business_id: event.business_id,
      event_type: event.event_type ?? 'demo.created',
      payload: event.payload ?? '{"x":1}',
    });
  });
}

/** Resolves with whatever `promise` rejected with, or fails if it resolved. */
export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
