import { CURRENCIES, INVOICE_STATUSES } from '../domain/index.js';
import type { NewInvoice } from '../domain/index.js';

/** Demo tenants the synthetic invoices are spread across. */
export const DEMO_BUSINESS_IDS = [
  '550e8400-e29b-41d4-a716-446655440000', // Acme Corp
  '6ba7b810-9dad-11d1-80b4-00c04fd430c8', // TechStart Inc
  '7ba7b810-9dad-11d1-80b4-00c04fd430c9', // Global Solutions
  '8ba7b810-9dad-11d1-80b4-00c04fd430ca', // Innovate Labs
  '9ba7b810-9dad-11d1-80b4-00c04fd430cb', // Future Systems
] as const;

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

function pickIndex(length: number, random: RandomSource): number {
  return Math.min(Math.floor(random() * length), length - 1);
}

function pick<T>(items: readonly T[], random: RandomSource): T {
  const item = items[pickIndex(items.length, random)];
  if (item === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Builds a synthetic invoice for one of the demo businesses.
 * Draws from `random` in order: business, id, amount, currency, status.
 */
export function generateInvoice(random: RandomSource = Math.random): NewInvoice {
  const businessId = pick(DEMO_BUSINESS_IDS, random);

  return {
    id: `INV-${pickIndex(1_000_000, random)}`,
    business_id: businessId,
    amount: pickIndex(10_000, random) + 99.99,
    currency: pick(CURRENCIES, random),
    status: pick(INVOICE_STATUSES, random),
    description: 'Sample invoice for demonstration',
  };
}
