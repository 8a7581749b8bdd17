/**
 * Invoice business entity. It stands in for whatever business state
 * a caller records alongside an outbox event.
 */

export const INVOICE_STATUSES = ['draft', 'sent', 'paid', 'overdue'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const CURRENCIES = ['USD', 'EUR', 'GBP'] as const;
export type Currency = (typeof CURRENCIES)[number];

export interface Invoice {
  readonly id: string;
  readonly business_id: string;
  readonly amount: number;
  readonly currency: Currency;
  readonly status: InvoiceStatus;
  readonly description: string | null;
  readonly created_at: Date;
}

/** Invoice as submitted by a producer, before the store stamps `created_at`. */
export type NewInvoice = Omit<Invoice, 'created_at'>;
