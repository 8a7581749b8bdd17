export { EVENT_STATUSES } from './outbox-event.js';
export type { EventStatus, OutboxEvent, NewOutboxEvent, EventEnvelope, StatusCounts } from './outbox-event.js';
export { INVOICE_STATUSES, CURRENCIES } from './invoice.js';
export type { Invoice, NewInvoice, InvoiceStatus, Currency } from './invoice.js';
