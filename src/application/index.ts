export { OutboxWriteError, DeliveryError, DeadlineExceededError, ConfigError } from './errors.js';
export { withDeadline, sleep } from './deadline.js';
export { clampBatchSize, truncateError } from './outbox-store.js';
export type { OutboxStore, OutboxTransaction } from './outbox-store.js';
export { toNotificationRequest } from './notification-sender.js';
export type { NotificationSender, NotificationRequest } from './notification-sender.js';
export {
  recordBusinessEventAtomically,
  newInvoiceSchema,
  eventTypeSchema,
  DEFAULT_WRITE_TIMEOUT_MS,
} from './record-business-event.js';
export type { RecordOptions, RecordedBusinessEvent } from './record-business-event.js';
export { runDispatchCycle, startDispatcher } from './dispatch-worker.js';
export type { DispatchConfig, DispatchDeps, CycleReport, EventOutcome } from './dispatch-worker.js';
export { generateInvoice, DEMO_BUSINESS_IDS } from './invoice-generator.js';
export type { RandomSource } from './invoice-generator.js';
export { runIngestionTick, startIngestion, INVOICE_CREATED } from './ingestion-driver.js';
export type { IngestionDeps } from './ingestion-driver.js';
