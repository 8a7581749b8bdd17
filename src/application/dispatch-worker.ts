import type { Logger } from 'pino';
import type { OutboxEvent } from '../domain/index.js';
import type { OutboxStore } from './outbox-store.js';
import type { NotificationSender } from './notification-sender.js';
import { clampBatchSize, truncateError } from './outbox-store.js';
import { toNotificationRequest } from './notification-sender.js';
import { sleep, withDeadline } from './deadline.js';

export interface DispatchConfig {
  batchSize: number;
  pollIntervalMs: number;
  /** Deadline for one `sender.send()` call. */
  sendTimeoutMs: number;
  /** Deadline for each store call made by the worker. */
  storeTimeoutMs: number;
  /**
   * Dead-letter policy. When unset, failing events stay pending and are
   * retried on every cycle without limit.
   */
  maxAttempts?: number | undefined;
}

/** Dependencies bundled for the dispatch loop. */
export interface DispatchDeps {
  store: OutboxStore;
  sender: NotificationSender;
  log: Logger;
  config: DispatchConfig;
}

export type EventOutcome = 'delivered' | 'failed' | 'skipped' | 'dead_lettered';

export interface CycleReport {
  fetched: number;
  delivered: number;
  failed: number;
  skipped: number;
  deadLettered: number;
  fetchFailed: boolean;
}

function emptyReport(): CycleReport {
  return { fetched: 0, delivered: 0, failed: 0, skipped: 0, deadLettered: 0, fetchFailed: false };
}

/**
 * One poll cycle: fetch a batch of pending events oldest-first and
 * dispatch them one at a time.
 *
 * Per event: send → markProcessed. The event only leaves `pending` after
 * the provider accepted it. A failure on one event is logged and the
 * loop moves on; nothing here throws.
 *
 * Exported for unit testing. The long-running loop is `startDispatcher()`.
 */
export async function runDispatchCycle(deps: DispatchDeps): Promise<CycleReport> {
  const report = emptyReport();
  const limit = clampBatchSize(deps.config.batchSize);

  let events: OutboxEvent[];
  try {
    events = await withDeadline(deps.config.storeTimeoutMs, 'fetch pending batch', () =>
      deps.store.fetchPendingBatch(limit),
    );
  } catch (err: unknown) {
    deps.log.error({ err }, 'Failed to fetch pending events');
    report.fetchFailed = true;
    return report;
  }

  report.fetched = events.length;

  for (const event of events) {
    let outcome: EventOutcome;
    try {
      outcome = await dispatchEvent(deps, event);
    } catch (err: unknown) {
      deps.log.error({ err, event_id: event.id }, 'Unexpected error while dispatching event');
      outcome = 'failed';
    }

    switch (outcome) {
      case 'delivered':
        report.delivered++;
        break;
      case 'failed':
        report.failed++;
        break;
      case 'skipped':
        report.skipped++;
        break;
      case 'dead_lettered':
        report.deadLettered++;
        break;
    }
  }

  return report;
}

/**
 * Delivers a single event.
 *
 * Empty payloads cannot be delivered. Without a dead-letter policy they are
 * skipped and stay pending; with one they are dead-lettered straight away,
 * since no number of retries changes the payload.
 */
async function dispatchEvent(deps: DispatchDeps, event: OutboxEvent): Promise<EventOutcome> {
  const { log, config } = deps;
  const context = { event_id: event.id, event_type: event.event_type, business_id: event.business_id };

  if (event.payload.trim() === '') {
    log.warn(context, 'Empty payload, skipping event');
    if (config.maxAttempts === undefined) return 'skipped';
    return deadLetter(deps, event, 'empty payload');
  }

  try {
    await withDeadline(config.sendTimeoutMs, `send event ${event.id}`, (signal) =>
      deps.sender.send(toNotificationRequest(event), signal),
    );
  } catch (err: unknown) {
    log.error({ err, ...context, attempts: event.attempts + 1 }, 'Failed to deliver event');
    return handleDeliveryFailure(deps, event, err);
  }

  try {
    const transitioned = await withDeadline(config.storeTimeoutMs, `mark event ${event.id} processed`, () =>
      deps.store.markProcessed(event.id),
    );

    if (transitioned) {
      log.debug(context, 'Event delivered');
    } else {
      log.debug(context, 'Event delivered but already settled by another worker');
    }
    return 'delivered';
  } catch (err: unknown) {
    // Provider already has it; the next cycle re-sends under the same idempotency key.
    log.error({ err, ...context }, 'Failed to mark delivered event as processed');
    return 'failed';
  }
}

async function handleDeliveryFailure(
  deps: DispatchDeps,
  event: OutboxEvent,
  cause: unknown,
): Promise<EventOutcome> {
  const { maxAttempts, storeTimeoutMs } = deps.config;
  if (maxAttempts === undefined) return 'failed';

  const message = truncateError(cause instanceof Error ? cause.message : String(cause));

  let attempts: number;
  try {
    attempts = await withDeadline(storeTimeoutMs, `record failure for event ${event.id}`, () =>
      deps.store.recordDeliveryFailure(event.id, message),
    );
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.id }, 'Failed to record delivery failure');
    return 'failed';
  }

  if (attempts < maxAttempts) return 'failed';
  return deadLetter(deps, event, `gave up after ${attempts} attempts: ${message}`);
}

async function deadLetter(deps: DispatchDeps, event: OutboxEvent, reason: string): Promise<EventOutcome> {
  try {
    const moved = await withDeadline(deps.config.storeTimeoutMs, `dead-letter event ${event.id}`, () =>
      deps.store.markDeadLetter(event.id, truncateError(reason)),
    );
    if (!moved) return 'skipped';
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.id }, 'Failed to move event to dead letter');
    return 'failed';
  }

  deps.log.warn(
    { event_id: event.id, event_type: event.event_type, business_id: event.business_id, reason },
    'Event moved to dead letter',
  );
  return 'dead_lettered';
}

/**
 * Main dispatch loop.
 *
 * 1. Log the outbox backlog once at startup.
 * 2. Run a cycle, then sleep `pollIntervalMs`, even after an empty batch.
 * 3. Repeat until `signal` aborts. The signal is checked between cycles
 *    and cuts the sleep short; an in-flight cycle always runs to the end.
 *
 * Holds no state across cycles. Any number of instances can run against
 * the same store.
 */
export async function startDispatcher(deps: DispatchDeps, signal: AbortSignal): Promise<void> {
  const { log, config } = deps;

  log.info(
    { batchSize: clampBatchSize(config.batchSize), pollIntervalMs: config.pollIntervalMs, maxAttempts: config.maxAttempts ?? null },
    'Dispatcher started',
  );

  try {
    const backlog = await withDeadline(config.storeTimeoutMs, 'count events by status', () =>
      deps.store.countByStatus(),
    );
    log.info({ backlog }, 'Outbox backlog');
  } catch (err: unknown) {
    log.warn({ err }, 'Could not read outbox backlog');
  }

  while (!signal.aborted) {
    const report = await runDispatchCycle(deps);

    if (report.fetched === 0 && !report.fetchFailed) {
      log.debug({ pollIntervalMs: config.pollIntervalMs }, 'No pending events found');
    } else if (report.fetched > 0) {
      log.info({ ...report }, 'Dispatch cycle completed');
    }

    await sleep(config.pollIntervalMs, signal);
  }

  log.info('Dispatcher stopped');
}
