import { startDispatcher } from './application/index.js';
import type { NotificationSender } from './application/index.js';
import { HttpFanoutSender, LoggingSender } from './infrastructure/index.js';
import { resolveFanoutConfig } from './config.js';
import { runProcess } from './bootstrap.js';

/**
 * Standalone dispatch worker: drains pending outbox events to the
 * fan-out provider.
 *
 * Keeps no state between cycles, so several instances can run against
 * the same database. Downstream deduplication by idempotency key absorbs
 * the duplicate sends that racing instances may produce.
 *
 * Env: POLL_INTERVAL_MS, BATCH_SIZE, SEND_TIMEOUT_MS, STORE_TIMEOUT_MS,
 * MAX_ATTEMPTS, NOTIFY_BASE_URL, NOTIFY_API_KEY, NOTIFY_PROJECT_ID,
 * NOTIFY_DRY_RUN.
 */
runProcess('outbox-worker', async ({ config, log, store, signal }) => {
  const fanout = resolveFanoutConfig(config);

  const sender: NotificationSender = fanout === null
    ? new LoggingSender(log)
    : new HttpFanoutSender(fanout, log);

  log.info(
    { provider: fanout?.baseUrl ?? 'dry-run', project_id: fanout?.projectId ?? null },
    'Notification sender configured',
  );

  await startDispatcher({ store, sender, log, config: config.dispatch }, signal);
});
