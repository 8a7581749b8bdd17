import { startIngestion } from './application/index.js';
import { runProcess } from './bootstrap.js';

/**
 * Demo producer: records a synthetic invoice and its `invoice.created`
 * outbox event every INGEST_RATE_MS, each pair in one transaction.
 */
runProcess('outbox-ingest', async ({ config, log, store, signal }) => {
  await startIngestion(
    {
      store,
      log,
      rateMs: config.ingest.rateMs,
      writeTimeoutMs: config.ingest.writeTimeoutMs,
    },
    signal,
  );
});
