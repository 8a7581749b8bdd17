import type { Logger } from 'pino';
import type { NotificationRequest, NotificationSender } from '../../application/index.js';

/**
 * Dry-run sender. Logs each request and reports success without any
 * network call, so the worker can drain a local outbox end to end.
 */
export class LoggingSender implements NotificationSender {
  constructor(private readonly log: Logger) {}

  async send(request: NotificationRequest): Promise<void> {
    this.log.info(
      {
        event_id: request.idempotencyKey,
        event_type: request.eventType,
        owner_id: request.ownerId,
        bytes: Buffer.byteLength(request.payload),
      },
      'Notification (dry run) not sent',
    );
  }
}
