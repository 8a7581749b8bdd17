import type { Logger } from 'pino';
import type { NotificationRequest, NotificationSender } from '../../application/index.js';
import { DeliveryError } from '../../application/index.js';

export interface FanoutConfig {
  baseUrl: string;
  apiKey: string;
  projectId: string;
}

/** Resolves the fan-out endpoint for a project. */
export function fanoutUrl(config: FanoutConfig): string {
  const base = config.baseUrl.replace(/\/+$/, '');
  return `${base}/api/v1/projects/${encodeURIComponent(config.projectId)}/events/fanout`;
}

/**
 * Delivers events to a webhook fan-out provider over HTTP.
 *
 * POSTs `{ owner_id, event_type, idempotency_key, data }` where `data` is
 * the event payload embedded as JSON. The provider delivers the event to
 * every endpoint registered for `owner_id` and drops repeats of the same
 * idempotency key.
 *
 * Any non-2xx response rejects with a DeliveryError carrying the status.
 */
export class HttpFanoutSender implements NotificationSender {
  private readonly url: string;

  constructor(
    private readonly config: FanoutConfig,
    private readonly log: Logger,
  ) {
    this.url = fanoutUrl(config);
  }

  async send(request: NotificationRequest, signal: AbortSignal): Promise<void> {
    let data: unknown;
    try {
      data = JSON.parse(request.payload);
    } catch (err: unknown) {
      throw new DeliveryError(`Payload of event ${request.idempotencyKey} is not valid JSON`, { cause: err });
    }

    const response = await fetch(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
        'Idempotency-Key': request.idempotencyKey,
      },
      body: JSON.stringify({
        owner_id: request.ownerId,
        event_type: request.eventType,
        idempotency_key: request.idempotencyKey,
        data,
      }),
      signal,
    });

    if (!response.ok) {
      throw new DeliveryError(
        `Fan-out provider rejected event ${request.idempotencyKey} with status ${response.status}`,
        { status: response.status },
      );
    }

    this.log.info(
      { event_id: request.idempotencyKey, event_type: request.eventType, owner_id: request.ownerId, status: response.status },
      'Fan-out event accepted',
    );
  }
}
