import type { OutboxEvent } from '../domain/index.js';

/** One delivery attempt handed to the fan-out provider. */
export interface NotificationRequest {
  readonly eventType: string;
  /** Business that owns the event; the provider fans out to its endpoints. */
  readonly ownerId: string;
  /** Same value on every attempt for an event, so the provider can collapse duplicates. */
  readonly idempotencyKey: string;
  readonly payload: string;
}

/**
 * Boundary to the external delivery channel.
 *
 * `send` resolves once the provider accepted the request and rejects
 * otherwise. Implementations do not retry; the dispatch worker's next
 * poll cycle is the retry.
 */
export interface NotificationSender {
  send(request: NotificationRequest, signal: AbortSignal): Promise<void>;
}

export function toNotificationRequest(event: OutboxEvent): NotificationRequest {
  return {
    eventType: event.event_type,
    ownerId: event.business_id,
    idempotencyKey: event.id,
    payload: event.payload,
  };
}
