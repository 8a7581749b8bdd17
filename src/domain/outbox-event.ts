/**
 * Core domain types for the outbox event model.
 *
 * An outbox event is one notification obligation. It is written in the
 * same transaction as the business row that caused it and is later
 * relayed to the fan-out provider by the dispatch worker.
 */

/**
 * Lifecycle of an outbox event.
 *
 * `pending` → `processed` once delivery is confirmed.
 * `pending` → `dead_letter` once the retry policy gives up.
 * No transition ever leaves `processed` or `dead_letter`.
 */
export const EVENT_STATUSES = ['pending', 'processed', 'dead_letter'] as const;

export type EventStatus = (typeof EVENT_STATUSES)[number];

export interface OutboxEvent {
  /** Stable identity, doubles as the downstream idempotency key. */
  readonly id: string;
  /** Owning business entity. Routing metadata only, not a foreign key. */
  readonly business_id: string;
  readonly event_type: string;
  /** Serialized JSON envelope. Immutable once written. */
  readonly payload: string;
  readonly created_at: Date;
  /** Non-null iff status is `processed`. */
  readonly processed_at: Date | null;
  readonly status: EventStatus;
  /** Failed delivery attempts recorded by the dead-letter policy. */
  readonly attempts: number;
  readonly last_error: string | null;
}

/** Fields supplied by the writer; the store fills in the rest. */
export interface NewOutboxEvent {
  readonly id: string;
  readonly business_id: string;
  readonly event_type: string;
  readonly payload: string;
}

/** Shape serialized into `OutboxEvent.payload`. */
export interface EventEnvelope<T = unknown> {
  readonly event_type: string;
  readonly data: T;
}

export type StatusCounts = Record<EventStatus, number>;
