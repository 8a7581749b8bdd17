/**
 * Raised by the transactional writer. The business row and the event row
 * were both rolled back; `cause` holds the underlying store or validation error.
 */
export class OutboxWriteError extends Error {
  override name = 'OutboxWriteError';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** Raised by a notification sender when the provider did not accept an event. */
export class DeliveryError extends Error {
  override name = 'DeliveryError';
  readonly status: number | undefined;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** A store or sender call ran past the deadline its caller gave it. */
export class DeadlineExceededError extends Error {
  override name = 'DeadlineExceededError';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} exceeded its ${timeoutMs}ms deadline`);
  }
}

/** Invalid or incomplete process configuration. */
export class ConfigError extends Error {
  override name = 'ConfigError';
}
