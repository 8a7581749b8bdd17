import { DeadlineExceededError } from './errors.js';

/**
 * Runs `fn` with a deadline.
 *
 * `fn` receives an AbortSignal that is aborted (reason: DeadlineExceededError)
 * when the deadline passes, so cooperative callees such as `fetch` can stop
 * early. The returned promise rejects with DeadlineExceededError at the
 * deadline even if `fn` ignores the signal.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new DeadlineExceededError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so a
 * shutdown request ends a poll-interval wait without surfacing an error.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };

    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
