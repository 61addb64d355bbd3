import { DeadlineExceededError, OperationCancelledError } from './errors.js';

/**
 * Run `work` with its own deadline, chained to an optional caller signal.
 * The signal handed to `work` aborts on either; the returned promise settles
 * at the deadline even if `work` ignores its signal.
 *
 * Rejects with DeadlineExceededError on timeout and OperationCancelledError
 * when the caller aborts.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new OperationCancelledError();
  }

  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(timedOut ? new DeadlineExceededError(timeoutMs) : new OperationCancelledError()),
      { once: true }
    );
  });

  try {
    return await Promise.race([work(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}
