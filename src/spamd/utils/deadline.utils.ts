import { TimeoutError, abortReason } from '../errors/spamd.errors';

export interface Deadline {
  /** Aborts when the timeout fires or the parent signal aborts */
  readonly signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal */
  dispose(): void;
}

/**
 * Combines an optional timeout and an optional caller signal into one signal.
 * The timeout aborts with a TimeoutError built by `describe`; the parent aborts with its own reason.
 */
export function createDeadline(
  timeoutMs: number | undefined,
  parent: AbortSignal | undefined,
  describe: (timeoutMs: number) => string = (ms) => `Operation timed out after ${ms}ms`,
): Deadline {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    if (parent) controller.abort(abortReason(parent));
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => controller.abort(new TimeoutError(describe(timeoutMs))), timeoutMs);
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Resolves after `ms`, or rejects with the signal's reason once it aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
