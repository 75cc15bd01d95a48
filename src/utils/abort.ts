import { CancelledError, TimeoutError } from '../core/errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Map an aborted signal to the error the caller should see: the deadline's
 * TimeoutError when the deadline fired, CancelledError otherwise.
 */
export function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof TimeoutError || reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError();
}

/**
 * Sleep utility function, rejects as soon as the signal aborts
 */
export const sleep: SleepFn = (ms, signal) => {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export interface Deadline {
  signal: AbortSignal;
  cancel(reason?: string): void;
  dispose(): void;
}

/**
 * An abort signal that fires with a TimeoutError after `timeoutMs`,
 * or earlier when the parent signal aborts or `cancel` is called.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  timer.unref?.();

  const onParentAbort = () => {
    if (parent) controller.abort(abortError(parent));
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    cancel(reason) {
      controller.abort(new CancelledError(reason));
    },
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
