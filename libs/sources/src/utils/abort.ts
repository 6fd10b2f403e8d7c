/**
 * AbortSignal helpers for cancellable waits and linked request deadlines
 */

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted');
}

/**
 * Resolve after `ms` milliseconds, or reject with the signal's reason as soon
 * as it aborts. The timer is always cleared.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('Aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedAbort {
  signal: AbortSignal;
  /** Detach from the parent signal and clear the deadline */
  dispose(): void;
}

/**
 * A signal that aborts when the parent aborts or when `timeoutMs` elapses,
 * whichever comes first.
 */
export function linkAbort(parent: AbortSignal | undefined, timeoutMs: number): LinkedAbort {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => {
    if (parent) controller.abort(abortReason(parent));
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
