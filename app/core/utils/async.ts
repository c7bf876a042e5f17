export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Returns a controller that aborts when `parent` does. Call `dispose` once the
 * child is no longer needed so the parent does not keep a listener alive.
 */
export function createLinkedController(parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();

  if (!parent) {
    return { controller, dispose: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });

  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort)
  };
}

export function isTimeoutReason(reason: unknown): boolean {
  return reason instanceof TimeoutError || (reason instanceof Error && reason.name === 'TimeoutError');
}

/**
 * Settles with `promise`, or rejects with the abort reason as soon as `signal`
 * aborts, whichever comes first. The underlying work is not cancelled here;
 * callers pass the same signal to it.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
