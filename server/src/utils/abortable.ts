/**
 * Timer helpers that cooperate with AbortSignal.
 */

/**
 * Wait `ms`, or less if `signal` aborts first. Never rejects: callers check
 * `signal.aborted` afterwards when they care why it returned.
 */
export function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run `task` with its own AbortSignal, rejecting with `onTimeout()` if it has
 * not settled within `timeoutMs`. The signal fires at the deadline so the task
 * can cancel its underlying work; whatever it settles with afterwards is
 * ignored.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
  });
}
