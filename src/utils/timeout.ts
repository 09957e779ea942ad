export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("Operation aborted");
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("Operation aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type RunWithTimeoutOptions = {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  readonly createTimeoutError: () => Error;
};

/**
 * Runs `fn` with a child signal that aborts when the parent aborts or the timeout expires.
 * The returned promise settles as soon as either happens, even if `fn` ignores its signal.
 */
export async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RunWithTimeoutOptions,
): Promise<T> {
  const abortController = new AbortController();
  const parent = options.signal;
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;
  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = options.createTimeoutError();
      abortController.abort(error);
      reject(error);
    }, options.timeoutMs);
    if (parent) {
      onParentAbort = () => {
        const error = abortReason(parent);
        abortController.abort(error);
        reject(error);
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  const task = Promise.resolve().then(() => fn(abortController.signal));
  try {
    return await Promise.race([task, interrupted]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener("abort", onParentAbort);
    }
    // Whichever side lost the race must not surface as an unhandled rejection.
    void task.catch(() => undefined);
    void interrupted.catch(() => undefined);
  }
}
