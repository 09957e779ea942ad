import { toError } from "../errors.js";

import { abortReason, sleep } from "./timeout.js";

export type CallSchedulerRetryPolicy = {
  readonly maxAttempts: number;
  /**
   * Return `null` to stop retrying and surface the original error.
   * `attempt` is 1-based and indicates the attempt that just failed.
   */
  readonly getDelayMs: (attempt: number, error: unknown) => number | null;
};

export type CallSchedulerOptions = {
  /** Hard upper bound for in-flight jobs. */
  readonly maxParallelRequests?: number;
  /** Starting concurrency before adaptive adjustments. */
  readonly initialParallelRequests?: number;
  /** Consecutive successes needed to raise the limit by one. */
  readonly increaseAfterConsecutiveSuccesses?: number;
  readonly minIntervalBetweenStartMs?: number;
  readonly startJitterMs?: number;
  readonly retry?: CallSchedulerRetryPolicy;
  /** Errors classified as overload halve the current limit. */
  readonly isOverloadError?: (error: unknown) => boolean;
};

export type CallSchedulerRunOptions = {
  /** Aborting removes a queued job; a started job must watch the signal itself. */
  readonly signal?: AbortSignal;
};

export type CallScheduler = {
  run: <T>(fn: () => Promise<T>, options?: CallSchedulerRunOptions) => Promise<T>;
  /** Jobs started and not yet settled. */
  readonly activeCount: () => number;
  readonly queuedCount: () => number;
  readonly parallelLimit: () => number;
};

function getStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const maybe = error as { status?: unknown; statusCode?: unknown; code?: unknown };
  for (const candidate of [maybe.status, maybe.statusCode, maybe.code]) {
    if (typeof candidate === "number") {
      return candidate;
    }
    if (typeof candidate === "string" && /^\d{3}$/u.test(candidate)) {
      return Number.parseInt(candidate, 10);
    }
  }
  return undefined;
}

function getErrorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message.toLowerCase();
  }
  if (typeof error === "string") {
    return error.toLowerCase();
  }
  if (error && typeof error === "object") {
    const maybe = error as { code?: unknown; message?: unknown };
    const code = typeof maybe.code === "string" ? maybe.code : "";
    const message = typeof maybe.message === "string" ? maybe.message : "";
    return `${code} ${message}`.trim().toLowerCase();
  }
  return "";
}

/** Rate-limit and overload responses (429/503/529) from chat backends. */
export function isOverloadError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status === 429 || status === 503 || status === 529) {
    return true;
  }
  const text = getErrorText(error);
  if (!text) {
    return false;
  }
  return (
    text.includes("rate limit") ||
    text.includes("too many requests") ||
    text.includes("resource exhausted") ||
    text.includes("overload")
  );
}

export function createCallScheduler(options: CallSchedulerOptions = {}): CallScheduler {
  const maxParallelRequests = Math.max(1, Math.floor(options.maxParallelRequests ?? 3));
  const initialParallelRequests = Math.min(
    maxParallelRequests,
    Math.max(1, Math.floor(options.initialParallelRequests ?? Math.min(3, maxParallelRequests))),
  );
  const increaseAfterConsecutiveSuccesses = Math.max(
    1,
    Math.floor(options.increaseAfterConsecutiveSuccesses ?? 8),
  );
  const minIntervalBetweenStartMs = Math.max(0, Math.floor(options.minIntervalBetweenStartMs ?? 0));
  const startJitterMs = Math.max(0, Math.floor(options.startJitterMs ?? 0));
  const retryPolicy = options.retry;
  const classifyOverload = options.isOverloadError ?? isOverloadError;

  let activeCount = 0;
  let lastStartTime = 0;
  let currentParallelLimit = initialParallelRequests;
  let consecutiveSuccesses = 0;

  // Serializes start spacing so concurrent jobs do not race on lastStartTime.
  let startSpacingChain: Promise<void> = Promise.resolve();

  type QueueJob = () => Promise<void>;
  const queue: QueueJob[] = [];

  async function applyStartSpacing(signal: AbortSignal | undefined): Promise<void> {
    const previous = startSpacingChain;
    let release: (() => void) | undefined;
    startSpacingChain = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      if (lastStartTime > 0 && minIntervalBetweenStartMs > 0) {
        const wait = lastStartTime + minIntervalBetweenStartMs - Date.now();
        if (wait > 0) {
          await sleep(wait, signal);
        }
      }
      if (startJitterMs > 0) {
        await sleep(Math.floor(Math.random() * (startJitterMs + 1)), signal);
      }
      lastStartTime = Date.now();
    } finally {
      release?.();
    }
  }

  async function attemptWithRetries<T>(
    fn: () => Promise<T>,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    try {
      await applyStartSpacing(signal);
      return await fn();
    } catch (error: unknown) {
      if (classifyOverload(error)) {
        consecutiveSuccesses = 0;
        currentParallelLimit = Math.max(1, Math.ceil(currentParallelLimit / 2));
      }
      const err = toError(error);
      if (signal?.aborted || !retryPolicy || attempt >= retryPolicy.maxAttempts) {
        throw err;
      }
      const delay = retryPolicy.getDelayMs(attempt, error);
      if (delay === null) {
        throw err;
      }
      if (Number.isFinite(delay) && delay > 0) {
        await sleep(delay, signal);
      }
      return attemptWithRetries(fn, attempt + 1, signal);
    }
  }

  function drainQueue(): void {
    while (activeCount < currentParallelLimit && queue.length > 0) {
      const task = queue.shift();
      if (!task) {
        continue;
      }
      activeCount += 1;
      void task();
    }
  }

  function run<T>(fn: () => Promise<T>, runOptions: CallSchedulerRunOptions = {}): Promise<T> {
    const { signal } = runOptions;
    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const onAbort = () => {
        const index = queue.indexOf(job);
        if (index >= 0) {
          queue.splice(index, 1);
          reject(signal ? abortReason(signal) : new Error("Operation aborted"));
        }
      };
      const job: QueueJob = async () => {
        signal?.removeEventListener("abort", onAbort);
        try {
          const result = await attemptWithRetries(fn, 1, signal);
          consecutiveSuccesses += 1;
          if (
            currentParallelLimit < maxParallelRequests &&
            consecutiveSuccesses >= increaseAfterConsecutiveSuccesses
          ) {
            currentParallelLimit += 1;
            consecutiveSuccesses = 0;
          }
          resolve(result);
        } catch (error: unknown) {
          reject(toError(error));
        } finally {
          activeCount -= 1;
          queueMicrotask(drainQueue);
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      queue.push(job);
      drainQueue();
    });
  }

  return {
    run,
    activeCount: () => activeCount,
    queuedCount: () => queue.length,
    parallelLimit: () => currentParallelLimit,
  };
}
