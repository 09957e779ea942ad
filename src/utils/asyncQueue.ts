export type AsyncQueue<T> = {
  push: (value: T) => void;
  close: () => void;
  fail: (error: Error) => void;
  readonly iterable: AsyncIterable<T>;
};

type QueueState =
  | { readonly kind: "open" }
  | { readonly kind: "closed" }
  | { readonly kind: "failed"; readonly error: Error };

type Waiter<T> = {
  readonly resolve: (result: IteratorResult<T, undefined>) => void;
  readonly reject: (error: Error) => void;
};

/**
 * Single-consumer push queue. Buffered values are still delivered after `close()` or
 * `fail()`; values pushed after either are dropped.
 */
export function createAsyncQueue<T>(): AsyncQueue<T> {
  const buffered: Array<{ readonly value: T }> = [];
  let state: QueueState = { kind: "open" };
  let waiter: Waiter<T> | null = null;

  const takeWaiter = (): Waiter<T> | null => {
    const current = waiter;
    waiter = null;
    return current;
  };

  const push = (value: T) => {
    if (state.kind !== "open") {
      return;
    }
    const pending = takeWaiter();
    if (pending) {
      pending.resolve({ value, done: false });
    } else {
      buffered.push({ value });
    }
  };

  const close = () => {
    if (state.kind !== "open") {
      return;
    }
    state = { kind: "closed" };
    takeWaiter()?.resolve({ value: undefined, done: true });
  };

  const fail = (error: Error) => {
    if (state.kind !== "open") {
      return;
    }
    state = { kind: "failed", error };
    takeWaiter()?.reject(error);
  };

  const next = (): Promise<IteratorResult<T, undefined>> => {
    const entry = buffered.shift();
    if (entry) {
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (state.kind === "failed") {
      return Promise.reject(state.error);
    }
    if (state.kind === "closed") {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      waiter = { resolve, reject };
    });
  };

  const iterable: AsyncIterable<T> = {
    [Symbol.asyncIterator]: () => ({ next }),
  };

  return { push, close, fail, iterable };
}
