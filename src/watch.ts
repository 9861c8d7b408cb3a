import type { ChangeDataCache } from "./cache.js";
import type { ChangeRecord } from "./types.js";

type RecordListener = (record: ChangeRecord) => void;

// cache -> listeners, in subscription order
const listeners = new WeakMap<ChangeDataCache, Set<RecordListener>>();

/**
 * Internal: called by the cache after each record is logged.
 */
export function notifyWatchers(cache: ChangeDataCache, record: ChangeRecord): void {
  const subscribed = listeners.get(cache);
  if (!subscribed) return;

  // Copy, so a listener may unsubscribe itself mid-dispatch
  for (const listener of [...subscribed]) {
    listener(record);
  }
}

function subscribe(cache: ChangeDataCache, listener: RecordListener): () => void {
  const subscribed = listeners.get(cache) ?? new Set<RecordListener>();
  listeners.set(cache, subscribed);
  subscribed.add(listener);
  return () => {
    subscribed.delete(listener);
    if (subscribed.size === 0) listeners.delete(cache);
  };
}

export interface WatchHandle {
  unsubscribe: () => void;
}

export interface WatchAsyncIteratorOptions {
  /**
   * Deliver records logged while the consumer is busy as one batch
   * instead of one batch per record.
   * Default: true
   */
  coalesce?: boolean;
}

export type Watcher = AsyncGenerator<ChangeRecord[], void, unknown> &
  Disposable &
  AsyncDisposable & {
    unsubscribe: () => void;
  };

type BatchResult = IteratorResult<ChangeRecord[], void>;

const DONE: BatchResult = { value: undefined, done: true };

/**
 * Watch a cache for recorded changes.
 *
 * With a callback, each record is passed to it synchronously as it is
 * logged. Without one, returns an async generator of record batches.
 */
export function watch(cache: ChangeDataCache, callback: (record: ChangeRecord) => void): WatchHandle;
export function watch(cache: ChangeDataCache, options?: WatchAsyncIteratorOptions): Watcher;
export function watch(
  cache: ChangeDataCache,
  callbackOrOptions?: ((record: ChangeRecord) => void) | WatchAsyncIteratorOptions,
): WatchHandle | Watcher {
  if (typeof callbackOrOptions === "function") {
    return { unsubscribe: subscribe(cache, callbackOrOptions) };
  }

  const { coalesce = true } = callbackOrOptions ?? {};
  const queue: ChangeRecord[][] = [];
  // Consumers blocked in next(), oldest first
  const waiting: ((result: BatchResult) => void)[] = [];
  let closed = false;

  const release = subscribe(cache, (record) => {
    const resolve = waiting.shift();
    if (resolve) {
      resolve({ value: [record], done: false });
      return;
    }
    const tail = queue[queue.length - 1];
    if (coalesce && tail) {
      tail.push(record);
    } else {
      queue.push([record]);
    }
  });

  const close = () => {
    if (closed) return;
    closed = true;
    release();
    queue.length = 0;
    for (const resolve of waiting.splice(0)) resolve(DONE);
  };

  const watcher: Watcher = {
    async next(): Promise<BatchResult> {
      if (closed) return DONE;
      const batch = queue.shift();
      if (batch) return { value: batch, done: false };
      return new Promise<BatchResult>((resolve) => {
        waiting.push(resolve);
      });
    },

    async return(): Promise<BatchResult> {
      close();
      return DONE;
    },

    async throw(error: unknown): Promise<BatchResult> {
      close();
      throw error;
    },

    unsubscribe: close,

    [Symbol.asyncIterator]() {
      return this;
    },

    [Symbol.dispose]() {
      close();
    },

    async [Symbol.asyncDispose]() {
      close();
    },
  };

  return watcher;
}
