/**
 * Minimal push-based async stream. Values pushed before anyone reads are
 * buffered; `close()` ends every reader once the buffer drains.
 */
export interface AsyncQueue<T> extends AsyncIterable<T> {
  push(value: T): void;
  close(): void;
  readonly closed: boolean;
}

export function createAsyncQueue<T>(): AsyncQueue<T> {
  const buffer: T[] = [];
  const waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  let closed = false;

  const done = (): IteratorResult<T, undefined> => ({ done: true, value: undefined });

  return {
    push(value) {
      if (closed) return;
      const reader = waiting.shift();
      if (reader) reader({ done: false, value });
      else buffer.push(value);
    },
    close() {
      closed = true;
      for (const reader of waiting.splice(0)) reader(done());
    },
    get closed() {
      return closed;
    },
    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
      let pending: ((result: IteratorResult<T, undefined>) => void) | null = null;
      return {
        next() {
          if (buffer.length > 0) {
            const [value] = buffer.splice(0, 1);
            return Promise.resolve({ done: false, value });
          }
          if (closed) return Promise.resolve(done());
          return new Promise((resolve) => {
            const reader = (result: IteratorResult<T, undefined>) => {
              pending = null;
              resolve(result);
            };
            pending = reader;
            waiting.push(reader);
          });
        },
        return() {
          // A returned iterator must not take values meant for other readers
          const reader = pending;
          if (reader) {
            const index = waiting.indexOf(reader);
            if (index >= 0) waiting.splice(index, 1);
            reader(done());
          }
          return Promise.resolve(done());
        },
      };
    },
  };
}

/**
 * Pull values from a stream until it ends or `signal` aborts. On abort the
 * iterator is returned without waiting on it; a pending next() may never settle.
 */
export async function consumeUntilAborted<T>(
  stream: AsyncIterable<T>,
  signal: AbortSignal,
  onValue: (value: T) => void,
  onCloseError: (error: unknown) => void
): Promise<void> {
  const iterator = stream[Symbol.asyncIterator]();
  const aborted = new Promise<"aborted">((resolve) => {
    signal.addEventListener("abort", () => resolve("aborted"), { once: true });
  });

  while (!signal.aborted) {
    const next = await Promise.race([iterator.next(), aborted]);
    if (next === "aborted" || next.done) break;
    onValue(next.value);
  }

  if (signal.aborted) {
    void iterator.return?.().then(undefined, onCloseError);
  }
}
