/**
 * Per-key mutual exclusion inside one process.
 * Calls for the same key run one after another; different keys never wait on each other.
 */
export function createKeyedLock() {
  const tails = new Map<string, Promise<void>>();

  return {
    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      let release: () => void = () => {};
      const current = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await fn();
      } finally {
        release();
        if (tails.get(key) === tail) tails.delete(key);
      }
    },

    /** Keys with a running or queued call */
    pendingKeys() {
      return tails.size;
    },
  };
}

export type KeyedLock = ReturnType<typeof createKeyedLock>;
