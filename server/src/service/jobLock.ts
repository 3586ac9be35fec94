// Per-key promise chain: callbacks for the same key run one at a time, in call order.
export interface KeyedMutex {
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
  /** Number of keys with queued or running work. */
  activeKeys(): number;
}

export const createKeyedMutex = (): KeyedMutex => {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const run = previous.then(task);
      // the chain must keep going after a failed task
      const tail = run.then(
        () => undefined,
        () => undefined
      );
      tails.set(key, tail);

      try {
        return await run;
      } finally {
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    activeKeys: () => tails.size,
  };
};
