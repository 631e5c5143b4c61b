import type { Frequency } from "./types.js";

export type PendingSetup = {
  userId: string;
  frequency: Frequency;
  startedAt: number;
  expiresAt: number;
};

/**
 * Holds the frequency a user picked while we wait for their challenge text.
 * Records expire after `ttlMs`; expired records are dropped on access or by `sweep()`.
 */
export function createPendingSetupStore(opts: { ttlMs: number; now?: () => number }) {
  const now = opts.now ?? (() => Date.now());
  const records = new Map<string, PendingSetup>();

  function peek(userId: string): PendingSetup | null {
    const rec = records.get(userId);
    if (!rec) return null;
    if (rec.expiresAt <= now()) {
      records.delete(userId);
      return null;
    }
    return { ...rec };
  }

  return {
    begin(userId: string, frequency: Frequency): PendingSetup {
      const startedAt = now();
      const rec = { userId, frequency, startedAt, expiresAt: startedAt + opts.ttlMs };
      records.set(userId, rec);
      return { ...rec };
    },

    peek,

    clear(userId: string) {
      return records.delete(userId);
    },

    sweep() {
      const t = now();
      let removed = 0;
      for (const [userId, rec] of records) {
        if (rec.expiresAt <= t) {
          records.delete(userId);
          removed += 1;
        }
      }
      return removed;
    },

    size() {
      return records.size;
    },
  };
}

export type PendingSetupStore = ReturnType<typeof createPendingSetupStore>;
