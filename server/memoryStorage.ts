import { UnknownUserError } from "./errors.js";
import type { Storage } from "./storage.js";
import type { Challenge, Completion, User } from "./types.js";

/**
 * In-process storage used by tests and by `STORAGE=memory` runs.
 * Every operation completes synchronously inside one call, so the
 * deactivate-then-insert step cannot interleave with another writer.
 */
export function createMemoryStorage(): Storage {
  // Map iteration order is insertion order, which is registration order
  const users = new Map<string, User>();
  const challenges: Challenge[] = [];
  const completions: Completion[] = [];
  let nextChallengeId = 1;
  let nextCompletionId = 1;

  return {
    async ensureSchema() {},

    async upsertUser(params) {
      const existing = users.get(params.id);
      const user: User = {
        id: params.id,
        handle: params.handle,
        displayName: params.displayName,
        registeredAt: existing?.registeredAt ?? params.now,
        updatedAt: params.now,
      };
      users.set(params.id, user);
      return { ...user };
    },

    async getUser(id) {
      const user = users.get(id);
      return user ? { ...user } : null;
    },

    async replaceActiveChallenge(params) {
      if (!users.has(params.userId)) throw new UnknownUserError(params.userId);

      for (const c of challenges) {
        if (c.userId === params.userId && c.active) c.active = false;
      }

      const challenge: Challenge = {
        id: nextChallengeId++,
        userId: params.userId,
        text: params.text,
        frequency: params.frequency,
        createdAt: params.createdAt,
        active: true,
      };
      challenges.push(challenge);
      return { ...challenge };
    },

    async listActiveChallenges(userId) {
      return challenges.filter((c) => c.userId === userId && c.active).map((c) => ({ ...c }));
    },

    async listChallenges(userId) {
      return challenges.filter((c) => c.userId === userId).map((c) => ({ ...c }));
    },

    async insertCompletion(params) {
      if (!users.has(params.userId)) throw new UnknownUserError(params.userId);
      const completion: Completion = { id: nextCompletionId++, ...params };
      completions.push(completion);
      return { ...completion };
    },

    async listCompletions(userId) {
      return completions.filter((c) => c.userId === userId).map((c) => ({ ...c }));
    },

    async completionCountsSince(sinceIso) {
      const counts = new Map<string, number>();
      for (const c of completions) {
        if (c.completedAt > sinceIso) counts.set(c.userId, (counts.get(c.userId) ?? 0) + 1);
      }

      const rows = Array.from(users.values()).map((u) => ({
        userId: u.id,
        handle: u.handle,
        displayName: u.displayName,
        count: counts.get(u.id) ?? 0,
      }));
      // Array#sort is stable, so equal counts keep registration order
      return rows.sort((a, b) => b.count - a.count);
    },

    async close() {},
  };
}
