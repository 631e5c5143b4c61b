import { describe, it, expect, vi, beforeEach } from "vitest";
import { InvariantViolationError, NoActiveChallengeError, UnknownUserError, ValidationError } from "./errors.js";
import { createMemoryStorage } from "./memoryStorage.js";
import type { Storage } from "./storage.js";
import { createTracker } from "./tracker.js";
import type { Tracker } from "./tracker.js";
import type { Challenge } from "./types.js";

const BASE = Date.parse("2026-03-01T12:00:00.000Z");
const DAY = 24 * 60 * 60 * 1000;

describe("tracker", () => {
  let storage: Storage;
  let tracker: Tracker;
  let t: number;

  beforeEach(() => {
    t = BASE;
    storage = createMemoryStorage();
    tracker = createTracker({ storage, now: () => new Date(t) });
  });

  // =========================================================================
  // registerUser
  // =========================================================================

  describe("registerUser", () => {
    it("keeps one row per id with the latest names", async () => {
      await tracker.registerUser("u1", "anna_k", "Anna");
      t += 1000;
      await tracker.registerUser("u1", "anna_new", "Annie");

      const user = await storage.getUser("u1");
      expect(user).toEqual({
        id: "u1",
        handle: "anna_new",
        displayName: "Annie",
        registeredAt: "2026-03-01T12:00:00.000Z",
        updatedAt: "2026-03-01T12:00:01.000Z",
      });
      expect(await tracker.monthlyLeaderboard()).toHaveLength(1);
    });

    it("stores blank names as null", async () => {
      const user = await tracker.registerUser("u1", "  ", "");
      expect(user.handle).toBeNull();
      expect(user.displayName).toBeNull();
    });

    it("truncates long names by code point without splitting emoji", async () => {
      const name = "a" + "💪".repeat(130);
      const user = await tracker.registerUser("u1", null, name);

      expect(Array.from(user.displayName ?? "")).toHaveLength(120);
      expect(user.displayName).toBe("a" + "💪".repeat(119));
    });

    it("rejects an empty id", async () => {
      await expect(tracker.registerUser(" ", "x", "X")).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // =========================================================================
  // setChallenge / getActiveChallenge
  // =========================================================================

  describe("setChallenge", () => {
    beforeEach(async () => {
      await tracker.registerUser("u1", "anna_k", "Anna");
    });

    it("rejects empty text without writing anything", async () => {
      const err = await tracker.setChallenge("u1", "", "daily").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: "text" });
      expect(await storage.listChallenges("u1")).toEqual([]);
    });

    it("rejects whitespace-only text", async () => {
      await expect(tracker.setChallenge("u1", "   ", "weekly")).rejects.toBeInstanceOf(ValidationError);
    });

    it("rejects an unknown frequency", async () => {
      const err = await tracker.setChallenge("u1", "10 pushups", "monthly").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: "frequency" });
      expect(await storage.listChallenges("u1")).toEqual([]);
    });

    it("rejects text over 500 characters", async () => {
      await expect(tracker.setChallenge("u1", "x".repeat(501), "daily")).rejects.toBeInstanceOf(ValidationError);
    });

    it("trims the text and returns the new active challenge", async () => {
      const challenge = await tracker.setChallenge("u1", "  10 pushups  ", "daily");
      expect(challenge).toEqual({
        id: 1,
        userId: "u1",
        text: "10 pushups",
        frequency: "daily",
        createdAt: "2026-03-01T12:00:00.000Z",
        active: true,
      });
    });

    it("replaces the previous challenge and keeps it inactive", async () => {
      await tracker.setChallenge("u1", "10 pushups", "daily");
      await tracker.setChallenge("u1", "20 squats", "weekly");

      const active = await tracker.getActiveChallenge("u1");
      expect(active?.text).toBe("20 squats");
      expect(active?.frequency).toBe("weekly");

      const history = await tracker.listChallenges("u1");
      expect(history.map((c) => [c.text, c.active])).toEqual([
        ["10 pushups", false],
        ["20 squats", true],
      ]);
    });

    it("leaves exactly one active challenge after concurrent calls", async () => {
      await Promise.all([
        tracker.setChallenge("u1", "plank 1 min", "daily"),
        tracker.setChallenge("u1", "run 5k", "weekly"),
        tracker.setChallenge("u1", "stretch", "daily"),
      ]);

      const active = await storage.listActiveChallenges("u1");
      expect(active).toHaveLength(1);
      expect(active[0]?.text).toBe("stretch");
    });

    it("does not touch other users' challenges", async () => {
      await tracker.registerUser("u2", null, "Ben");
      await tracker.setChallenge("u2", "read 10 pages", "daily");
      await tracker.setChallenge("u1", "10 pushups", "daily");

      expect((await tracker.getActiveChallenge("u2"))?.text).toBe("read 10 pages");
    });

    it("fails for a user that was never registered", async () => {
      await expect(tracker.setChallenge("ghost", "10 pushups", "daily")).rejects.toBeInstanceOf(UnknownUserError);
    });
  });

  describe("getActiveChallenge", () => {
    it("returns null when the user has none", async () => {
      await tracker.registerUser("u1", null, null);
      expect(await tracker.getActiveChallenge("u1")).toBeNull();
    });

    it("reports more than one active row as an invariant violation", async () => {
      const row = (id: number): Challenge => ({
        id,
        userId: "u1",
        text: "dup",
        frequency: "daily",
        createdAt: "2026-03-01T12:00:00.000Z",
        active: true,
      });
      const broken: Storage = { ...createMemoryStorage(), listActiveChallenges: async () => [row(4), row(7)] };
      const error = vi.fn();
      const t2 = createTracker({ storage: broken, log: { error } });

      await expect(t2.getActiveChallenge("u1")).rejects.toBeInstanceOf(InvariantViolationError);
      expect(error).toHaveBeenCalledWith("User u1 has 2 active challenges", { userId: "u1", challengeIds: [4, 7] });
      await expect(t2.recordCompletion("u1")).rejects.toBeInstanceOf(InvariantViolationError);
    });
  });

  // =========================================================================
  // recordCompletion
  // =========================================================================

  describe("recordCompletion", () => {
    it("fails with NoActiveChallenge when nothing was set up", async () => {
      await tracker.registerUser("u2", "ben", "Ben");
      await expect(tracker.recordCompletion("u2")).rejects.toBeInstanceOf(NoActiveChallengeError);
      expect(await storage.listCompletions("u2")).toEqual([]);
    });

    it("records against the challenge active at call time", async () => {
      await tracker.registerUser("u1", null, "Anna");
      await tracker.setChallenge("u1", "10 pushups", "daily");
      const squats = await tracker.setChallenge("u1", "20 squats", "weekly");

      const completion = await tracker.recordCompletion("u1");
      expect(completion.challengeId).toBe(squats.id);
    });

    it("keeps repeated completions as distinct rows", async () => {
      await tracker.registerUser("u1", null, "Anna");
      await tracker.setChallenge("u1", "10 pushups", "daily");

      const first = await tracker.recordCompletion("u1");
      t += 20 * 1000;
      const second = await tracker.recordCompletion("u1");

      expect(first.id).not.toBe(second.id);
      expect(first.completedAt).toBe("2026-03-01T12:00:00.000Z");
      expect(second.completedAt).toBe("2026-03-01T12:00:20.000Z");
      expect(await storage.listCompletions("u1")).toHaveLength(2);
    });

    it("never lowers the completion count when the challenge changes", async () => {
      await tracker.registerUser("u1", null, "Anna");
      await tracker.setChallenge("u1", "10 pushups", "daily");
      await tracker.recordCompletion("u1");
      await tracker.recordCompletion("u1");

      await tracker.setChallenge("u1", "20 squats", "weekly");
      expect(await storage.listCompletions("u1")).toHaveLength(2);

      await tracker.recordCompletion("u1");
      expect(await storage.listCompletions("u1")).toHaveLength(3);
    });
  });

  // =========================================================================
  // monthlyLeaderboard
  // =========================================================================

  describe("monthlyLeaderboard", () => {
    it("is empty when nobody registered", async () => {
      expect(await tracker.monthlyLeaderboard()).toEqual([]);
    });

    it("counts only completions inside the window and keeps users with zero", async () => {
      await tracker.registerUser("a", "alice", "Alice");
      await tracker.registerUser("b", "bob", "Bob");
      await tracker.registerUser("c", "carol", "Carol");
      await tracker.setChallenge("a", "10 pushups", "daily");
      await tracker.setChallenge("b", "run", "weekly");

      await tracker.recordCompletion("a");
      t += 1000;
      await tracker.recordCompletion("a");

      t = BASE + 35 * DAY;
      for (let i = 0; i < 3; i++) {
        await tracker.recordCompletion("a");
        t += 1000;
      }

      expect(await tracker.monthlyLeaderboard(30)).toEqual([
        { rank: 1, userId: "a", name: "Alice", handle: "alice", count: 3 },
        { rank: 2, userId: "b", name: "Bob", handle: "bob", count: 0 },
        { rank: 3, userId: "c", name: "Carol", handle: "carol", count: 0 },
      ]);
    });

    it("breaks ties by registration order, even after a later upsert", async () => {
      await tracker.registerUser("first", null, "First");
      await tracker.registerUser("second", null, "Second");
      await tracker.registerUser("first", null, "First renamed");

      const names = (await tracker.monthlyLeaderboard()).map((e) => e.name);
      expect(names).toEqual(["First renamed", "Second"]);
    });

    it("falls back from display name to handle to Unknown", async () => {
      await tracker.registerUser("1", "handle_only", null);
      await tracker.registerUser("2", null, null);

      const entries = await tracker.monthlyLeaderboard();
      expect(entries.map((e) => e.name)).toEqual(["handle_only", "Unknown"]);
    });

    it("excludes a completion exactly at the window edge", async () => {
      await tracker.registerUser("a", null, "Alice");
      await tracker.setChallenge("a", "10 pushups", "daily");
      await tracker.recordCompletion("a");

      t = BASE + 7 * DAY;
      expect((await tracker.monthlyLeaderboard(7))[0]?.count).toBe(0);
      t = BASE + 7 * DAY - 1;
      expect((await tracker.monthlyLeaderboard(7))[0]?.count).toBe(1);
    });

    it("rejects windows outside 1..365 days", async () => {
      await expect(tracker.monthlyLeaderboard(0)).rejects.toBeInstanceOf(ValidationError);
      await expect(tracker.monthlyLeaderboard(366)).rejects.toBeInstanceOf(ValidationError);
      await expect(tracker.monthlyLeaderboard(1.5)).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
