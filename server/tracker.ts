import { InvariantViolationError, NoActiveChallengeError, ValidationError } from "./errors.js";
import { createKeyedLock } from "./lock.js";
import type { Storage } from "./storage.js";
import { FREQUENCIES, isFrequency } from "./types.js";
import type { Challenge, Completion, LeaderboardEntry, User } from "./types.js";

export const DEFAULT_WINDOW_DAYS = 30;
export const MAX_WINDOW_DAYS = 365;
export const MAX_CHALLENGE_TEXT = 500;
export const MAX_NAME_LENGTH = 120;
export const UNKNOWN_NAME = "Unknown";

const DAY_MS = 24 * 60 * 60 * 1000;

export type TrackerLog = {
  error: (message: string, details?: Record<string, unknown>) => void;
};

const consoleLog: TrackerLog = {
  error: (message, details) => console.error(`❌ ${message}`, details ?? {}),
};

function cleanName(v: string | null | undefined) {
  const s = (v ?? "").trim();
  // by code point, so a surrogate pair is never split
  return s ? Array.from(s).slice(0, MAX_NAME_LENGTH).join("") : null;
}

/** Display name, then handle, then a placeholder */
export function resolveName(displayName: string | null, handle: string | null) {
  return displayName || handle || UNKNOWN_NAME;
}

export function createTracker(deps: { storage: Storage; now?: () => Date; log?: TrackerLog }) {
  const { storage } = deps;
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? consoleLog;
  const challengeLock = createKeyedLock();

  function requireUserId(userId: string) {
    const id = userId.trim();
    if (!id) throw new ValidationError("User id is required", "userId");
    return id;
  }

  async function registerUser(id: string, handle: string | null, displayName: string | null): Promise<User> {
    return storage.upsertUser({
      id: requireUserId(id),
      handle: cleanName(handle),
      displayName: cleanName(displayName),
      now: now().toISOString(),
    });
  }

  async function setChallenge(userId: string, text: string, frequency: string): Promise<Challenge> {
    const id = requireUserId(userId);
    const cleanText = text.trim();
    if (!cleanText) throw new ValidationError("Challenge text cannot be empty", "text");
    if (cleanText.length > MAX_CHALLENGE_TEXT) {
      throw new ValidationError(`Challenge text must be at most ${MAX_CHALLENGE_TEXT} characters`, "text");
    }
    if (!isFrequency(frequency)) {
      throw new ValidationError(`Frequency must be one of: ${FREQUENCIES.join(", ")}`, "frequency");
    }

    return challengeLock.run(id, () =>
      storage.replaceActiveChallenge({
        userId: id,
        text: cleanText,
        frequency,
        createdAt: now().toISOString(),
      }),
    );
  }

  async function getActiveChallenge(userId: string): Promise<Challenge | null> {
    const id = requireUserId(userId);
    const active = await storage.listActiveChallenges(id);
    if (active.length > 1) {
      const err = new InvariantViolationError(`User ${id} has ${active.length} active challenges`, {
        userId: id,
        challengeIds: active.map((c) => c.id),
      });
      log.error(err.message, err.details);
      throw err;
    }
    return active[0] ?? null;
  }

  async function listChallenges(userId: string): Promise<Challenge[]> {
    return storage.listChallenges(requireUserId(userId));
  }

  async function recordCompletion(userId: string): Promise<Completion> {
    const id = requireUserId(userId);
    const challenge = await getActiveChallenge(id);
    if (!challenge) throw new NoActiveChallengeError(id);

    return storage.insertCompletion({
      userId: id,
      challengeId: challenge.id,
      completedAt: now().toISOString(),
    });
  }

  async function monthlyLeaderboard(windowDays: number = DEFAULT_WINDOW_DAYS): Promise<LeaderboardEntry[]> {
    if (!Number.isInteger(windowDays) || windowDays < 1 || windowDays > MAX_WINDOW_DAYS) {
      throw new ValidationError(`windowDays must be a whole number between 1 and ${MAX_WINDOW_DAYS}`, "windowDays");
    }

    const since = new Date(now().getTime() - windowDays * DAY_MS).toISOString();
    const rows = await storage.completionCountsSince(since);

    return rows.map((r, i) => ({
      rank: i + 1,
      userId: r.userId,
      name: resolveName(r.displayName, r.handle),
      handle: r.handle,
      count: r.count,
    }));
  }

  return {
    registerUser,
    setChallenge,
    getActiveChallenge,
    listChallenges,
    recordCompletion,
    monthlyLeaderboard,
  };
}

export type Tracker = ReturnType<typeof createTracker>;
