import type { Express, Request, Response, NextFunction } from "express";
import rateLimit from "express-rate-limit";
import { nanoid } from "nanoid";
import { z } from "zod";
import { requireApiToken } from "./auth.js";
import { InvariantViolationError, TrackerError, errorMessage } from "./errors.js";
import { DEFAULT_WINDOW_DAYS, MAX_CHALLENGE_TEXT, MAX_WINDOW_DAYS } from "./tracker.js";
import type { Tracker } from "./tracker.js";
import { FREQUENCIES } from "./types.js";

/** Async route wrapper */
function wrap(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// express.json() reports malformed bodies with type "entity.parse.failed"
function isBodyParseError(err: unknown) {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

const UserIdParams = z.object({
  userId: z.string().trim().min(1).max(64),
});

const RegisterUserSchema = z.object({
  handle: z.string().max(120).optional().nullable(),
  displayName: z.string().max(120).optional().nullable(),
});

const SetChallengeSchema = z.object({
  text: z.string().max(MAX_CHALLENGE_TEXT),
  frequency: z.enum(FREQUENCIES),
});

const LeaderboardQuery = z.object({
  windowDays: z.coerce.number().int().min(1).max(MAX_WINDOW_DAYS).default(DEFAULT_WINDOW_DAYS),
});

export function registerRoutes(app: Express, deps: { tracker: Tracker; apiToken?: string; rateLimits?: boolean }) {
  const { tracker } = deps;

  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  if (deps.apiToken) {
    const requireToken = requireApiToken(deps.apiToken);
    app.use("/api/users", requireToken);
    app.use("/api/leaderboard", requireToken);

    if (deps.rateLimits !== false) {
      // Stricter limit for writes
      app.use(
        "/api/users",
        rateLimit({
          windowMs: 60 * 1000,
          limit: 120,
          standardHeaders: true,
          legacyHeaders: false,
          skip: (req) => req.method === "GET",
          message: { error: "Too many writes. Try again later." },
        }),
      );
    }

    // -----------------------------
    // Users
    // -----------------------------
    app.put(
      "/api/users/:userId",
      wrap(async (req, res) => {
        const params = UserIdParams.safeParse(req.params);
        if (!params.success) return res.status(400).json({ error: params.error.flatten() });
        const parsed = RegisterUserSchema.safeParse(req.body ?? {});
        if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

        const user = await tracker.registerUser(
          params.data.userId,
          parsed.data.handle ?? null,
          parsed.data.displayName ?? null,
        );
        return res.json({ user });
      }),
    );

    // -----------------------------
    // Challenges
    // -----------------------------
    app.get(
      "/api/users/:userId/challenge",
      wrap(async (req, res) => {
        const params = UserIdParams.safeParse(req.params);
        if (!params.success) return res.status(400).json({ error: params.error.flatten() });

        const challenge = await tracker.getActiveChallenge(params.data.userId);
        return res.json({ challenge });
      }),
    );

    app.get(
      "/api/users/:userId/challenges",
      wrap(async (req, res) => {
        const params = UserIdParams.safeParse(req.params);
        if (!params.success) return res.status(400).json({ error: params.error.flatten() });

        const challenges = await tracker.listChallenges(params.data.userId);
        return res.json({ challenges });
      }),
    );

    app.post(
      "/api/users/:userId/challenge",
      wrap(async (req, res) => {
        const params = UserIdParams.safeParse(req.params);
        if (!params.success) return res.status(400).json({ error: params.error.flatten() });
        const parsed = SetChallengeSchema.safeParse(req.body);
        if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

        const challenge = await tracker.setChallenge(params.data.userId, parsed.data.text, parsed.data.frequency);
        return res.status(201).json({ challengeId: challenge.id, challenge });
      }),
    );

    // -----------------------------
    // Completions
    // -----------------------------
    app.post(
      "/api/users/:userId/completions",
      wrap(async (req, res) => {
        const params = UserIdParams.safeParse(req.params);
        if (!params.success) return res.status(400).json({ error: params.error.flatten() });

        const completion = await tracker.recordCompletion(params.data.userId);
        return res.status(201).json({ completionId: completion.id, completion });
      }),
    );

    // -----------------------------
    // Leaderboard
    // -----------------------------
    app.get(
      "/api/leaderboard",
      wrap(async (req, res) => {
        const parsed = LeaderboardQuery.safeParse(req.query);
        if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

        const entries = await tracker.monthlyLeaderboard(parsed.data.windowDays);
        return res.json({ windowDays: parsed.data.windowDays, entries });
      }),
    );
  }

  // -----------------------------
  // Error handler
  // -----------------------------
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      return res.status(400).json({ error: "Request body is not valid JSON" });
    }
    if (err instanceof TrackerError && !(err instanceof InvariantViolationError)) {
      if (err.status >= 500) console.error("API error:", err.code, err.message);
      return res.status(err.status).json({ error: err.message, code: err.code });
    }

    const incidentId = nanoid(10);
    console.error(`API error [${incidentId}]:`, err);
    if (err instanceof TrackerError) {
      return res.status(err.status).json({ error: err.message, code: err.code, incidentId });
    }
    return res.status(500).json({ error: errorMessage(err) || "Server error", incidentId });
  });
}
