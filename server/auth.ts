import { timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction } from "express";

function readBearerToken(req: Request): string | null {
  const raw = req.headers.authorization;
  if (typeof raw !== "string") return null;

  const v = raw.trim();
  if (!v) return null;

  // Accept "Bearer <token>" with any extra whitespace
  const m = v.match(/^Bearer\s+(.+)$/i);
  if (!m) return null;

  const token = (m[1] || "").trim();
  return token || null;
}

function sameToken(given: string, expected: string) {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Shared-secret guard for service-to-service calls.
 * End users are identified by the chat platform, never by this token.
 */
export function requireApiToken(expected: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = readBearerToken(req);
    if (!token) {
      return res.status(401).json({ error: "Missing token" });
    }
    if (!sameToken(token, expected)) {
      return res.status(401).json({ error: "Invalid token" });
    }
    return next();
  };
}
