import dotenv from "dotenv";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((s) => {
    const v = (s ?? "").trim();
    return v ? v : undefined;
  });

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    STORAGE: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: optionalString,
    PGSSLMODE: optionalString,
    BOT_TOKEN: optionalString,
    API_TOKEN: optionalString.refine((s) => s === undefined || s.length >= 16, "API_TOKEN must be at least 16 characters"),
    CORS_ORIGINS: optionalString,
    LEADERBOARD_WINDOW_DAYS: z.coerce.number().int().min(1).max(365).default(30),
    PENDING_SETUP_TTL_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(15),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORAGE=postgres (use STORAGE=memory for a throwaway run)",
      });
    }
  });

export type AppConfig = {
  env: "development" | "production" | "test";
  port: number;
  storage: { driver: "memory" } | { driver: "postgres"; databaseUrl: string; ssl: boolean };
  botToken?: string;
  apiToken?: string;
  corsOrigins: string[];
  leaderboardWindowDays: number;
  pendingSetupTtlMs: number;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => ` - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Reads configuration from `source` (process.env by default).
 * `.env` is only loaded when reading the real process environment.
 */
export function loadConfig(source?: NodeJS.ProcessEnv): AppConfig {
  if (!source) dotenv.config();
  const parsed = EnvSchema.safeParse(source ?? process.env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`));
  }

  const env = parsed.data;
  let storage: AppConfig["storage"] = { driver: "memory" };
  if (env.STORAGE === "postgres" && env.DATABASE_URL) {
    // SSL on when PGSSLMODE=require or the URL carries sslmode=require
    const ssl =
      (env.PGSSLMODE ?? "").toLowerCase() === "require" || env.DATABASE_URL.toLowerCase().includes("sslmode=require");
    storage = { driver: "postgres", databaseUrl: env.DATABASE_URL, ssl };
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    storage,
    botToken: env.BOT_TOKEN,
    apiToken: env.API_TOKEN,
    corsOrigins: (env.CORS_ORIGINS ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    leaderboardWindowDays: env.LEADERBOARD_WINDOW_DAYS,
    pendingSetupTtlMs: env.PENDING_SETUP_TTL_MINUTES * 60 * 1000,
  };
}
