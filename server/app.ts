import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import { registerRoutes } from "./routes.js";
import type { Tracker } from "./tracker.js";

export type AppOptions = {
  tracker: Tracker;
  apiToken?: string;
  corsOrigins?: string[];
  requestLogging?: boolean;
  rateLimits?: boolean;
};

export function createApp(opts: AppOptions) {
  const app = express();
  const allowed = new Set(opts.corsOrigins ?? []);

  // Usually deployed behind a reverse proxy
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: (origin, cb) => {
        // server-to-server calls carry no Origin header
        if (!origin || allowed.has(origin)) return cb(null, true);
        return cb(null, false);
      },
      methods: ["GET", "POST", "PUT", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    }),
  );

  app.use(helmet({ crossOriginResourcePolicy: { policy: "same-site" } }));
  app.use(express.json({ limit: "100kb" }));
  if (opts.requestLogging !== false) app.use(morgan("dev"));

  if (opts.rateLimits !== false) {
    app.use(
      rateLimit({
        windowMs: 15 * 60 * 1000,
        limit: 600,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  registerRoutes(app, { tracker: opts.tracker, apiToken: opts.apiToken, rateLimits: opts.rateLimits });
  return app;
}
