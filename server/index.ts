import type { Server } from "node:http";
import { createTrackerBot } from "./bot.js";
import { createApp } from "./app.js";
import { createChatFlow } from "./chat.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createPendingSetupStore } from "./pendingSetup.js";
import { openStorage } from "./storage.js";
import { createTracker } from "./tracker.js";

async function main() {
  const config = loadConfig();
  const storage = openStorage(config);

  // DB must be ready before anything reads from it
  await storage.ensureSchema();

  const tracker = createTracker({ storage });
  const pending = createPendingSetupStore({ ttlMs: config.pendingSetupTtlMs });
  const sweeper = setInterval(() => pending.sweep(), 60 * 1000);
  sweeper.unref();

  const app = createApp({
    tracker,
    apiToken: config.apiToken,
    corsOrigins: config.corsOrigins,
    requestLogging: config.env !== "test",
  });
  if (!config.apiToken) console.warn("⚠️ API_TOKEN not set: only /api/health is served");

  const server: Server = app.listen(config.port, "0.0.0.0", () => {
    console.log(`✅ Server listening on port ${config.port}`);
  });

  const flow = createChatFlow({ tracker, pending, windowDays: config.leaderboardWindowDays });
  const bot = config.botToken
    ? createTrackerBot({ token: config.botToken, flow, logUpdates: config.env !== "test" })
    : null;

  if (bot) {
    bot
      .start({ onStart: (info) => console.log(`✅ Bot @${info.username} polling for updates`) })
      .catch((err) => {
        console.error("❌ Bot stopped:", errorMessage(err));
        process.exitCode = 1;
      });
  } else {
    console.warn("⚠️ BOT_TOKEN not set: chat bot disabled");
  }

  let shuttingDown = false;
  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Received ${signal}, shutting down`);
    clearInterval(sweeper);
    if (bot) await bot.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await storage.close();
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("❌ Shutdown failed:", errorMessage(err));
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err) => {
  console.error("❌ Fatal startup error:", errorMessage(err));
  process.exit(1);
});
