import { loadConfig } from "./config.js";
import { openStorage } from "./storage.js";
import { createTracker } from "./tracker.js";

const config = loadConfig();
const storage = openStorage(config);
await storage.ensureSchema();

const tracker = createTracker({ storage });

const userId = process.env.SEED_USER_ID || "demo-1";
const existing = await tracker.getActiveChallenge(userId);
if (existing) {
  console.log("Seed challenge already exists:", existing.text);
  await storage.close();
  process.exit(0);
}

await tracker.registerUser(userId, process.env.SEED_HANDLE || "demo", process.env.SEED_NAME || "Demo");
const challenge = await tracker.setChallenge(userId, process.env.SEED_CHALLENGE || "20 pushups", "daily");
const completion = await tracker.recordCompletion(userId);

console.log("Seeded:", { userId, challengeId: challenge.id, completionId: completion.id });
await storage.close();
