import { NoActiveChallengeError, ValidationError } from "./errors.js";
import type { PendingSetupStore } from "./pendingSetup.js";
import type { Tracker } from "./tracker.js";
import type { Frequency } from "./types.js";

/** Who sent the update, as the chat platform reports it */
export type ChatProfile = {
  id: string;
  handle: string | null;
  displayName: string | null;
};

export type ChatButton = { label: string; data: string };

export type ChatReply = {
  text: string;
  buttons?: ChatButton[][];
  markdown?: boolean;
};

export type CallbackAction =
  | { kind: "frequency"; frequency: Frequency }
  | { kind: "complete" }
  | { kind: "not_complete" };

/**
 * Callback data sent by our inline buttons.
 * `complete_<id>` is the older check-in button format. Its id is ignored:
 * completions go to whatever challenge is active when they are recorded.
 */
export function parseCallbackData(data: string): CallbackAction | null {
  const d = data.trim();
  if (d === "daily" || d === "weekly") return { kind: "frequency", frequency: d };
  if (d === "complete" || /^complete_\d+$/.test(d)) return { kind: "complete" };
  if (d === "not_complete") return { kind: "not_complete" };
  return null;
}

/** Escapes the characters legacy Telegram Markdown treats as markup */
export function escapeMarkdown(s: string) {
  return s.replace(/([_*`[])/g, "\\$1");
}

export function medalFor(rank: number) {
  if (rank === 1) return "🥇";
  if (rank === 2) return "🥈";
  if (rank === 3) return "🥉";
  return "👤";
}

export function helpText(windowDays: number) {
  return (
    "Commands:\n" +
    "/start - set up a new daily or weekly challenge\n" +
    "/check - check in on your current challenge\n" +
    `/stats - leaderboard for the last ${windowDays} days\n` +
    "/help - this message"
  );
}

const NO_CHALLENGE_TEXT = "You don't have an active challenge. Use /start to create one!";
const TRANSIENT_FAILURE_TEXT = "⚠️ Something went wrong on our side. Please try again in a moment.";

/** Turns an error thrown by a flow step into what the user sees */
export function failureReply(err: unknown): ChatReply {
  if (err instanceof NoActiveChallengeError) return { text: NO_CHALLENGE_TEXT };
  if (err instanceof ValidationError) return { text: `⚠️ ${err.message}` };
  return { text: TRANSIENT_FAILURE_TEXT };
}

export function isUserFacing(err: unknown) {
  return err instanceof NoActiveChallengeError || err instanceof ValidationError;
}

/**
 * Conversation logic for the chat front end. Platform neutral: every step
 * takes the sender's profile and returns a reply description.
 */
export function createChatFlow(deps: { tracker: Tracker; pending: PendingSetupStore; windowDays: number }) {
  const { tracker, pending, windowDays } = deps;

  // every interaction refreshes the user's names
  async function touch(profile: ChatProfile) {
    await tracker.registerUser(profile.id, profile.handle, profile.displayName);
  }

  async function start(profile: ChatProfile): Promise<ChatReply> {
    await touch(profile);
    const name = profile.displayName || profile.handle || "there";
    return {
      text: `Hi ${name}! 💪\n\nWelcome to the Challenge Tracker!\nChoose your challenge frequency:`,
      buttons: [
        [
          { label: "Daily Challenge", data: "daily" },
          { label: "Weekly Challenge", data: "weekly" },
        ],
      ],
    };
  }

  async function chooseFrequency(profile: ChatProfile, frequency: Frequency): Promise<ChatReply> {
    await touch(profile);
    pending.begin(profile.id, frequency);
    return {
      text: `Great! You've chosen a ${frequency} challenge.\n\nNow, type your challenge (e.g., '35 pushups per day'):`,
    };
  }

  async function receiveText(profile: ChatProfile, text: string): Promise<ChatReply> {
    await touch(profile);
    const setup = pending.peek(profile.id);
    if (!setup) return { text: "Please use /start to begin setting up your challenge." };

    try {
      const challenge = await tracker.setChallenge(profile.id, text, setup.frequency);
      pending.clear(profile.id);
      return {
        text:
          `✅ Challenge set!\n\n` +
          `📋 Your ${challenge.frequency} challenge: ${challenge.text}\n\n` +
          `Use /check whenever you've done it.`,
      };
    } catch (err) {
      // the pending setup stays so the user can simply send another message
      if (err instanceof ValidationError) return { text: `⚠️ ${err.message}. Please type your challenge again:` };
      throw err;
    }
  }

  async function check(profile: ChatProfile): Promise<ChatReply> {
    await touch(profile);
    const challenge = await tracker.getActiveChallenge(profile.id);
    if (!challenge) return { text: NO_CHALLENGE_TEXT };

    return {
      text: `Did you complete your ${challenge.frequency} challenge?\n\n📋 ${challenge.text}`,
      buttons: [
        [
          { label: "✅ Yes, completed!", data: "complete" },
          { label: "❌ Not yet", data: "not_complete" },
        ],
      ],
    };
  }

  async function complete(profile: ChatProfile): Promise<ChatReply> {
    await touch(profile);
    try {
      await tracker.recordCompletion(profile.id);
    } catch (err) {
      if (err instanceof NoActiveChallengeError) return { text: NO_CHALLENGE_TEXT };
      throw err;
    }
    return { text: "✅ Great job! Challenge marked as complete!" };
  }

  async function notYet(profile: ChatProfile): Promise<ChatReply> {
    await touch(profile);
    return { text: "No worries! Use /check again once you've done it. 💪" };
  }

  async function stats(profile: ChatProfile): Promise<ChatReply> {
    await touch(profile);
    const entries = await tracker.monthlyLeaderboard(windowDays);
    if (entries.length === 0) return { text: "No statistics available yet!" };

    const lines = entries.map((e) => `${medalFor(e.rank)} ${escapeMarkdown(e.name)}: ${e.count} completions`);
    return {
      text: `🏆 *Monthly Leaderboard* (Last ${windowDays} days)\n\n${lines.join("\n")}\n`,
      markdown: true,
    };
  }

  async function callback(profile: ChatProfile, data: string): Promise<ChatReply | null> {
    await touch(profile);
    const action = parseCallbackData(data);
    if (!action) return null;
    if (action.kind === "frequency") return chooseFrequency(profile, action.frequency);
    if (action.kind === "complete") return complete(profile);
    return notYet(profile);
  }

  async function help(profile: ChatProfile): Promise<ChatReply> {
    await touch(profile);
    return { text: helpText(windowDays) };
  }

  return { start, help, chooseFrequency, receiveText, check, complete, notYet, stats, callback };
}

export type ChatFlow = ReturnType<typeof createChatFlow>;
