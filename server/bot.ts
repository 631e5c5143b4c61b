import { Bot, GrammyError, HttpError, InlineKeyboard } from "grammy";
import type { Context } from "grammy";
import { failureReply, isUserFacing } from "./chat.js";
import type { ChatButton, ChatFlow, ChatProfile, ChatReply } from "./chat.js";
import { errorMessage } from "./errors.js";

export function toKeyboard(rows: ChatButton[][]) {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, i) => {
    if (i > 0) keyboard.row();
    for (const b of row) keyboard.text(b.label, b.data);
  });
  return keyboard;
}

function profileOf(ctx: Context): ChatProfile | null {
  const from = ctx.from;
  if (!from) return null;
  return {
    id: String(from.id),
    handle: from.username ?? null,
    displayName: from.first_name || null,
  };
}

async function send(ctx: Context, reply: ChatReply, mode: "reply" | "edit") {
  const options = {
    reply_markup: reply.buttons ? toKeyboard(reply.buttons) : undefined,
    parse_mode: reply.markdown ? ("Markdown" as const) : undefined,
  };
  if (mode === "edit") await ctx.editMessageText(reply.text, options);
  else await ctx.reply(reply.text, options);
}

export function createTrackerBot(deps: { token: string; flow: ChatFlow; logUpdates?: boolean }) {
  const bot = new Bot(deps.token);
  const { flow } = deps;

  if (deps.logUpdates) {
    bot.use(async (ctx, next) => {
      const kind = Object.keys(ctx.update).filter((k) => k !== "update_id")[0] ?? "update";
      console.log(`[update] ${kind} chat=${ctx.chat?.id ?? "-"} from=${ctx.from?.id ?? "-"}`);
      await next();
    });
  }

  /** Runs a flow step for the sender and renders the result, or the failure */
  async function respond(ctx: Context, mode: "reply" | "edit", step: (profile: ChatProfile) => Promise<ChatReply | null>) {
    const profile = profileOf(ctx);
    if (!profile) return;

    let reply: ChatReply | null;
    try {
      reply = await step(profile);
    } catch (err) {
      if (!isUserFacing(err)) console.error(`❌ Chat step failed for user ${profile.id}:`, errorMessage(err));
      reply = failureReply(err);
    }
    if (reply) await send(ctx, reply, mode);
  }

  bot.command("start", (ctx) => respond(ctx, "reply", (p) => flow.start(p)));
  bot.command("help", (ctx) => respond(ctx, "reply", (p) => flow.help(p)));
  bot.command("check", (ctx) => respond(ctx, "reply", (p) => flow.check(p)));
  bot.command("stats", (ctx) => respond(ctx, "reply", (p) => flow.stats(p)));

  bot.on("callback_query:data", async (ctx) => {
    await ctx.answerCallbackQuery();
    await respond(ctx, "edit", (p) => flow.callback(p, ctx.callbackQuery.data));
  });

  bot.on("message:text", async (ctx) => {
    // unknown commands are not challenge text
    if (ctx.message.text.startsWith("/")) return;
    await respond(ctx, "reply", (p) => flow.receiveText(p, ctx.message.text));
  });

  bot.catch((err) => {
    const e = err.error;
    if (e instanceof GrammyError) console.error("❌ Telegram API error:", e.description);
    else if (e instanceof HttpError) console.error("❌ Could not reach Telegram:", errorMessage(e.error));
    else console.error(`❌ Unhandled bot error for update ${err.ctx.update.update_id}:`, errorMessage(e));
  });

  return bot;
}
