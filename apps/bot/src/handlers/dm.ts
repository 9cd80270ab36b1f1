import type { Composer, Context } from "grammy";
import type { ConversationRunner } from "../flows/runner.js";
import type { Logger } from "../logger.js";
import { sendReplies } from "../replies.js";
import { toBotUser } from "./actions.js";
import { showMainMenu } from "./menu.js";

export function registerDmHandlers(params: { bot: Composer<Context>; runner: ConversationRunner; logger: Logger }) {
  const { bot, runner, logger } = params;

  bot.on("message:text", async (ctx) => {
    if (!ctx.from || ctx.chat.type !== "private") return;
    const text = ctx.message.text;
    // Commands other than /start are not part of any flow.
    if (text.startsWith("/")) return showMainMenu({ ctx, logger });

    const res = await runner.handle(toBotUser(ctx.from), { kind: "text", text });
    if (!res.handled) return showMainMenu({ ctx, logger });
    await sendReplies(ctx, res.replies);
  });
}
