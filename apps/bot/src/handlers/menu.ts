import type { Composer, Context } from "grammy";
import type { Logger } from "../logger.js";
import { sendReplies, startReplies } from "../replies.js";

export async function showMainMenu(params: { ctx: Context; logger: Logger; removePressed?: boolean }) {
  const { ctx, logger } = params;
  if (params.removePressed) {
    try {
      await ctx.deleteMessage();
    } catch (e) {
      // Old messages cannot be deleted; the menu is still sent.
      logger.debug({ err: e, from_id: ctx.from?.id }, "menu message not deleted");
    }
  }
  await sendReplies(ctx, startReplies());
}

export function registerMenuHandlers(params: { bot: Composer<Context>; logger: Logger }) {
  const { bot, logger } = params;

  bot.command("start", async (ctx) => {
    logger.info({ t: "cmd", handler: "start", from_id: ctx.from?.id, chat_id: ctx.chat?.id }, "command");
    await showMainMenu({ ctx, logger });
  });
}
