import type { Composer, Context } from "grammy";
import type { User } from "grammy/types";
import type { BotUser } from "@safehost/shared";
import { decodeAction, type Action } from "../actions.js";
import type { ConversationRunner } from "../flows/runner.js";
import { REPORT_THRESHOLD, reportAd } from "../flows/moderation.js";
import type { Logger } from "../logger.js";
import { sendReplies } from "../replies.js";
import type { AdRepository } from "../repository.js";
import { TEXT } from "../texts.js";
import { allAdsReplies, areaAdsReplies, areaFilterReplies, myAdsReplies, reportReplies } from "./ads.js";
import { showMainMenu } from "./menu.js";

export type ActionDeps = {
  repository: AdRepository;
  runner: ConversationRunner;
  logger: Logger;
};

export function toBotUser(from: User): BotUser {
  return {
    user_id: from.id,
    username: from.username ?? null,
    first_name: from.first_name,
    last_name: from.last_name ?? null
  };
}

async function dispatchAction(ctx: Context, from: User, action: Action, deps: ActionDeps): Promise<void> {
  const { repository, runner, logger } = deps;
  switch (action.type) {
    case "main_menu":
      return showMainMenu({ ctx, logger, removePressed: true });
    case "post_ad":
    case "edit":
    case "area":
    case "field":
    case "value": {
      const res = await runner.handle(toBotUser(from), { kind: "action", action });
      // A button from a flow the user already left: fall back to the menu.
      if (!res.handled) return showMainMenu({ ctx, logger });
      return sendReplies(ctx, res.replies);
    }
    case "all_ads":
      return sendReplies(ctx, await allAdsReplies(repository));
    case "my_ads":
      return sendReplies(ctx, await myAdsReplies(repository, from.id));
    case "search_by_area":
      return sendReplies(ctx, areaFilterReplies());
    case "area_filter":
      return sendReplies(ctx, await areaAdsReplies(repository, action.area));
    case "delete": {
      const affected = await repository.deleteOwnedAd(action.adId, from.id);
      logger.info({ t: "ad_delete", user: from.id, ad_id: action.adId, affected }, "delete requested");
      if (affected === 0) {
        await ctx.reply(TEXT.adNotFound);
        return;
      }
      await ctx.editMessageText(TEXT.deleted);
      return;
    }
    case "report": {
      const outcome = await reportAd(repository, action.adId, from.id, REPORT_THRESHOLD);
      logger.info({ t: "ad_report", user: from.id, ad_id: action.adId, outcome: outcome.kind }, "report handled");
      return sendReplies(ctx, reportReplies(outcome, REPORT_THRESHOLD));
    }
    default: {
      const unhandled: never = action;
      throw new Error(`unhandled action: ${JSON.stringify(unhandled)}`);
    }
  }
}

export function registerActionHandlers(params: { bot: Composer<Context> } & ActionDeps) {
  const { bot, ...deps } = params;

  bot.on("callback_query:data", async (ctx) => {
    await ctx.answerCallbackQuery();
    const { data, from } = ctx.callbackQuery;
    const action = decodeAction(data);
    if (!action) {
      deps.logger.warn({ t: "action", user: from.id, data }, "unknown callback payload");
      return;
    }
    deps.logger.info({ t: "action", user: from.id, action: action.type }, "action");
    await dispatchAction(ctx, from, action, deps);
  });
}
