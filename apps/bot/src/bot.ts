import { Bot, type BotConfig, type BotError, type Context } from "grammy";
import { createSupabaseAdmin, getEnv, loadEnvLocal } from "./config.js";
import { ConversationRunner } from "./flows/runner.js";
import { registerActionHandlers } from "./handlers/actions.js";
import { registerDmHandlers } from "./handlers/dm.js";
import { registerMenuHandlers } from "./handlers/menu.js";
import { createLogger, type Logger } from "./logger.js";
import { SupabaseAdRepository, type AdRepository } from "./repository.js";
import { buildServer, WEBHOOK_PATH } from "./server.js";
import { createSessionStorage, type SessionStorage } from "./state.js";
import { TEXT } from "./texts.js";

export type BotDeps = {
  repository: AdRepository;
  sessions: SessionStorage;
  logger: Logger;
  now?: () => Date;
};

export function createBot(token: string, deps: BotDeps, config?: BotConfig<Context>): Bot {
  const bot = new Bot(token, config);
  const runner = new ConversationRunner(deps);
  const { repository, logger } = deps;
  const onError = createErrorHandler(logger);

  // bot.catch only sees errors under bot.start(); webhookCallback rethrows, so the
  // handlers also sit behind a boundary that logs and apologises in both modes.
  const handlers = bot.errorBoundary(onError);
  registerMenuHandlers({ bot: handlers, logger });
  registerActionHandlers({ bot: handlers, repository, runner, logger });
  registerDmHandlers({ bot: handlers, runner, logger });

  bot.catch(onError);

  return bot;
}

/** Logs a failed update and sends the generic error message to its chat, if it has one. */
export function createErrorHandler(logger: Logger) {
  return async (err: BotError<Context>) => {
    const ctx = err.ctx;
    logger.error(
      { err: err.error, update_id: ctx.update.update_id, from_id: ctx.from?.id, chat_id: ctx.chat?.id },
      "Exception while handling an update"
    );
    if (!ctx.chat) return;
    try {
      await ctx.reply(TEXT.genericError);
    } catch (e) {
      logger.error({ err: e, update_id: ctx.update.update_id }, "Failed to send error message");
    }
  };
}

export async function startBot() {
  loadEnvLocal();
  const E = getEnv();
  const logger = createLogger(E.LOG_LEVEL);
  const repository = new SupabaseAdRepository(createSupabaseAdmin(E));
  const bot = createBot(E.TELEGRAM_BOT_TOKEN, { repository, sessions: createSessionStorage(), logger });

  await bot.api.setMyCommands([{ command: "start", description: "תפריט ראשי" }]);

  if (E.BOT_MODE === "webhook") {
    const app = buildServer({ bot, logger, secretToken: E.WEBHOOK_SECRET });
    await bot.api.setWebhook(E.WEBHOOK_URL, { secret_token: E.WEBHOOK_SECRET, drop_pending_updates: true });
    const shutdown = () => {
      app.close().catch((e: unknown) => logger.error({ err: e }, "server close failed"));
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    await app.listen({ port: E.PORT, host: "0.0.0.0" });
    logger.info({ path: WEBHOOK_PATH, port: E.PORT }, "Bot started (webhook)");
    return;
  }

  // Ensure we are the only consumer (no webhook).
  await bot.api.deleteWebhook({ drop_pending_updates: true });
  const shutdown = () => {
    bot.stop().catch((e: unknown) => logger.error({ err: e }, "bot stop failed"));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  logger.info("Bot started (long polling)...");
  await bot.start();
}
