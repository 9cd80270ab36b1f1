import Fastify from "fastify";
import { webhookCallback, type Bot } from "grammy";
import type { Logger } from "./logger.js";

export const WEBHOOK_PATH = "/telegram";

export function buildServer(params: { bot: Bot; logger: Logger; secretToken?: string }) {
  const app = Fastify({ logger: params.logger });

  app.get("/health", async () => {
    return { ok: true, service: "safehost-bot", ts: new Date().toISOString() };
  });

  // grammy rejects requests whose X-Telegram-Bot-Api-Secret-Token does not match.
  app.post(WEBHOOK_PATH, webhookCallback(params.bot, "fastify", { secretToken: params.secretToken }));

  return app;
}
