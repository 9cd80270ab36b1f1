import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemorySessionStorage, type Bot } from "grammy";
import type { Update } from "grammy/types";
import type { AdFields } from "@safehost/shared";
import { createBot } from "../src/bot.js";
import { StoreError } from "../src/errors.js";
import { createLogger } from "../src/logger.js";
import { buildServer, WEBHOOK_PATH } from "../src/server.js";
import type { Session } from "../src/state.js";
import { BUTTON, INTRO_TEXT, TEXT } from "../src/texts.js";
import { MemoryAdRepository } from "./memoryRepository.js";
import { startTelegramStandIn } from "./telegramStandIn.js";

const listing: AdFields = {
  name: "Dana Levi",
  phone: "0501234567",
  area: "north",
  city: "Haifa",
  capacity: 4,
  date_available: "2026-10-20"
};

let nextUpdateId = 1;

function buttonPress(userId: number, data: string): Update {
  return {
    update_id: nextUpdateId++,
    callback_query: {
      id: `cb-${nextUpdateId}`,
      from: { id: userId, is_bot: false, first_name: "Tester" },
      chat_instance: "ci-1",
      data,
      message: {
        message_id: 10,
        date: 1_700_000_000,
        chat: { id: userId, type: "private", first_name: "Tester" },
        text: "card"
      }
    }
  };
}

function textMessage(userId: number, text: string): Update {
  return {
    update_id: nextUpdateId++,
    message: {
      message_id: 20,
      date: 1_700_000_000,
      chat: { id: userId, type: "private", first_name: "Tester" },
      from: { id: userId, is_bot: false, first_name: "Tester" },
      text
    }
  };
}

describe("createBot", () => {
  let telegram: Awaited<ReturnType<typeof startTelegramStandIn>>;
  let repository: MemoryAdRepository;
  let bot: Bot;

  beforeEach(async () => {
    telegram = await startTelegramStandIn();
    repository = new MemoryAdRepository();
    bot = createBot(
      "test-token",
      { repository, sessions: new MemorySessionStorage<Session>(), logger: createLogger("silent") },
      { client: { apiRoot: telegram.apiRoot } }
    );
    await bot.init();
  });

  afterEach(async () => {
    await telegram.close();
  });

  it("answers /start with the intro and the main menu", async () => {
    await bot.handleUpdate(textMessage(42, "/start"));
    const sent = telegram.sent();
    expect(sent.map((c) => c.method)).toEqual(["sendMessage", "sendMessage"]);
    expect(sent[0]?.payload).toMatchObject({ chat_id: 42, text: INTRO_TEXT });
    expect(sent[1]?.payload).toMatchObject({
      chat_id: 42,
      text: TEXT.chooseAction,
      reply_markup: { inline_keyboard: [[{ text: BUTTON.postAd, callback_data: "post_ad" }], [{}], [{}], [{}]] }
    });
  });

  it("edits the card away after deleting an own ad", async () => {
    const ad = repository.seedAd(42, listing);
    await bot.handleUpdate(buttonPress(42, `delete:${ad.id}`));

    expect(repository.ads).toEqual([]);
    expect(telegram.sent()).toMatchObject([
      { method: "answerCallbackQuery" },
      { method: "editMessageText", payload: { chat_id: 42, message_id: 10, text: TEXT.deleted } }
    ]);
  });

  it("refuses to delete someone else's ad", async () => {
    const ad = repository.seedAd(42, listing);
    await bot.handleUpdate(buttonPress(7, `delete:${ad.id}`));

    expect(repository.ads).toHaveLength(1);
    expect(telegram.sent()).toMatchObject([
      { method: "answerCallbackQuery" },
      { method: "sendMessage", payload: { chat_id: 7, text: TEXT.adNotFound } }
    ]);
  });

  it("falls back to the main menu for a button of a flow the user is not in", async () => {
    await bot.handleUpdate(buttonPress(42, "area:north"));

    const sent = telegram.sent();
    expect(sent.map((c) => c.method)).toEqual(["answerCallbackQuery", "sendMessage", "sendMessage"]);
    expect(sent[1]?.payload).toMatchObject({ text: INTRO_TEXT });
    expect(sent[2]?.payload).toMatchObject({ text: TEXT.chooseAction });
  });

  it("ignores unknown callback payloads after acknowledging them", async () => {
    await bot.handleUpdate(buttonPress(42, "m:stats"));
    expect(telegram.sent().map((c) => c.method)).toEqual(["answerCallbackQuery"]);
  });

  it("runs the creation flow from private text messages", async () => {
    await bot.handleUpdate(buttonPress(42, "post_ad"));
    await bot.handleUpdate(textMessage(42, "Dana Levi"));

    expect(telegram.sent().slice(-1)).toMatchObject([{ method: "sendMessage", payload: { chat_id: 42, text: TEXT.askPhone } }]);
  });

  it("turns a handler failure into the generic error message", async () => {
    repository.listAll = async () => {
      throw new StoreError("list_all", new Error("down"));
    };
    await bot.handleUpdate(buttonPress(42, "all_ads"));

    expect(telegram.sent()).toMatchObject([
      { method: "answerCallbackQuery" },
      { method: "sendMessage", payload: { chat_id: 42, text: TEXT.genericError } }
    ]);
  });

  it("acknowledges a failing webhook update and still apologises", async () => {
    repository.listAll = async () => {
      throw new StoreError("list_all", new Error("down"));
    };
    const app = buildServer({ bot, logger: createLogger("silent"), secretToken: "test-secret" });
    try {
      const res = await app.inject({
        method: "POST",
        url: WEBHOOK_PATH,
        headers: { "x-telegram-bot-api-secret-token": "test-secret" },
        payload: buttonPress(42, "all_ads")
      });
      expect(res.statusCode).toBe(200);
      expect(telegram.sent()).toMatchObject([
        { method: "answerCallbackQuery" },
        { method: "sendMessage", payload: { chat_id: 42, text: TEXT.genericError } }
      ]);
    } finally {
      await app.close();
    }
  });
});
