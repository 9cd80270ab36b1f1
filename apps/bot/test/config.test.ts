import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { getEnv, loadEnvLocal } from "../src/config.js";

const base = {
  TELEGRAM_BOT_TOKEN: "test-token",
  SUPABASE_URL: "http://localhost:54321",
  SUPABASE_SERVICE_ROLE_KEY: "test-key"
};

describe("getEnv", () => {
  it("fills defaults for polling mode", () => {
    expect(getEnv({ ...base })).toEqual({
      ...base,
      WEBHOOK_SECRET: undefined,
      PORT: 3000,
      LOG_LEVEL: "info",
      BOT_MODE: "polling"
    });
  });

  it("requires the bot token and store credentials", () => {
    expect(() => getEnv({ ...base, TELEGRAM_BOT_TOKEN: " " })).toThrow("Missing env: TELEGRAM_BOT_TOKEN");
    expect(() => getEnv({ TELEGRAM_BOT_TOKEN: "test-token", SUPABASE_URL: "http://localhost:54321" })).toThrow(
      "Missing env: SUPABASE_SERVICE_ROLE_KEY"
    );
  });

  it("requires WEBHOOK_URL in webhook mode", () => {
    expect(() => getEnv({ ...base, BOT_MODE: "webhook" })).toThrow("Missing env: WEBHOOK_URL");
    const env = getEnv({ ...base, BOT_MODE: "webhook", WEBHOOK_URL: "https://example.test/telegram", WEBHOOK_SECRET: "test-secret" });
    expect(env).toMatchObject({ BOT_MODE: "webhook", WEBHOOK_URL: "https://example.test/telegram", WEBHOOK_SECRET: "test-secret" });
  });

  it("rejects an unknown mode and a bad port", () => {
    expect(() => getEnv({ ...base, BOT_MODE: "push" })).toThrow("Invalid env: BOT_MODE=push (expected polling or webhook)");
    expect(() => getEnv({ ...base, PORT: "http" })).toThrow("Invalid env: PORT=http");
    expect(getEnv({ ...base, PORT: "8080", LOG_LEVEL: "debug" })).toMatchObject({ PORT: 8080, LOG_LEVEL: "debug" });
  });
});

describe("loadEnvLocal", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("adds missing keys without overriding existing ones", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "safehost-env-"));
    const file = path.join(dir, "env.local");
    fs.writeFileSync(file, "# comment\nBOT_MODE=webhook\nPORT = 4000\nEMPTY=\nnot a pair\nLOG_LEVEL=debug\n");

    const target: NodeJS.ProcessEnv = { LOG_LEVEL: "warn" };
    loadEnvLocal(file, target);
    expect(target).toEqual({ BOT_MODE: "webhook", PORT: "4000", LOG_LEVEL: "warn" });
  });

  it("does nothing when the file is absent", () => {
    const target: NodeJS.ProcessEnv = {};
    loadEnvLocal(path.join(os.tmpdir(), "safehost-missing", "env.local"), target);
    expect(target).toEqual({});
  });
});
