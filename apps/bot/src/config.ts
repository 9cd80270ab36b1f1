import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

const DEFAULT_ENV_FILE = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "env.local");

// Values already present in the environment win over the file.
export function loadEnvLocal(envPath: string = DEFAULT_ENV_FILE, target: NodeJS.ProcessEnv = process.env) {
  if (!fs.existsSync(envPath)) return;
  const raw = fs.readFileSync(envPath, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const idx = s.indexOf("=");
    if (idx < 0) continue;
    const key = s.slice(0, idx).trim();
    const value = s.slice(idx + 1).trim();
    if (!key) continue;
    if (target[key] === undefined && value !== "") {
      target[key] = value;
    }
  }
}

type BaseEnv = {
  TELEGRAM_BOT_TOKEN: string;
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  WEBHOOK_SECRET: string | undefined;
  PORT: number;
  LOG_LEVEL: string;
};

export type Env = BaseEnv & ({ BOT_MODE: "polling" } | { BOT_MODE: "webhook"; WEBHOOK_URL: string });

function required(source: NodeJS.ProcessEnv, key: string): string {
  const value = source[key]?.trim();
  if (!value) throw new Error(`Missing env: ${key}`);
  return value;
}

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const portRaw = source.PORT?.trim() || "3000";
  const port = Number(portRaw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) throw new Error(`Invalid env: PORT=${portRaw}`);

  const base: BaseEnv = {
    TELEGRAM_BOT_TOKEN: required(source, "TELEGRAM_BOT_TOKEN"),
    SUPABASE_URL: required(source, "SUPABASE_URL"),
    SUPABASE_SERVICE_ROLE_KEY: required(source, "SUPABASE_SERVICE_ROLE_KEY"),
    WEBHOOK_SECRET: source.WEBHOOK_SECRET?.trim() || undefined,
    PORT: port,
    LOG_LEVEL: source.LOG_LEVEL?.trim() || "info"
  };

  const mode = source.BOT_MODE?.trim() || "polling";
  if (mode === "polling") return { ...base, BOT_MODE: "polling" };
  if (mode === "webhook") return { ...base, BOT_MODE: "webhook", WEBHOOK_URL: required(source, "WEBHOOK_URL") };
  throw new Error(`Invalid env: BOT_MODE=${mode} (expected polling or webhook)`);
}

export function createSupabaseAdmin(env: Pick<Env, "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY">): SupabaseClient {
  return createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
}
