import { MemorySessionStorage, type StorageAdapter } from "grammy";
import type { AdFields, EditableField } from "@safehost/shared";

// In-memory conversation state. Restarting the bot clears it.

export type CreateStep = "NAME" | "PHONE" | "AREA" | "CITY" | "CAPACITY" | "DATE";

export type AdDraft = Partial<AdFields>;

export type Session =
  | { step: CreateStep; draft: AdDraft }
  | { step: "EDIT_FIELD_SELECT"; adId: number }
  | { step: "EDIT_VALUE"; adId: number; field: EditableField };

export type SessionStorage = StorageAdapter<Session>;

export function createSessionStorage(): SessionStorage {
  return new MemorySessionStorage<Session>();
}

export function sessionKey(telegramUserId: number): string {
  return String(telegramUserId);
}
