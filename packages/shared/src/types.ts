// Shared domain types. Keep this file small and explicit.

export type AreaCode = "north" | "center" | "south" | "other";

export type EditableField = "name" | "phone" | "area" | "city" | "capacity" | "date";

export interface BotUser {
  user_id: number;
  username: string | null;
  first_name: string;
  last_name: string | null;
}

export interface AdFields {
  name: string;
  phone: string;
  area: AreaCode;
  city: string;
  capacity: number;
  date_available: string; // YYYY-MM-DD
}

export interface DbAd extends AdFields {
  id: number;
  user_id: number;
  created_at: string | null;
}

export interface DbAdReport {
  ad_id: number;
  user_id: number;
  reported_at: string;
}
