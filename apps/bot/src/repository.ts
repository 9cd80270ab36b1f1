import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { EDITABLE_FIELDS, isEditableField, type AdFields, type AreaCode, type BotUser, type DbAd } from "@safehost/shared";
import { StoreError, ValidationError } from "./errors.js";

export type ReportInsert = "inserted" | "duplicate" | "missing";

export interface AdRepository {
  // Single-table writes. The bot itself publishes through publishAd.
  upsertUser(user: BotUser): Promise<void>;
  insertAd(userId: number, fields: AdFields): Promise<number>;
  /** User upsert + ad insert, committed together. */
  publishAd(user: BotUser, fields: AdFields): Promise<number>;
  findAd(adId: number): Promise<DbAd | null>;
  listAll(): Promise<DbAd[]>;
  listByOwner(userId: number): Promise<DbAd[]>;
  listByArea(area: AreaCode): Promise<DbAd[]>;
  /** Returns the number of rows removed (0 when the id/owner pair does not match). */
  deleteOwnedAd(adId: number, userId: number): Promise<number>;
  /** Returns the number of rows changed. `field` must be on the allow-list. */
  updateAdField(adId: number, userId: number, field: string, value: string | number): Promise<number>;
  hasReported(adId: number, userId: number): Promise<boolean>;
  insertReport(adId: number, userId: number): Promise<ReportInsert>;
  countReports(adId: number): Promise<number>;
  /** Moderation path: no owner check. */
  deleteAd(adId: number): Promise<number>;
}

const AD_COLUMNS = "id, user_id, name, phone, area, city, capacity, date_available, created_at";

// Postgres SQLSTATE codes surfaced by PostgREST.
const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

const adRowSchema = z.object({
  id: z.coerce.number().int(),
  user_id: z.coerce.number().int(),
  name: z.string(),
  phone: z.string(),
  area: z.enum(["north", "center", "south", "other"]),
  city: z.string(),
  capacity: z.coerce.number().int(),
  date_available: z.string(),
  created_at: z
    .string()
    .nullish()
    .transform((v) => v ?? null)
});

const idRowsSchema = z.array(z.object({ id: z.coerce.number().int() }));

function parseAds(operation: string, data: unknown): DbAd[] {
  const parsed = z.array(adRowSchema).safeParse(data ?? []);
  if (!parsed.success) throw new StoreError(operation, parsed.error);
  return parsed.data;
}

function affectedRows(operation: string, data: unknown): number {
  const parsed = idRowsSchema.safeParse(data ?? []);
  if (!parsed.success) throw new StoreError(operation, parsed.error);
  return parsed.data.length;
}

export class SupabaseAdRepository implements AdRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsertUser(user: BotUser): Promise<void> {
    const { error } = await this.db.from("users").upsert(user, { onConflict: "user_id" });
    if (error) throw new StoreError("upsert_user", error);
  }

  async insertAd(userId: number, fields: AdFields): Promise<number> {
    const { data, error } = await this.db
      .from("ads")
      .insert({ user_id: userId, ...fields })
      .select("id")
      .single();
    if (error) throw new StoreError("insert_ad", error);
    const parsed = z.object({ id: z.coerce.number().int() }).safeParse(data);
    if (!parsed.success) throw new StoreError("insert_ad", parsed.error);
    return parsed.data.id;
  }

  async publishAd(user: BotUser, fields: AdFields): Promise<number> {
    // Both writes live in one plpgsql function, so they commit or roll back together.
    const { data, error } = await this.db.rpc("publish_ad", {
      p_user_id: user.user_id,
      p_username: user.username,
      p_first_name: user.first_name,
      p_last_name: user.last_name,
      p_name: fields.name,
      p_phone: fields.phone,
      p_area: fields.area,
      p_city: fields.city,
      p_capacity: fields.capacity,
      p_date_available: fields.date_available
    });
    if (error) throw new StoreError("publish_ad", error);
    const parsed = z.coerce.number().int().safeParse(data);
    if (!parsed.success) throw new StoreError("publish_ad", parsed.error);
    return parsed.data;
  }

  async findAd(adId: number): Promise<DbAd | null> {
    const { data, error } = await this.db.from("ads").select(AD_COLUMNS).eq("id", adId).limit(1);
    if (error) throw new StoreError("find_ad", error);
    return parseAds("find_ad", data)[0] ?? null;
  }

  async listAll(): Promise<DbAd[]> {
    const { data, error } = await this.db
      .from("ads")
      .select(AD_COLUMNS)
      .order("date_available", { ascending: true })
      .order("id", { ascending: true });
    if (error) throw new StoreError("list_all", error);
    return parseAds("list_all", data);
  }

  async listByOwner(userId: number): Promise<DbAd[]> {
    const { data, error } = await this.db
      .from("ads")
      .select(AD_COLUMNS)
      .eq("user_id", userId)
      .order("date_available", { ascending: true })
      .order("id", { ascending: true });
    if (error) throw new StoreError("list_by_owner", error);
    return parseAds("list_by_owner", data);
  }

  async listByArea(area: AreaCode): Promise<DbAd[]> {
    const { data, error } = await this.db
      .from("ads")
      .select(AD_COLUMNS)
      .eq("area", area)
      .order("date_available", { ascending: true })
      .order("id", { ascending: true });
    if (error) throw new StoreError("list_by_area", error);
    return parseAds("list_by_area", data);
  }

  async deleteOwnedAd(adId: number, userId: number): Promise<number> {
    const { data, error } = await this.db.from("ads").delete().eq("id", adId).eq("user_id", userId).select("id");
    if (error) throw new StoreError("delete_owned_ad", error);
    return affectedRows("delete_owned_ad", data);
  }

  async updateAdField(adId: number, userId: number, field: string, value: string | number): Promise<number> {
    // The column name is never taken from input: only allow-listed fields map to a column.
    if (!isEditableField(field)) throw new ValidationError(`field is not editable: ${field}`);
    const column = EDITABLE_FIELDS[field];
    const { data, error } = await this.db
      .from("ads")
      .update({ [column]: value })
      .eq("id", adId)
      .eq("user_id", userId)
      .select("id");
    if (error) throw new StoreError("update_ad_field", error);
    return affectedRows("update_ad_field", data);
  }

  async hasReported(adId: number, userId: number): Promise<boolean> {
    const { count, error } = await this.db
      .from("ad_reports")
      .select("ad_id", { count: "exact", head: true })
      .eq("ad_id", adId)
      .eq("user_id", userId);
    if (error) throw new StoreError("has_reported", error);
    return (count ?? 0) > 0;
  }

  async insertReport(adId: number, userId: number): Promise<ReportInsert> {
    const { error } = await this.db.from("ad_reports").insert({ ad_id: adId, user_id: userId });
    if (!error) return "inserted";
    if (error.code === UNIQUE_VIOLATION) return "duplicate";
    if (error.code === FOREIGN_KEY_VIOLATION) return "missing";
    throw new StoreError("insert_report", error);
  }

  async countReports(adId: number): Promise<number> {
    const { count, error } = await this.db
      .from("ad_reports")
      .select("ad_id", { count: "exact", head: true })
      .eq("ad_id", adId);
    if (error) throw new StoreError("count_reports", error);
    return count ?? 0;
  }

  async deleteAd(adId: number): Promise<number> {
    const { data, error } = await this.db.from("ads").delete().eq("id", adId).select("id");
    if (error) throw new StoreError("delete_ad", error);
    return affectedRows("delete_ad", data);
  }
}
