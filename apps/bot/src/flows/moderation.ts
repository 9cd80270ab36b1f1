import type { AdRepository } from "../repository.js";

export const REPORT_THRESHOLD = 3;

export type ReportOutcome =
  | { kind: "not_found" }
  | { kind: "duplicate" }
  | { kind: "recorded"; count: number }
  | { kind: "auto_deleted"; count: number };

/**
 * Records one user's report on an ad and removes the ad once it has collected
 * `threshold` distinct reports.
 *
 * The existence check and the count are separate reads. A concurrent duplicate is
 * caught by the (ad_id, user_id) primary key, and a count above the threshold still
 * deletes: deleting an ad that is already gone affects no rows.
 */
export async function reportAd(
  repository: AdRepository,
  adId: number,
  userId: number,
  threshold: number = REPORT_THRESHOLD
): Promise<ReportOutcome> {
  const ad = await repository.findAd(adId);
  if (!ad) return { kind: "not_found" };

  if (await repository.hasReported(adId, userId)) return { kind: "duplicate" };

  const inserted = await repository.insertReport(adId, userId);
  if (inserted === "duplicate") return { kind: "duplicate" };
  if (inserted === "missing") return { kind: "not_found" };

  const count = await repository.countReports(adId);
  if (count >= threshold) {
    await repository.deleteAd(adId);
    return { kind: "auto_deleted", count };
  }
  return { kind: "recorded", count };
}
