import { areaLabel, type AreaCode, type DbAd } from "@safehost/shared";
import type { ReportOutcome } from "../flows/moderation.js";
import { areaChoiceReply, backToMenuReply, type Reply } from "../replies.js";
import type { AdRepository } from "../repository.js";
import { BUTTON, TEXT, formatAd } from "../texts.js";

function publicCard(ad: DbAd): Reply {
  return { text: formatAd(ad), buttons: [[{ label: BUTTON.report, action: { type: "report", adId: ad.id } }]] };
}

function ownCard(ad: DbAd): Reply {
  return {
    text: formatAd(ad),
    buttons: [
      [
        { label: BUTTON.edit, action: { type: "edit", adId: ad.id } },
        { label: BUTTON.delete, action: { type: "delete", adId: ad.id } }
      ]
    ]
  };
}

function listing(ads: DbAd[], card: (ad: DbAd) => Reply, emptyText: string): Reply[] {
  const cards = ads.length > 0 ? ads.map(card) : [{ text: emptyText }];
  return [...cards, backToMenuReply()];
}

export async function allAdsReplies(repository: AdRepository): Promise<Reply[]> {
  return listing(await repository.listAll(), publicCard, TEXT.noAds);
}

export async function areaAdsReplies(repository: AdRepository, area: AreaCode): Promise<Reply[]> {
  return listing(await repository.listByArea(area), publicCard, TEXT.noAdsInArea(areaLabel(area)));
}

export async function myAdsReplies(repository: AdRepository, userId: number): Promise<Reply[]> {
  return listing(await repository.listByOwner(userId), ownCard, TEXT.noMyAds);
}

export function areaFilterReplies(): Reply[] {
  return [areaChoiceReply(TEXT.chooseFilterArea, "area_filter")];
}

export function reportReplies(outcome: ReportOutcome, threshold: number): Reply[] {
  switch (outcome.kind) {
    case "not_found":
      return [{ text: TEXT.reportedAdMissing }];
    case "duplicate":
      return [{ text: TEXT.alreadyReported }];
    case "recorded":
      return [{ text: TEXT.reportRecorded }];
    case "auto_deleted":
      return [{ text: TEXT.autoDeleted(threshold) }];
  }
}
