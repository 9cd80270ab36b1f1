import { InlineKeyboard, type Context } from "grammy";
import { AREAS, type AreaCode, type EditableField } from "@safehost/shared";
import { encodeAction, type Action } from "./actions.js";
import { BUTTON, INTRO_TEXT, TEXT } from "./texts.js";

// Transport-neutral reply: the flows produce these, the bot renders them.
export type ReplyButton = { label: string; action: Action };
export type Reply = { text: string; buttons?: ReplyButton[][] };

export function toInlineKeyboard(rows: ReplyButton[][]): InlineKeyboard {
  const k = new InlineKeyboard();
  rows.forEach((row, i) => {
    for (const b of row) k.text(b.label, encodeAction(b.action));
    if (i < rows.length - 1) k.row();
  });
  return k;
}

export async function sendReplies(ctx: Context, replies: Reply[]) {
  for (const r of replies) {
    if (r.buttons && r.buttons.length > 0) {
      await ctx.reply(r.text, { reply_markup: toInlineKeyboard(r.buttons) });
    } else {
      await ctx.reply(r.text);
    }
  }
}

export function mainMenuReply(): Reply {
  return {
    text: TEXT.chooseAction,
    buttons: [
      [{ label: BUTTON.postAd, action: { type: "post_ad" } }],
      [{ label: BUTTON.myAds, action: { type: "my_ads" } }],
      [{ label: BUTTON.allAds, action: { type: "all_ads" } }],
      [{ label: BUTTON.searchByArea, action: { type: "search_by_area" } }]
    ]
  };
}

export function startReplies(): Reply[] {
  return [{ text: INTRO_TEXT }, mainMenuReply()];
}

export function backToMenuReply(text: string = TEXT.backToMenuPrompt): Reply {
  return { text, buttons: [[{ label: BUTTON.backToMenu, action: { type: "main_menu" } }]] };
}

type AreaButtonKind = "area" | "area_filter" | "value";

function areaAction(kind: AreaButtonKind, code: AreaCode): Action {
  if (kind === "value") return { type: "value", value: code };
  return { type: kind, area: code };
}

export function areaChoiceReply(text: string, kind: AreaButtonKind): Reply {
  const buttons = AREAS.map((a) => ({ label: `${a.icon} ${a.label}`, action: areaAction(kind, a.code) }));
  return { text, buttons: [buttons.slice(0, 2), buttons.slice(2)] };
}

const FIELD_LABELS: Record<EditableField, string> = {
  name: "👤 שם",
  phone: "📞 טלפון",
  area: "🌍 אזור",
  city: "🏘️ עיר",
  capacity: "👥 מספר אורחים",
  date: "📅 תאריך"
};

export function editFieldReply(): Reply {
  const button = (field: EditableField): ReplyButton => ({ label: FIELD_LABELS[field], action: { type: "field", field } });
  return {
    text: TEXT.askEditField,
    buttons: [
      [button("name"), button("phone")],
      [button("area"), button("city")],
      [button("capacity"), button("date")]
    ]
  };
}
