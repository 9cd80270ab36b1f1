import {
  formatLocalDate,
  isValidDate,
  isValidPhone,
  isValidText,
  parseArea,
  parseCapacity,
  type AdFields,
  type EditableField
} from "@safehost/shared";
import type { Action } from "../actions.js";
import { areaChoiceReply, backToMenuReply, editFieldReply, type Reply } from "../replies.js";
import type { AdDraft, Session } from "../state.js";
import { TEXT } from "../texts.js";

export type ConversationInput = { kind: "text"; text: string } | { kind: "action"; action: Action };

export type Effect =
  | { type: "publish"; fields: AdFields }
  | { type: "verify_owner"; adId: number }
  | { type: "update"; adId: number; field: EditableField; value: string | number };

export type Transition = {
  handled: boolean;
  session: Session | undefined;
  replies: Reply[];
  effect?: Effect;
};

const NOT_HANDLED: Transition = { handled: false, session: undefined, replies: [] };

function stay(session: Session, reply: Reply): Transition {
  return { handled: true, session, replies: [reply] };
}

function completeDraft(draft: AdDraft, date: string): AdFields | null {
  const { name, phone, area, city, capacity } = draft;
  if (name === undefined || phone === undefined || area === undefined || city === undefined || capacity === undefined) {
    return null;
  }
  return { name, phone, area, city, capacity, date_available: date };
}

function createStep(session: Extract<Session, { draft: AdDraft }>, text: string, today: Date): Transition {
  const value = text.trim();
  const example = formatLocalDate(today);
  switch (session.step) {
    case "NAME":
      if (!isValidText(value)) return stay(session, { text: TEXT.badName });
      return { handled: true, session: { step: "PHONE", draft: { ...session.draft, name: value } }, replies: [{ text: TEXT.askPhone }] };
    case "PHONE":
      if (!isValidPhone(value)) return stay(session, { text: TEXT.badPhone });
      return {
        handled: true,
        session: { step: "AREA", draft: { ...session.draft, phone: value } },
        replies: [areaChoiceReply(TEXT.askArea, "area")]
      };
    case "AREA":
      // Area comes from the choice buttons only.
      return stay(session, areaChoiceReply(TEXT.askArea, "area"));
    case "CITY":
      if (!isValidText(value)) return stay(session, { text: TEXT.badCity });
      return { handled: true, session: { step: "CAPACITY", draft: { ...session.draft, city: value } }, replies: [{ text: TEXT.askCapacity }] };
    case "CAPACITY": {
      const capacity = parseCapacity(value);
      if (capacity === null) return stay(session, { text: TEXT.badCapacity });
      return {
        handled: true,
        session: { step: "DATE", draft: { ...session.draft, capacity } },
        replies: [{ text: TEXT.askDate(example) }]
      };
    }
    case "DATE": {
      if (!isValidDate(value, today)) return stay(session, { text: TEXT.badDate(example) });
      const fields = completeDraft(session.draft, value);
      if (!fields) {
        return { handled: true, session: { step: "NAME", draft: {} }, replies: [{ text: TEXT.askName }] };
      }
      return {
        handled: true,
        session: undefined,
        replies: [backToMenuReply(TEXT.published)],
        effect: { type: "publish", fields }
      };
    }
  }
}

function askEditValue(field: EditableField): Reply {
  return field === "area" ? areaChoiceReply(TEXT.askEditArea, "value") : { text: TEXT.askEditValue };
}

function rejectEditValue(field: EditableField, today: Date): Reply {
  switch (field) {
    case "name":
      return { text: TEXT.badName };
    case "city":
      return { text: TEXT.badCity };
    case "phone":
      return { text: TEXT.badPhone };
    case "capacity":
      return { text: TEXT.badCapacity };
    case "date":
      return { text: TEXT.badDate(formatLocalDate(today)) };
    case "area":
      return areaChoiceReply(TEXT.askEditArea, "value");
  }
}

// Same validators as the creation flow; null means "re-prompt".
export function normalizeEditValue(field: EditableField, raw: string, today: Date): string | number | null {
  const value = raw.trim();
  switch (field) {
    case "name":
    case "city":
      return isValidText(value) ? value : null;
    case "phone":
      return isValidPhone(value) ? value : null;
    case "capacity":
      return parseCapacity(value);
    case "date":
      return isValidDate(value, today) ? value : null;
    case "area":
      return parseArea(value);
  }
}

function editValue(session: Extract<Session, { step: "EDIT_VALUE" }>, raw: string, today: Date): Transition {
  const value = normalizeEditValue(session.field, raw, today);
  if (value === null) return stay(session, rejectEditValue(session.field, today));
  return {
    handled: true,
    session: undefined,
    replies: [backToMenuReply(TEXT.updated)],
    effect: { type: "update", adId: session.adId, field: session.field, value }
  };
}

function onAction(session: Session | undefined, action: Action, today: Date): Transition {
  switch (action.type) {
    case "post_ad":
      // Entering a flow always overwrites whatever was left over.
      return { handled: true, session: { step: "NAME", draft: {} }, replies: [{ text: TEXT.askName }] };
    case "edit":
      return {
        handled: true,
        session: { step: "EDIT_FIELD_SELECT", adId: action.adId },
        replies: [editFieldReply()],
        effect: { type: "verify_owner", adId: action.adId }
      };
    case "area":
      if (session?.step !== "AREA") return NOT_HANDLED;
      return {
        handled: true,
        session: { step: "CITY", draft: { ...session.draft, area: action.area } },
        replies: [{ text: TEXT.askCity }]
      };
    case "field":
      if (session?.step !== "EDIT_FIELD_SELECT" && session?.step !== "EDIT_VALUE") return NOT_HANDLED;
      return {
        handled: true,
        session: { step: "EDIT_VALUE", adId: session.adId, field: action.field },
        replies: [askEditValue(action.field)]
      };
    case "value":
      if (session?.step !== "EDIT_VALUE") return NOT_HANDLED;
      return editValue(session, action.value, today);
    default:
      return NOT_HANDLED;
  }
}

/**
 * Pure step of the ad creation / ad editing dialogue.
 *
 * `handled: false` means the input is not part of the user's current flow and the
 * caller should treat it as a regular command. Effects are executed by the runner,
 * which may override `session` and `replies` depending on the outcome.
 */
export function transition(session: Session | undefined, input: ConversationInput, today: Date): Transition {
  if (input.kind === "action") return onAction(session, input.action, today);
  if (!session) return NOT_HANDLED;
  switch (session.step) {
    case "EDIT_FIELD_SELECT":
      return stay(session, editFieldReply());
    case "EDIT_VALUE":
      return editValue(session, input.text, today);
    default:
      return createStep(session, input.text, today);
  }
}
