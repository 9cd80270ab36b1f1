import { isAreaCode, isEditableField, type AreaCode, type EditableField } from "@safehost/shared";

// Callback payloads, decoded once at the transport boundary.
export type Action =
  | { type: "main_menu" }
  | { type: "post_ad" }
  | { type: "all_ads" }
  | { type: "my_ads" }
  | { type: "search_by_area" }
  | { type: "area"; area: AreaCode }
  | { type: "area_filter"; area: AreaCode }
  | { type: "field"; field: EditableField }
  | { type: "value"; value: string }
  | { type: "edit"; adId: number }
  | { type: "delete"; adId: number }
  | { type: "report"; adId: number };

function parseId(arg: string): number | null {
  if (!/^\d+$/.test(arg)) return null;
  const n = Number(arg);
  return Number.isSafeInteger(n) ? n : null;
}

export function decodeAction(data: string): Action | null {
  switch (data) {
    case "main_menu":
    case "post_ad":
    case "all_ads":
    case "my_ads":
    case "search_by_area":
      return { type: data };
  }

  const idx = data.indexOf(":");
  if (idx < 0) return null;
  const prefix = data.slice(0, idx);
  const arg = data.slice(idx + 1);

  switch (prefix) {
    case "area":
    case "area_filter":
      return isAreaCode(arg) ? { type: prefix, area: arg } : null;
    case "field":
      return isEditableField(arg) ? { type: "field", field: arg } : null;
    case "value":
      return arg ? { type: "value", value: arg } : null;
    case "edit":
    case "delete":
    case "report": {
      const adId = parseId(arg);
      return adId === null ? null : { type: prefix, adId };
    }
    default:
      return null;
  }
}

export function encodeAction(action: Action): string {
  switch (action.type) {
    case "main_menu":
    case "post_ad":
    case "all_ads":
    case "my_ads":
    case "search_by_area":
      return action.type;
    case "area":
    case "area_filter":
      return `${action.type}:${action.area}`;
    case "field":
      return `field:${action.field}`;
    case "value":
      return `value:${action.value}`;
    case "edit":
    case "delete":
    case "report":
      return `${action.type}:${action.adId}`;
  }
}
