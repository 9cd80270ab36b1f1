import type { AreaCode } from "./types.js";

export const AREAS: ReadonlyArray<{ code: AreaCode; label: string; icon: string }> = [
  { code: "north", label: "צפון", icon: "🌍" },
  { code: "center", label: "מרכז", icon: "🏙️" },
  { code: "south", label: "דרום", icon: "🏜️" },
  { code: "other", label: "אחר", icon: "❓" }
];

export function isAreaCode(x: string): x is AreaCode {
  return AREAS.some((a) => a.code === x);
}

// Accepts either the code ("north") or the Hebrew label ("צפון").
export function parseArea(input: string): AreaCode | null {
  const s = input.trim();
  const hit = AREAS.find((a) => a.code === s.toLowerCase() || a.label === s);
  return hit ? hit.code : null;
}

export function areaLabel(code: AreaCode): string {
  return AREAS.find((a) => a.code === code)?.label ?? code;
}
