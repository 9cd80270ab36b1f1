import type { EditableField } from "./types.js";

// Hebrew or Latin letters, whitespace and hyphens only.
const TEXT_RE = /^[א-תA-Za-z\s-]+$/;
const PHONE_RE = /^\d{7,15}$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MIN_CAPACITY = 1;
export const MAX_CAPACITY = 100;

export function isValidText(text: string): boolean {
  return TEXT_RE.test(text);
}

export function isValidPhone(phone: string): boolean {
  return PHONE_RE.test(phone);
}

export function isValidCapacity(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_CAPACITY && n <= MAX_CAPACITY;
}

export function parseCapacity(input: string): number | null {
  const s = input.trim();
  if (!/^\d+$/.test(s)) return null;
  const n = Number(s);
  return isValidCapacity(n) ? n : null;
}

/**
 * Server-local calendar date as YYYY-MM-DD.
 */
export function formatLocalDate(d: Date): string {
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}-${String(d.getDate()).padStart(2, "0")}`;
}

/**
 * True when `input` is a real YYYY-MM-DD calendar date on or after the local date of `today`.
 * No timezone handling: "today" is whatever the server clock says.
 */
export function isValidDate(input: string, today: Date = new Date()): boolean {
  const m = DATE_RE.exec(input);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const date = new Date(year, month - 1, day);
  // Rejects rollovers such as 2099-02-30 and two-digit years.
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return false;
  const startOfToday = new Date(today.getFullYear(), today.getMonth(), today.getDate());
  return date.getTime() >= startOfToday.getTime();
}

// Field name -> store column. Anything not listed here is never written.
export const EDITABLE_FIELDS: Readonly<Record<EditableField, string>> = {
  name: "name",
  phone: "phone",
  area: "area",
  city: "city",
  capacity: "capacity",
  date: "date_available"
};

export function isEditableField(x: string): x is EditableField {
  return Object.prototype.hasOwnProperty.call(EDITABLE_FIELDS, x);
}
