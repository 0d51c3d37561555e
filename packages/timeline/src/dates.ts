import type { CalendarDate, MonthKey, RawDateValue } from "../../intake/src/schema.js";

const DAY_MS = 86_400_000;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;
// timestamp with an explicit zone, e.g. 2025-01-10T23:30:00-05:00
const ZONED_TIMESTAMP = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

/**
 * Normalize a raw date value to a calendar day (YYYY-MM-DD, UTC).
 * Returns null when the value is not a real date.
 *
 * Zoned timestamps and Date values resolve to their UTC day. A date string
 * without a zone keeps its written day.
 */
export function toCalendarDate(v: RawDateValue): CalendarDate | null {
  if (v instanceof Date) {
    if (Number.isNaN(v.getTime())) return null;
    return formatUtc(v);
  }
  if (typeof v !== "string") return null;

  const s = v.trim();
  const m = DATE_PREFIX.exec(s);
  if (!m) return null;

  const [, y, mo, d] = m;
  const t = Date.UTC(Number(y), Number(mo) - 1, Number(d));
  const back = new Date(t);
  // rejects 2025-02-30 and friends
  if (back.getUTCMonth() !== Number(mo) - 1 || back.getUTCDate() !== Number(d)) return null;

  if (ZONED_TIMESTAMP.test(s)) {
    const zoned = new Date(s.replace(" ", "T"));
    return Number.isNaN(zoned.getTime()) ? null : formatUtc(zoned);
  }

  return formatUtc(back);
}

export function isCalendarDate(v: string): boolean {
  return toCalendarDate(v) === v;
}

export function monthOf(d: CalendarDate): MonthKey {
  return d.slice(0, 7);
}

export function isMonthKey(v: string): boolean {
  return /^\d{4}-(0[1-9]|1[0-2])$/.test(v);
}

export function nextMonth(m: MonthKey): MonthKey {
  const y = Number(m.slice(0, 4));
  const mo = Number(m.slice(5, 7));
  return mo === 12 ? `${y + 1}-01` : `${y}-${pad2(mo + 1)}`;
}

export function previousMonth(m: MonthKey): MonthKey {
  const y = Number(m.slice(0, 4));
  const mo = Number(m.slice(5, 7));
  return mo === 1 ? `${y - 1}-12` : `${y}-${pad2(mo - 1)}`;
}

/** Every month from `from` to `through`, both inclusive. */
export function monthRange(from: MonthKey, through: MonthKey): MonthKey[] {
  const out: MonthKey[] = [];
  for (let m = from; m <= through; m = nextMonth(m)) out.push(m);
  return out;
}

export function endOfMonth(m: MonthKey): CalendarDate {
  const y = Number(m.slice(0, 4));
  const mo = Number(m.slice(5, 7));
  // day 0 of the following month
  return formatUtc(new Date(Date.UTC(y, mo, 0)));
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / DAY_MS);
}

function formatUtc(d: Date): CalendarDate {
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
