import type { MonthKey } from "../../intake/src/schema.js";
import { monthRange } from "../../timeline/src/dates.js";
import type { Posting } from "./postings.js";

export type AggregateOptions = {
  // first month to emit; earlier postings still feed the opening balance
  from_month?: MonthKey;
  // last month to emit; later postings are ignored
  through_month?: MonthKey;
};

export type MonthWindow = {
  // months walked by running balances, starting at the first month with data
  walk: MonthKey[];
  emit: Set<MonthKey>;
  postings: Posting[];
};

/**
 * Dense month window of a posting set. Empty when nothing falls on or before
 * `through_month`.
 */
export function monthWindow(all: readonly Posting[], opts: AggregateOptions = {}): MonthWindow {
  const through = opts.through_month;
  const postings = through ? all.filter((p) => p.month <= through) : [...all];

  if (postings.length === 0) return { walk: [], emit: new Set(), postings };

  let first = postings[0].month;
  let last = postings[0].month;
  for (const p of postings) {
    if (p.month < first) first = p.month;
    if (p.month > last) last = p.month;
  }

  // with no through_month, stock still carries forward to a from_month past the data
  const end = opts.through_month ?? (opts.from_month != null && opts.from_month > last ? opts.from_month : last);
  const start = opts.from_month != null && opts.from_month < first ? opts.from_month : first;
  const walk = monthRange(start, end);
  const emit = new Set(walk.filter((m) => opts.from_month == null || m >= opts.from_month));

  return { walk, emit, postings };
}

export function countKey(location_id: string, month: MonthKey): string {
  return `${location_id}\u0000${month}`;
}
