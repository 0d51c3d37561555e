import type { CalendarDate, MonthKey } from "../../intake/src/schema.js";
import { monthOf } from "../../timeline/src/dates.js";
import type { CaseTimeline } from "../../timeline/src/types.js";

export type PostingType = "IN" | "OUT" | "SITE_IN" | "SITE_OUT";

export type Posting = {
  case_id: string;
  type: PostingType;
  location_id: string;
  month: MonthKey;
  date: CalendarDate;
};

/**
 * Ledger postings of one case, derived from adjacency in its timeline.
 *
 * An arrival posts IN (warehouse) or SITE_IN (site) in its own month. The previous
 * location posts OUT / SITE_OUT in the month of that later arrival, never in the
 * month the case first got there.
 */
export function casePostings(t: CaseTimeline): Posting[] {
  const out: Posting[] = [];

  t.events.forEach((e, i) => {
    const month = monthOf(e.date);

    const prev = i > 0 ? t.events[i - 1] : undefined;
    if (prev) {
      out.push({
        case_id: t.case_id,
        type: prev.kind === "WAREHOUSE" ? "OUT" : "SITE_OUT",
        location_id: prev.location_id,
        month,
        date: e.date,
      });
    }

    out.push({
      case_id: t.case_id,
      type: e.kind === "WAREHOUSE" ? "IN" : "SITE_IN",
      location_id: e.location_id,
      month,
      date: e.date,
    });
  });

  return out;
}

export function collectPostings(timelines: readonly CaseTimeline[]): Posting[] {
  return timelines.flatMap(casePostings);
}
