import type { CalendarDate } from "../../intake/src/schema.js";
import type { LocationKind } from "../../locations/src/catalog.js";

export type LocationEvent = {
  readonly location_id: string;
  readonly kind: LocationKind;
  readonly date: CalendarDate;
  readonly rank: number; // declared column order of the location
};

export type CaseAttributes = {
  readonly supplier?: string;
  readonly category?: string;
  readonly storage_type?: string;
  readonly status?: string;
};

/** One tracked case with its arrivals in chronological order. Frozen once built. */
export type CaseTimeline = CaseAttributes & {
  readonly case_id: string;
  readonly events: readonly LocationEvent[];
};

export type CaseStage = "NOT_RECEIVED" | "IN_STORAGE" | "DELIVERED";

export type ExclusionReason = "EMPTY_TIMELINE" | "MALFORMED_EVENT" | "DUPLICATE_CASE";

export type Exclusion = {
  case_id: string;
  reason: ExclusionReason;
  level: "WARN" | "ERROR";
  message: string;
};

export type TimelineBuildResult = {
  timelines: CaseTimeline[];
  exclusions: Exclusion[];
};
