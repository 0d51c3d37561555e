export { buildCaseTimeline, buildTimelines, compareEvents } from "./builder.js";
export { caseStage, currentLocation, firstEventOfKind, visitedLocations } from "./position.js";
export {
  daysBetween,
  endOfMonth,
  isCalendarDate,
  isMonthKey,
  monthOf,
  monthRange,
  nextMonth,
  previousMonth,
  toCalendarDate,
} from "./dates.js";
export { EmptyTimelineWarning, MalformedEventError } from "./errors.js";
export type { CaseErrorCode } from "./errors.js";

export type {
  CaseAttributes,
  CaseStage,
  CaseTimeline,
  Exclusion,
  ExclusionReason,
  LocationEvent,
  TimelineBuildResult,
} from "./types.js";
