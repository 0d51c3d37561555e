export type CaseErrorCode = "MALFORMED_EVENT" | "EMPTY_TIMELINE";

/**
 * Per-case input problem. The case is excluded from every aggregate and the run
 * continues.
 */
export class MalformedEventError extends Error {
  readonly code: CaseErrorCode = "MALFORMED_EVENT";

  constructor(
    readonly case_id: string,
    readonly detail: string
  ) {
    super(`MALFORMED_EVENT: case '${case_id}': ${detail}`);
    this.name = "MalformedEventError";
  }
}

/** A case with no dated arrival at all. Excluded, non-fatal. */
export class EmptyTimelineWarning extends Error {
  readonly code: CaseErrorCode = "EMPTY_TIMELINE";

  constructor(readonly case_id: string) {
    super(`EMPTY_TIMELINE: case '${case_id}' has no dated location events`);
    this.name = "EmptyTimelineWarning";
  }
}

