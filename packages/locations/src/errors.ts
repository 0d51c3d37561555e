export type LocationErrorCode = "UNKNOWN_LOCATION" | "INVALID_REFERENCE_DATA";

/**
 * A location id that is not part of the configured reference data.
 * Fatal for a run: rollups keyed by classification would silently misclassify.
 */
export class UnknownLocationError extends Error {
  readonly code: LocationErrorCode = "UNKNOWN_LOCATION";

  constructor(
    readonly location_id: string,
    readonly expected: "WAREHOUSE" | "SITE" | "ANY" = "ANY"
  ) {
    super(
      expected === "ANY"
        ? `UNKNOWN_LOCATION: '${location_id}' is not a configured warehouse or site`
        : `UNKNOWN_LOCATION: '${location_id}' is not a configured ${expected.toLowerCase()}`
    );
    this.name = "UnknownLocationError";
  }
}

export class InvalidReferenceDataError extends Error {
  readonly code: LocationErrorCode = "INVALID_REFERENCE_DATA";

  constructor(message: string) {
    super(`INVALID_REFERENCE_DATA: ${message}`);
    this.name = "InvalidReferenceDataError";
  }
}
