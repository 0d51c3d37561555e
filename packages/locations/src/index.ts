export { createLocationCatalog } from "./catalog.js";
export type {
  LocationCatalog,
  LocationColumn,
  LocationKind,
  LocationReference,
  SiteRef,
  WarehouseClassification,
  WarehouseRef,
} from "./catalog.js";

export { InvalidReferenceDataError, UnknownLocationError } from "./errors.js";
export type { LocationErrorCode } from "./errors.js";
