export type * from "./schema.js";

export {
  RawCaseRecordSchema,
  RawCaseRecordsSchema,
  parseCaseRecord,
  parseCaseRecordBatch,
  parseCaseRecords,
} from "./validate.js";
export type { CaseRecordBatch, ParsedCaseRecord, RejectedCaseRecord } from "./validate.js";

export { canonicalizeCaseRecord, canonicalizeCaseRecords } from "./canonicalize.js";
