import { z } from "zod";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const TrimmedId = z.string().trim().min(1);

const OptionalAttribute = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v.length ? v : undefined));

// Any cell value passes here; the timeline builder turns a value that is not a
// date into a MALFORMED_EVENT exclusion for that case.
const RawDateSchema = z.unknown();

/* ------------------------------------------------------------------ */
/*                               Records                              */
/* ------------------------------------------------------------------ */

const RawArrivalSchema = z.object({
  location_id: TrimmedId,
  date: RawDateSchema,
});

export const RawCaseRecordSchema = z.object({
  case_id: z.union([z.string(), z.number()]).transform((v) => String(v).trim()).pipe(TrimmedId),

  supplier: OptionalAttribute,
  category: OptionalAttribute,
  storage_type: OptionalAttribute,
  status: OptionalAttribute,

  arrivals: z.array(RawArrivalSchema),
});

export const RawCaseRecordsSchema = z.array(RawCaseRecordSchema);

// outer shape only: each element is checked on its own by parseCaseRecordBatch
const RawBatchSchema = z.array(z.unknown());

export type ParsedCaseRecord = z.infer<typeof RawCaseRecordSchema>;

export function parseCaseRecord(input: unknown): ParsedCaseRecord {
  return RawCaseRecordSchema.parse(input);
}

export function parseCaseRecords(input: unknown): ParsedCaseRecord[] {
  return RawCaseRecordsSchema.parse(input);
}

/* ------------------------------------------------------------------ */
/*                          Per-record batches                        */
/* ------------------------------------------------------------------ */

export type RejectedCaseRecord = {
  index: number;
  // the record's own id when readable, otherwise "#<index>"
  case_id: string;
  // "path: message" per issue, joined with "; "
  message: string;
};

export type CaseRecordBatch = {
  records: ParsedCaseRecord[];
  rejected: RejectedCaseRecord[];
};

/**
 * Validate a batch record by record. Only a batch that is not a list throws (ZodError);
 * a record that fails its schema is returned in `rejected` and the rest go on.
 */
export function parseCaseRecordBatch(input: unknown): CaseRecordBatch {
  const items = RawBatchSchema.parse(input);

  const records: ParsedCaseRecord[] = [];
  const rejected: RejectedCaseRecord[] = [];

  items.forEach((item, index) => {
    const r = RawCaseRecordSchema.safeParse(item);
    if (r.success) {
      records.push(r.data);
      return;
    }
    rejected.push({
      index,
      case_id: readableCaseId(item) ?? `#${index}`,
      message: r.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`).join("; "),
    });
  });

  return { records, rejected };
}

function readableCaseId(item: unknown): string | null {
  if (typeof item !== "object" || item === null || !("case_id" in item)) return null;
  const v = item.case_id;
  if (typeof v !== "string" && typeof v !== "number") return null;
  const id = String(v).trim();
  return id.length ? id : null;
}
