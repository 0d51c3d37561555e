import { readFileSync } from "node:fs";
import { z } from "zod";
import type { LocationReference } from "../../locations/src/catalog.js";
import { isMonthKey } from "../../timeline/src/dates.js";

export class LedgerConfigError extends Error {
  readonly code = "INVALID_CONFIG";

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(`INVALID_CONFIG: ${message}`);
    this.name = "LedgerConfigError";
  }
}

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const Id = z.string().trim().min(1);

const Month = z.string().refine(isMonthKey, "Expected a YYYY-MM month");

const Days = z.number().int().positive();

/* ------------------------------------------------------------------ */
/*                              Locations                             */
/* ------------------------------------------------------------------ */

const WarehouseSchema = z.object({
  id: Id,
  classification: z.enum(["INDOOR", "OUTDOOR", "DANGEROUS"]),
});

const SiteSchema = z.object({
  id: Id,
  // defaults to the site id
  group: Id.optional(),
});

/* ------------------------------------------------------------------ */
/*                                Config                              */
/* ------------------------------------------------------------------ */

export const LedgerConfigSchema = z.object({
  locations: z.object({
    // declaration order is the column order
    warehouses: z.array(WarehouseSchema).min(1),
    sites: z.array(SiteSchema),
  }),

  dead_stock: z
    .object({
      thresholds_days: z.array(Days).min(1),
      urgent_days: Days,
    })
    .default({ thresholds_days: [90, 180, 365], urgent_days: 365 }),

  lead_time: z
    .object({
      threshold_days: Days,
    })
    .default({ threshold_days: 90 }),

  from_month: Month.optional(),
  through_month: Month.optional(),
});

export type LedgerConfig = z.output<typeof LedgerConfigSchema>;
export type LedgerConfigInput = z.input<typeof LedgerConfigSchema>;

export function parseLedgerConfig(input: unknown): LedgerConfig {
  const r = LedgerConfigSchema.safeParse(input);
  if (!r.success) {
    const issues = r.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`);
    throw new LedgerConfigError("configuration does not match the schema", issues);
  }

  const c = r.data;
  if (c.from_month && c.through_month && c.from_month > c.through_month) {
    throw new LedgerConfigError(`from_month ${c.from_month} is after through_month ${c.through_month}`);
  }
  return c;
}

export function loadLedgerConfig(filePath: string): LedgerConfig {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (e) {
    throw new LedgerConfigError(`cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new LedgerConfigError(`"${filePath}" is not valid JSON (first 120 chars: ${raw.slice(0, 120)})`);
  }

  return parseLedgerConfig(json);
}

export function locationReference(c: LedgerConfig): LocationReference {
  return {
    warehouses: c.locations.warehouses.map((w) => ({ id: w.id, classification: w.classification })),
    sites: c.locations.sites.map((s) => ({ id: s.id, group: s.group ?? s.id })),
  };
}
