import { readFileSync } from "node:fs";
import { loadLedgerConfig, runLedgerAnalysis } from "../packages/ledger/src/index.js";

// usage: tsx examples/run-ledger-report.ts [YYYY-MM-DD]
const reference_date = process.argv[2] ?? new Date().toISOString().slice(0, 10);

const config = loadLedgerConfig("examples/config/ledger.config.json");
const raw: unknown = JSON.parse(readFileSync("examples/data/cases.json", "utf-8"));

const a = runLedgerAnalysis(raw, config, { reference_date });

for (const e of a.exclusions) console.warn(`- ${e.level} ${e.reason} ${e.case_id}: ${e.message}`);

if (!a.balance_check.ok) {
  console.error("Stock balance mismatches:");
  for (const m of a.balance_check.mismatches) {
    console.error(`- ${m.kind} ${m.warehouse_id} ${m.month}: expected ${m.expected}, got ${m.actual}`);
  }
  process.exitCode = 1;
}

console.log(
  JSON.stringify(
    {
      reference_date: a.reference_date,
      population: a.population,
      warehouse_monthly: a.warehouse_monthly,
      site_monthly: a.site_monthly,
      classification_monthly: a.classification_monthly,
      warehouse_summary: a.warehouse_summary,
      supplier_summary: a.supplier_summary,
      notes: a.notes,
    },
    null,
    2
  )
);
