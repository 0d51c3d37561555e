import { readFileSync } from "node:fs";
import { loadLedgerConfig, runLedgerAnalysis } from "../packages/ledger/src/index.js";

// usage: tsx examples/run-dead-stock.ts [YYYY-MM-DD]
const reference_date = process.argv[2] ?? new Date().toISOString().slice(0, 10);

const config = loadLedgerConfig("examples/config/ledger.config.json");
const raw: unknown = JSON.parse(readFileSync("examples/data/cases.json", "utf-8"));

const a = runLedgerAnalysis(raw, config, { reference_date });

if (a.urgent_cases.length) {
  console.warn(`Urgent (>= ${config.dead_stock.urgent_days} days):`);
  for (const r of a.urgent_cases) console.warn(`- ${r.case_id} @ ${r.warehouse_id}: ${r.age_days} days`);
}

console.log(
  JSON.stringify(
    {
      reference_date: a.reference_date,
      thresholds_days: a.dead_stock.thresholds_days,
      flagged: a.dead_stock_flagged,
      by_warehouse: a.dead_stock_by_warehouse,
      by_bucket: a.dead_stock_by_bucket,
      lead_times: {
        by_initial_warehouse: a.lead_times.by_initial_warehouse,
        long_lead_times: a.lead_times.long_lead_times,
      },
      notes: a.notes,
    },
    null,
    2
  )
);
