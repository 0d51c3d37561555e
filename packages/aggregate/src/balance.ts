import type { MonthKey } from "../../intake/src/schema.js";
import { endOfMonth, previousMonth } from "../../timeline/src/dates.js";
import { currentLocation } from "../../timeline/src/position.js";
import type { CaseTimeline } from "../../timeline/src/types.js";
import type { WarehouseMonthlyRow } from "./monthly.js";

export type BalanceMismatchKind = "RECURRENCE" | "SNAPSHOT";

export type BalanceMismatch = {
  warehouse_id: string;
  month: MonthKey;
  kind: BalanceMismatchKind;
  expected: number;
  actual: number;
};

export type BalanceCheck = {
  ok: boolean;
  rows_checked: number;
  mismatches: BalanceMismatch[];
};

/**
 * Cases whose last event on or before the end of `month` is at `warehouse_id`.
 */
export function snapshotEndingStock(
  timelines: readonly CaseTimeline[],
  warehouse_id: string,
  month: MonthKey
): number {
  const eom = endOfMonth(month);
  let n = 0;
  for (const t of timelines) {
    if (currentLocation(t, eom)?.location_id === warehouse_id) n++;
  }
  return n;
}

/**
 * Cross-check the running balance of each row against the snapshot definition.
 *
 * RECURRENCE: ending_stock != opening + inbound - outbound, where opening is the
 * ending_stock of the same warehouse's previous row. For a warehouse's first row it
 * is the snapshot at the end of the previous month.
 * SNAPSHOT: ending_stock != cases resident at the end of the month.
 */
export function verifyStockBalance(
  rows: readonly WarehouseMonthlyRow[],
  timelines: readonly CaseTimeline[]
): BalanceCheck {
  const mismatches: BalanceMismatch[] = [];
  const previous = new Map<string, number>();

  // stable: rows of one month keep their given order
  const ordered = [...rows].sort((a, b) => (a.month === b.month ? 0 : a.month < b.month ? -1 : 1));

  for (const r of ordered) {
    const opening =
      previous.get(r.warehouse_id) ?? snapshotEndingStock(timelines, r.warehouse_id, previousMonth(r.month));
    previous.set(r.warehouse_id, r.ending_stock);
    const expected = opening + r.inbound - r.outbound;
    if (r.ending_stock !== expected) {
      mismatches.push({
        warehouse_id: r.warehouse_id,
        month: r.month,
        kind: "RECURRENCE",
        expected,
        actual: r.ending_stock,
      });
    }

    const snap = snapshotEndingStock(timelines, r.warehouse_id, r.month);
    if (r.ending_stock !== snap) {
      mismatches.push({
        warehouse_id: r.warehouse_id,
        month: r.month,
        kind: "SNAPSHOT",
        expected: snap,
        actual: r.ending_stock,
      });
    }
  }

  return { ok: mismatches.length === 0, rows_checked: rows.length, mismatches };
}
