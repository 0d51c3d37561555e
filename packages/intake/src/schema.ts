// Primitive value types shared by the ingestion boundary and the ledger.
// Types only. No functions.

export type CalendarDate = string; // YYYY-MM-DD
export type MonthKey = string; // YYYY-MM

// a location column's cell as read; only date strings and Date values are dates,
// anything else makes the case malformed
export type RawDateValue = unknown;
