import type { Decimal } from "decimal.js";

import type { ReportRecord } from "../domain/reconciliation/types.js";
import { formatDecimal, formatPercent } from "../shared/decimal.js";

// Column order is relied on by downstream consumers of the report files.
export const REPORT_COLUMNS = [
  "city_state_key",
  "city",
  "state",
  "tax_code_apex",
  "tax_code_command",
  "old_rate",
  "new_rate",
  "rate_change",
  "action_required",
  "effective_date",
  "update_platform"
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

export type ReportRow = Record<ReportColumn, string>;

export type RateDisplay = "percent" | "decimal";

export function formatRate(value: Decimal, display: RateDisplay): string {
  return display === "percent" ? formatPercent(value) : formatDecimal(value);
}

export function toReportRow(record: ReportRecord, display: RateDisplay): ReportRow {
  return {
    city_state_key: record.key,
    city: record.city,
    state: record.state,
    tax_code_apex: record.taxCodeApex ?? "",
    tax_code_command: record.taxCodeCommand ?? "",
    old_rate: formatRate(record.oldRate, display),
    new_rate: formatRate(record.newRate, display),
    rate_change: formatRate(record.rateChange, display),
    action_required: record.actionRequired,
    effective_date: record.effectiveDate ?? "",
    update_platform: record.updatePlatform
  };
}

export function toReportRows(records: readonly ReportRecord[], display: RateDisplay): ReportRow[] {
  return records.map((record) => toReportRow(record, display));
}

export function rowValues(row: ReportRow): string[] {
  return REPORT_COLUMNS.map((column) => row[column]);
}
