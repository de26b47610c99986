import { writeFile } from "node:fs/promises";

import type { ReportRecord } from "../domain/reconciliation/types.js";
import { buildCsv } from "../shared/csv.js";
import { REPORT_COLUMNS, rowValues, toReportRows, type RateDisplay } from "./columns.js";

export function buildReportCsv(rows: readonly ReportRecord[], display: RateDisplay): string {
  return buildCsv(REPORT_COLUMNS, toReportRows(rows, display).map(rowValues));
}

export async function writeCsvReport(filePath: string, rows: readonly ReportRecord[], display: RateDisplay): Promise<void> {
  await writeFile(filePath, buildReportCsv(rows, display), "utf8");
}
