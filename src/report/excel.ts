import ExcelJS from "exceljs";

import type { ReconciliationResult } from "../domain/reconciliation/types.js";
import { REPORT_COLUMNS, toReportRows, type RateDisplay } from "./columns.js";
import { summaryMetrics } from "./summary.js";

export const SHEET_NAMES = {
  updates: "Updates Required",
  summary: "Summary",
  diagnostics: "Diagnostics"
} as const;

export function buildWorkbook(
  result: ReconciliationResult,
  options: { rateDisplay: RateDisplay; generatedAt: Date }
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = options.generatedAt;

  const updates = workbook.addWorksheet(SHEET_NAMES.updates);
  if (result.rows.length > 0) {
    updates.columns = REPORT_COLUMNS.map((column) => ({ header: column, key: column, width: Math.max(14, column.length + 2) }));
    updates.addRows(toReportRows(result.rows, options.rateDisplay));
  } else {
    updates.columns = [{ header: "Message", key: "message", width: 30 }];
    updates.addRow({ message: "No updates required" });
  }

  const summary = workbook.addWorksheet(SHEET_NAMES.summary);
  summary.columns = [
    { header: "Metric", key: "metric", width: 32 },
    { header: "Value", key: "value", width: 40 }
  ];
  summary.addRows(summaryMetrics(result, options.generatedAt));

  const diagnostics = workbook.addWorksheet(SHEET_NAMES.diagnostics);
  diagnostics.columns = [
    { header: "code", key: "code", width: 20 },
    { header: "severity", key: "severity", width: 10 },
    { header: "source", key: "source", width: 10 },
    { header: "file", key: "file", width: 30 },
    { header: "row", key: "row", width: 8 },
    { header: "key", key: "key", width: 28 },
    { header: "dropped", key: "dropped", width: 8 },
    { header: "message", key: "message", width: 80 }
  ];
  diagnostics.addRows(
    result.diagnostics.map((diagnostic) => ({
      code: diagnostic.code,
      severity: diagnostic.severity,
      source: diagnostic.source,
      file: diagnostic.origin?.source ?? "",
      row: diagnostic.origin?.row ?? "",
      key: diagnostic.key ?? "",
      dropped: diagnostic.dropped ? "yes" : "no",
      message: diagnostic.message
    }))
  );

  return workbook;
}

export async function writeExcelReport(
  filePath: string,
  result: ReconciliationResult,
  options: { rateDisplay: RateDisplay; generatedAt: Date }
): Promise<void> {
  await buildWorkbook(result, options).xlsx.writeFile(filePath);
}
