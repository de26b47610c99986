import type { ReconciliationResult } from "../domain/reconciliation/types.js";
import { REPORT_COLUMNS, rowValues, toReportRows, type RateDisplay } from "./columns.js";
import { topStates } from "./summary.js";

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);

function renderTable(header: readonly string[], rows: string[][]): string[] {
  const widths = header.map((title, index) => Math.max(title.length, ...rows.map((row) => (row[index] ?? "").length)));
  const format = (cells: readonly string[]) =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? cell.length))
      .join("  ")
      .trimEnd();

  return [format(header), ...rows.map(format)];
}

export function renderConsoleReport(
  result: ReconciliationResult,
  options: { rateDisplay: RateDisplay; generatedAt: Date }
): string[] {
  const { summary } = result;
  const lines = [
    RULE,
    "TAX JURISDICTION UPDATE REPORT",
    RULE,
    `Generated at: ${options.generatedAt.toISOString()}`,
    `Rulesets: ${result.rulesets.stateCodes}, ${result.rulesets.businessRules}`,
    "",
    `Input records: APEX ${summary.totalApex}, COMMAND ${summary.totalCommand}, EDITS ${summary.totalEdits}`,
    `After outer join: ${summary.afterOuterJoin}`,
    `After inner join: ${summary.afterInnerJoin}`,
    `Records requiring update: ${summary.afterFilter}`,
    `Dropped input records: ${summary.dropped.total}`
  ];

  for (const [code, count] of Object.entries(summary.dropped.byCode)) {
    lines.push(`  - ${code}: ${count ?? 0}`);
  }

  if (summary.afterFilter > 0) {
    lines.push("", "By platform:");
    for (const [platform, count] of Object.entries(summary.byPlatform)) {
      lines.push(`  - ${platform}: ${count}`);
    }

    lines.push("", "By action:");
    for (const [action, count] of Object.entries(summary.byAction)) {
      lines.push(`  - ${action}: ${count ?? 0}`);
    }

    lines.push("", "By state (top 10):");
    for (const [state, count] of topStates(summary.byState)) {
      lines.push(`  - ${state}: ${count}`);
    }

    lines.push("", THIN_RULE, "UPDATE DETAIL", THIN_RULE);
    lines.push(...renderTable(REPORT_COLUMNS, toReportRows(result.rows, options.rateDisplay).map(rowValues)));
  } else {
    lines.push("", "No updates required.");
  }

  lines.push(RULE);
  return lines;
}
