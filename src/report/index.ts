import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { ReconciliationResult } from "../domain/reconciliation/types.js";
import { runStamp } from "../shared/ids.js";
import type { RateDisplay } from "./columns.js";
import { renderConsoleReport } from "./console.js";
import { writeCsvReport } from "./csv.js";
import { writeExcelReport } from "./excel.js";

export interface ReportOptions {
  outputDir: string;
  prefix: string;
  exportExcel: boolean;
  exportCsv: boolean;
  printConsole: boolean;
  rateDisplay: RateDisplay;
  generatedAt?: Date;
  print?: (line: string) => void;
}

export interface ReportOutputs {
  excelPath: string | null;
  csvPath: string | null;
}

export function reportFileNames(prefix: string, generatedAt: Date): { excel: string; csv: string } {
  const base = `${prefix}_${runStamp(generatedAt)}`;
  return { excel: `${base}.xlsx`, csv: `${base}.csv` };
}

export async function generateReport(result: ReconciliationResult, options: ReportOptions): Promise<ReportOutputs> {
  const generatedAt = options.generatedAt ?? new Date();
  const names = reportFileNames(options.prefix, generatedAt);
  const outputs: ReportOutputs = { excelPath: null, csvPath: null };

  if (options.exportExcel || options.exportCsv) {
    await mkdir(options.outputDir, { recursive: true });
  }

  if (options.exportExcel) {
    outputs.excelPath = path.join(options.outputDir, names.excel);
    await writeExcelReport(outputs.excelPath, result, { rateDisplay: options.rateDisplay, generatedAt });
  }

  if (options.exportCsv) {
    outputs.csvPath = path.join(options.outputDir, names.csv);
    await writeCsvReport(outputs.csvPath, result.rows, options.rateDisplay);
  }

  if (options.printConsole) {
    const print = options.print ?? ((line: string) => console.log(line));
    for (const line of renderConsoleReport(result, { rateDisplay: options.rateDisplay, generatedAt })) {
      print(line);
    }
  }

  return outputs;
}
