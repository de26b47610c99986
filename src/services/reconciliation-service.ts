import { stat } from "node:fs/promises";
import path from "node:path";

import { env } from "../config/env.js";
import { MissingInputError } from "../domain/reconciliation/errors.js";
import { reconcileJurisdictions } from "../domain/reconciliation/pipeline.js";
import type { ReconciliationResult } from "../domain/reconciliation/types.js";
import { loadActiveRulesets } from "../domain/rulesets/loader.js";
import type { RulesetVersions } from "../domain/rulesets/types.js";
import { logger } from "../infrastructure/logger.js";
import type { RateDisplay } from "../report/columns.js";
import { generateReport, type ReportOutputs } from "../report/index.js";
import { createRunId } from "../shared/ids.js";
import { extractApexRecords } from "../sources/apex.js";
import { extractCommandRecords } from "../sources/command.js";
import { extractEditRecords } from "../sources/edits.js";
import { readSheet } from "../sources/sheet-reader.js";

export interface InputPaths {
  apex: string;
  command: string;
  edits: string;
}

export interface InputFileStatus {
  input: keyof InputPaths;
  path: string;
  exists: boolean;
  sizeBytes: number | null;
}

export interface RunOptions {
  inputs?: Partial<InputPaths>;
  outputDir?: string;
  exportExcel?: boolean;
  exportCsv?: boolean;
  printConsole?: boolean;
  rateDisplay?: RateDisplay;
  filenamePrefix?: string;
  rulesetRoot?: string;
  rulesetVersions?: Partial<RulesetVersions>;
  generatedAt?: Date;
  print?: (line: string) => void;
}

export interface RunSummary {
  runId: string;
  result: ReconciliationResult;
  outputs: ReportOutputs;
  durationMs: number;
}

export function resolveInputPaths(overrides: Partial<InputPaths> = {}): InputPaths {
  return {
    apex: overrides.apex ?? path.join(env.DATA_DIR, env.APEX_FILE),
    command: overrides.command ?? path.join(env.DATA_DIR, env.COMMAND_FILE),
    edits: overrides.edits ?? path.join(env.DATA_DIR, env.EDITS_FILE)
  };
}

export async function checkInputFiles(paths: InputPaths): Promise<InputFileStatus[]> {
  const inputs: Array<keyof InputPaths> = ["apex", "command", "edits"];

  return Promise.all(
    inputs.map(async (input) => {
      try {
        const info = await stat(paths[input]);
        return { input, path: paths[input], exists: info.isFile(), sizeBytes: info.isFile() ? info.size : null };
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          return { input, path: paths[input], exists: false, sizeBytes: null };
        }

        throw error;
      }
    })
  );
}

export async function runReconciliation(options: RunOptions = {}): Promise<RunSummary> {
  const runId = createRunId();
  const startedAt = Date.now();
  const log = logger.child({ runId });
  const paths = resolveInputPaths(options.inputs);

  const missing = (await checkInputFiles(paths)).filter((status) => !status.exists);
  const [firstMissing] = missing;
  if (firstMissing) {
    throw new MissingInputError(
      firstMissing.input.toUpperCase(),
      `file not found: ${missing.map((status) => status.path).join(", ")}`
    );
  }

  const rules = loadActiveRulesets(options.rulesetVersions, options.rulesetRoot);
  log.info(
    { stage: "rulesets", stateCodes: rules.stateCodes.id, businessRules: rules.businessRules.id },
    "rulesets loaded"
  );

  const [apexRows, commandRows, editRows] = await Promise.all([
    readSheet(paths.apex),
    readSheet(paths.command),
    readSheet(paths.edits)
  ]);

  const apex = extractApexRecords(apexRows, path.basename(paths.apex));
  const command = extractCommandRecords(commandRows, path.basename(paths.command));
  const edits = extractEditRecords(editRows, { stateCodes: rules.stateCodes, source: path.basename(paths.edits) });
  log.info(
    {
      stage: "extract",
      apex: apex.records.length,
      command: command.records.length,
      edits: edits.records.length,
      diagnostics: apex.diagnostics.length + command.diagnostics.length + edits.diagnostics.length
    },
    "extraction completed"
  );

  const result = reconcileJurisdictions(
    {
      apex: apex.records,
      command: command.records,
      edits: edits.records,
      diagnostics: [...apex.diagnostics, ...command.diagnostics, ...edits.diagnostics]
    },
    rules
  );
  log.info(
    {
      stage: "reconcile",
      afterOuterJoin: result.summary.afterOuterJoin,
      afterInnerJoin: result.summary.afterInnerJoin,
      count: result.summary.afterFilter,
      dropped: result.summary.dropped.total
    },
    "reconciliation completed"
  );

  for (const diagnostic of result.diagnostics) {
    if (diagnostic.severity !== "info") {
      log.warn({ code: diagnostic.code, source: diagnostic.source, key: diagnostic.key }, diagnostic.message);
    }
  }

  const outputs = await generateReport(result, {
    outputDir: options.outputDir ?? env.OUTPUT_DIR,
    prefix: options.filenamePrefix ?? env.REPORT_FILENAME_PREFIX,
    exportExcel: options.exportExcel ?? env.REPORT_EXPORT_EXCEL,
    exportCsv: options.exportCsv ?? env.REPORT_EXPORT_CSV,
    printConsole: options.printConsole ?? env.REPORT_PRINT_CONSOLE,
    rateDisplay: options.rateDisplay ?? env.REPORT_RATE_DISPLAY,
    generatedAt: options.generatedAt,
    print: options.print
  });

  const durationMs = Date.now() - startedAt;
  log.info({ stage: "report", ...outputs, durationMs }, "report generated");

  return { runId, result, outputs, durationMs };
}
