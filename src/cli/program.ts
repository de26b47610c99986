import { Command, Option } from "commander";

import { env } from "../config/env.js";
import { isReconciliationError } from "../domain/reconciliation/errors.js";
import { loadActiveRulesets } from "../domain/rulesets/loader.js";
import { logger } from "../infrastructure/logger.js";
import type { RateDisplay } from "../report/columns.js";
import { checkInputFiles, resolveInputPaths, runReconciliation } from "../services/reconciliation-service.js";

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  setExitCode: (code: number) => void;
}

interface RunCommandOptions {
  apex?: string;
  command?: string;
  edits?: string;
  output?: string;
  rulesets?: string;
  rateDisplay?: RateDisplay;
  excel: boolean;
  csv: boolean;
  console: boolean;
  json?: boolean;
}

interface CheckCommandOptions {
  apex?: string;
  command?: string;
  edits?: string;
  rulesets?: string;
  json?: boolean;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1
} as const;

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  }
};

function reportFailure(io: CliIo, error: unknown): void {
  if (isReconciliationError(error)) {
    logger.error({ code: error.code, details: error.details }, "run failed");
    io.err(`${error.code}: ${error.message}`);
  } else {
    logger.error({ error }, "run failed");
    io.err(error instanceof Error ? error.message : String(error));
  }

  io.setExitCode(EXIT_CODES.FAILURE);
}

async function executeRun(options: RunCommandOptions, io: CliIo): Promise<void> {
  const summary = await runReconciliation({
    inputs: { apex: options.apex, command: options.command, edits: options.edits },
    outputDir: options.output,
    rulesetRoot: options.rulesets,
    exportExcel: options.excel && env.REPORT_EXPORT_EXCEL,
    exportCsv: options.csv && env.REPORT_EXPORT_CSV,
    printConsole: options.console && env.REPORT_PRINT_CONSOLE && !options.json,
    rateDisplay: options.rateDisplay,
    print: io.out
  });

  if (options.json) {
    io.out(
      JSON.stringify(
        {
          runId: summary.runId,
          durationMs: summary.durationMs,
          outputs: summary.outputs,
          rulesets: summary.result.rulesets,
          summary: summary.result.summary,
          diagnostics: summary.result.diagnostics
        },
        null,
        2
      )
    );
    return;
  }

  for (const output of [summary.outputs.excelPath, summary.outputs.csvPath]) {
    if (output) {
      io.out(`Report written: ${output}`);
    }
  }
}

async function executeCheck(options: CheckCommandOptions, io: CliIo): Promise<void> {
  const files = await checkInputFiles(
    resolveInputPaths({ apex: options.apex, command: options.command, edits: options.edits })
  );
  const loaded = loadActiveRulesets({}, options.rulesets);
  const rulesets = { stateCodes: loaded.stateCodes.id, businessRules: loaded.businessRules.id };
  const allPresent = files.every((file) => file.exists);

  if (options.json) {
    io.out(JSON.stringify({ files, rulesets }, null, 2));
  } else {
    for (const file of files) {
      io.out(`${file.exists ? "ok     " : "missing"} ${file.input.toUpperCase().padEnd(7)} ${file.path}`);
    }
    io.out(`State code table: ${rulesets.stateCodes}`);
    io.out(`Business rules: ${rulesets.businessRules}`);
  }

  if (!allPresent) {
    io.setExitCode(EXIT_CODES.FAILURE);
  }
}

export function buildProgram(io: CliIo = defaultIo): Command {
  const program = new Command();

  program
    .name("jurisdiction-reconciler")
    .description("Reconcile APEX and COMMAND tax jurisdictions against official rate edits")
    .version("0.1.0");

  program
    .command("run")
    .description("Run a reconciliation and write the update report")
    .option("--apex <file>", "APEX tax code report (.xlsx or .csv)")
    .option("--command <file>", "COMMAND tax code report (.xlsx or .csv)")
    .option("--edits <file>", "Official tax rate edits (.xlsx or .csv)")
    .option("--output <dir>", "Directory the report files are written to")
    .option("--rulesets <dir>", "Directory holding meta.json and the ruleset tables")
    .addOption(new Option("--rate-display <mode>", "How rates are rendered").choices(["percent", "decimal"]))
    .option("--no-excel", "Skip the Excel report")
    .option("--no-csv", "Skip the CSV report")
    .option("--no-console", "Skip the console summary")
    .option("--json", "Print the run summary as JSON")
    .action(async (options: RunCommandOptions) => {
      try {
        await executeRun(options, io);
      } catch (error) {
        reportFailure(io, error);
      }
    });

  program
    .command("check")
    .description("Check that the input files exist and show the active rulesets")
    .option("--apex <file>", "APEX tax code report")
    .option("--command <file>", "COMMAND tax code report")
    .option("--edits <file>", "Official tax rate edits")
    .option("--rulesets <dir>", "Directory holding meta.json and the ruleset tables")
    .option("--json", "Print the status as JSON")
    .action(async (options: CheckCommandOptions) => {
      try {
        await executeCheck(options, io);
      } catch (error) {
        reportFailure(io, error);
      }
    });

  return program;
}
