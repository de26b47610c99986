import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  DATA_DIR: z.string().min(1).default("data"),
  OUTPUT_DIR: z.string().min(1).default("output"),
  APEX_FILE: z.string().min(1).default("Tax Code Report_APEX.xlsx"),
  COMMAND_FILE: z.string().min(1).default("Tax Code Report-COMMAND.xlsx"),
  EDITS_FILE: z.string().min(1).default("Tax Rate Edits.xlsx"),
  REPORT_EXPORT_EXCEL: flag("true"),
  REPORT_EXPORT_CSV: flag("true"),
  REPORT_PRINT_CONSOLE: flag("true"),
  REPORT_FILENAME_PREFIX: z.string().min(1).default("tax_update_report"),
  REPORT_RATE_DISPLAY: z.enum(["percent", "decimal"]).default("percent"),
  RULESET_DIR: z.string().min(1).optional(),
  // unset: the ids listed under `active` in rulesets/meta.json
  DEFAULT_STATE_TABLE: z.string().min(1).optional(),
  DEFAULT_BUSINESS_RULES: z.string().min(1).optional()
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
