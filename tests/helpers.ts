import { cpSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { Decimal } from "decimal.js";

import { normalizeKey } from "../src/domain/jurisdiction/key.js";
import { reconcileJurisdictions } from "../src/domain/reconciliation/pipeline.js";
import type {
  CandidateReportRecord,
  EditRecord,
  Presence,
  ReconciliationResult,
  SourceRecord
} from "../src/domain/reconciliation/types.js";
import { computeRulesetChecksum, loadRulesetMeta } from "../src/domain/rulesets/loader.js";
import type { BusinessRules, StateCodeTable } from "../src/domain/rulesets/types.js";
import type { SheetRow } from "../src/sources/sheet-reader.js";

const STATE_NAMES: Record<string, string> = {
  ARIZONA: "AZ",
  "NEW YORK": "NY",
  "NORTH CAROLINA": "NC",
  TEXAS: "TX"
};

export const stateCodes: StateCodeTable = {
  id: "TEST-STATES",
  effectiveFrom: "2026-01-01",
  codes: new Map(Object.entries(STATE_NAMES)),
  postalCodes: new Set(Object.values(STATE_NAMES))
};

export const businessRules: BusinessRules = {
  id: "TEST-RULES",
  effectiveFrom: "2026-01-01",
  excludedChangeTypes: ["Expired"],
  minAbsoluteRateChange: "0"
};

export const rules = { stateCodes, businessRules };

export function source(city: string, state: string, taxCode: string, totalRate: string | null = null, row = 1): SourceRecord {
  return {
    key: normalizeKey(city, state),
    city: city.toUpperCase(),
    state,
    taxCode,
    totalRate: totalRate === null ? null : new Decimal(totalRate),
    origin: { source: "test", row }
  };
}

export function edit(
  city: string,
  state: string,
  oldRate: string,
  newRate: string,
  options: { effectiveDate?: string | null; changeType?: string; row?: number } = {}
): EditRecord {
  return {
    key: normalizeKey(city, state),
    state,
    jurisdictionName: city.toUpperCase(),
    oldRate: new Decimal(oldRate),
    newRate: new Decimal(newRate),
    rateChange: new Decimal(newRate).minus(oldRate),
    effectiveDate: options.effectiveDate === undefined ? "2026-04-01" : options.effectiveDate,
    changeType: options.changeType ?? "Active",
    origin: { source: "edits", row: options.row ?? 2 }
  };
}

export function candidate(presence: Presence, rateChange: string): CandidateReportRecord {
  return {
    key: "ADDISON_TX",
    city: "ADDISON",
    state: "TX",
    taxCodeApex: presence === "COMMAND_ONLY" ? null : "ADD",
    taxCodeCommand: presence === "APEX_ONLY" ? null : "C-ADD",
    totalRateApex: null,
    totalRateCommand: null,
    presence,
    jurisdictionName: "ADDISON",
    oldRate: new Decimal("0.08"),
    newRate: new Decimal("0.08").plus(rateChange),
    rateChange: new Decimal(rateChange),
    effectiveDate: "2026-04-01",
    changeType: "Active"
  };
}

// ADDISON_TX is missing from COMMAND, HOUSTON_TX drops its rate on both platforms.
export function sampleResult(): ReconciliationResult {
  return reconcileJurisdictions(
    {
      apex: [source("Addison", "TX", "A-ADD"), source("Houston", "TX", "A-HOU")],
      command: [source("Houston", "TX", "C-HOU")],
      edits: [
        edit("Addison", "TX", "0.0825", "0.0875"),
        edit("Houston", "TX", "0.08", "0.0775", { effectiveDate: null })
      ]
    },
    rules
  );
}

export function emptyResult(): ReconciliationResult {
  return reconcileJurisdictions(
    {
      apex: [source("Austin", "TX", "A-AUS")],
      command: [source("Austin", "TX", "C-AUS")],
      edits: [edit("Austin", "TX", "0.0825", "0.0825")]
    },
    rules
  );
}

// Rows numbered from 1, as a sheet would be.
export function sheet(cells: string[][]): SheetRow[] {
  return cells.map((row, index) => ({ number: index + 1, cells: row }));
}

export function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }

  throw new Error("expected the call to throw");
}

export async function captureAsyncError(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }

  throw new Error("expected the call to reject");
}

export const NEXT_RULES_ID = "RECON-RULES-2027.1";

/**
 * Copies the packaged rulesets into `root`, adds a signed RECON-RULES-2027.1
 * and marks it active in meta.json.
 */
export function copyRulesetsWithNextRules(root: string): void {
  cpSync(path.resolve(process.cwd(), "rulesets"), root, { recursive: true });

  const current: Record<string, unknown> = JSON.parse(
    readFileSync(path.join(root, "business-rules", "recon-rules-2026.1.json"), "utf8")
  );
  const { checksum: _checksum, ...rules } = current;
  const payload = { ...rules, id: NEXT_RULES_ID, effectiveFrom: "2027-01-01" };
  writeFileSync(
    path.join(root, "business-rules", "recon-rules-2027.1.json"),
    JSON.stringify({ ...payload, checksum: computeRulesetChecksum(payload) }, null, 2)
  );

  const meta = loadRulesetMeta(root);
  const next = {
    id: NEXT_RULES_ID,
    kind: "business-rules",
    path: "business-rules/recon-rules-2027.1.json",
    effectiveFrom: "2027-01-01",
    status: "validated",
    approvedBy: "tax-operations",
    approvedAt: "2026-12-01T00:00:00.000Z"
  };
  writeFileSync(
    path.join(root, "meta.json"),
    JSON.stringify({ active: { ...meta.active, businessRules: NEXT_RULES_ID }, versions: [...meta.versions, next] }, null, 2)
  );
}
