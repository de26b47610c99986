import { normalizeKey } from "../domain/jurisdiction/key.js";
import { resolveStateCode } from "../domain/jurisdiction/state-codes.js";
import { InputLayoutError, UnknownStateError } from "../domain/reconciliation/errors.js";
import type { Diagnostic, EditRecord, ExtractionResult } from "../domain/reconciliation/types.js";
import type { StateCodeTable } from "../domain/rulesets/types.js";
import { detectColumn } from "../shared/csv.js";
import { parseDecimal } from "../shared/decimal.js";
import { rowDiagnostic } from "./diagnostics.js";
import type { SheetRow } from "./sheet-reader.js";

export interface EditsExtractionOptions {
  stateCodes: StateCodeTable;
  source?: string;
}

const QUALIFIER_SUFFIX = /\s+(Transactions|Tax|Regional|Metropolitan|District).*$/i;

/**
 * "Gilbert (City)" -> GILBERT / City. Names without a one-word type lose
 * trailing qualifiers: "Phoenix Transactions Privilege" -> PHOENIX.
 */
export function parseJurisdictionName(raw: string): { name: string; type: string | null } | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const typed = trimmed.match(/^(.+?)\s*\((\w+)\)$/);
  const typedName = typed?.[1]?.trim();
  if (typed && typedName) {
    return { name: typedName.toUpperCase(), type: typed[2] ?? null };
  }

  const qualified = trimmed.match(/^(.+?)(?:\s+\((.+)\))?$/);
  const name = (qualified?.[1] ?? trimmed).replace(QUALIFIER_SUFFIX, "").trim();
  if (name.length === 0) {
    return null;
  }

  return { name: name.toUpperCase(), type: qualified?.[2]?.trim() ?? null };
}

function isoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date.toISOString().slice(0, 10);
}

// { date: null } for an empty cell, null when the value cannot be read as a date
export function parseEffectiveDate(raw: string): { date: string | null } | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { date: null };
  }

  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/);
  if (iso) {
    const date = isoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    return date ? { date } : null;
  }

  const us = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/);
  if (us) {
    const yearRaw = us[3] ?? "";
    const year = Number(yearRaw.length === 2 ? `20${yearRaw}` : yearRaw);
    const date = isoDate(year, Number(us[1]), Number(us[2]));
    return date ? { date } : null;
  }

  return null;
}

/**
 * Official rate edits: one row per jurisdiction change, with the state spelled
 * out ("Texas") and the jurisdiction as "Name (Type)".
 */
export function extractEditRecords(rows: readonly SheetRow[], options: EditsExtractionOptions): ExtractionResult<EditRecord> {
  const source = options.source ?? "EDITS";
  const [header, ...body] = rows;
  if (!header) {
    throw new InputLayoutError(source, "sheet has no header row.");
  }

  const columns = {
    state: detectColumn(header.cells, ["state"]),
    jurisdictionName: detectColumn(header.cells, ["jurisdictionname", "jurisdiction"]),
    oldRate: detectColumn(header.cells, ["oldrate"]),
    newRate: detectColumn(header.cells, ["newrate"]),
    effectiveDate: detectColumn(header.cells, ["effectivedate"]),
    changeType: detectColumn(header.cells, ["changetype"]),
    jurisdictionType: detectColumn(header.cells, ["jurisdictiontype"])
  };

  const missing = (["state", "jurisdictionName", "oldRate", "newRate", "changeType"] as const).filter(
    (column) => columns[column] < 0
  );
  if (missing.length > 0) {
    throw new InputLayoutError(source, `missing columns: ${missing.join(", ")}.`);
  }

  const cell = (row: SheetRow, index: number) => (index >= 0 ? row.cells[index] ?? "" : "");
  const records: EditRecord[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const row of body) {
    const origin = { source, row: row.number };
    const stateName = cell(row, columns.state);
    const jurisdiction = cell(row, columns.jurisdictionName);

    let state: string;
    try {
      state = resolveStateCode(stateName, options.stateCodes);
    } catch (error) {
      if (!(error instanceof UnknownStateError)) {
        throw error;
      }

      diagnostics.push(
        rowDiagnostic("EDITS", origin, "UNKNOWN_STATE", `state "${stateName}" is not in table ${options.stateCodes.id}.`, {
          stateName,
          jurisdiction
        })
      );
      continue;
    }

    const parsedName = parseJurisdictionName(jurisdiction);
    if (!parsedName) {
      diagnostics.push(rowDiagnostic("EDITS", origin, "INVALID_LOCATION", `jurisdiction name "${jurisdiction}" is empty.`));
      continue;
    }

    const rawOld = cell(row, columns.oldRate);
    const rawNew = cell(row, columns.newRate);
    const oldRate = parseDecimal(rawOld);
    const newRate = parseDecimal(rawNew);
    if (!oldRate || !newRate) {
      diagnostics.push(
        rowDiagnostic(
          "EDITS",
          origin,
          "MALFORMED_RATE",
          `${oldRate ? "New Rate" : "Old Rate"} "${oldRate ? rawNew : rawOld}" is missing or not numeric.`,
          { jurisdiction, oldRate: rawOld, newRate: rawNew }
        )
      );
      continue;
    }

    const rawDate = cell(row, columns.effectiveDate);
    const effectiveDate = parseEffectiveDate(rawDate);
    if (!effectiveDate) {
      diagnostics.push(
        rowDiagnostic("EDITS", origin, "MALFORMED_DATE", `effective date "${rawDate}" is not a date; kept without one.`, undefined, false)
      );
    }

    const key = normalizeKey(parsedName.name, state);
    records.push({
      key,
      state,
      stateName,
      jurisdictionName: parsedName.name,
      jurisdictionType: cell(row, columns.jurisdictionType) || parsedName.type,
      oldRate,
      newRate,
      rateChange: newRate.minus(oldRate),
      effectiveDate: effectiveDate?.date ?? null,
      changeType: cell(row, columns.changeType),
      origin
    });
  }

  return { records, diagnostics };
}
