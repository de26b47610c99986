import type { Decimal } from "decimal.js";

import { normalizeKey, parseCityState } from "../domain/jurisdiction/key.js";
import { InputLayoutError } from "../domain/reconciliation/errors.js";
import type { Diagnostic, ExtractionResult, SourceRecord } from "../domain/reconciliation/types.js";
import { detectColumn } from "../shared/csv.js";
import { parseDecimal } from "../shared/decimal.js";
import { rowDiagnostic } from "./diagnostics.js";
import type { SheetRow } from "./sheet-reader.js";

/**
 * COMMAND exports are a flat table: `Tax code`, `Description` ("CITY, ST"),
 * `Short description` and, in newer exports, a rate column.
 */
export function extractCommandRecords(rows: readonly SheetRow[], source = "COMMAND"): ExtractionResult<SourceRecord> {
  const [header, ...body] = rows;
  if (!header) {
    throw new InputLayoutError(source, "sheet has no header row.");
  }

  const taxCodeIndex = detectColumn(header.cells, ["taxcode"]);
  const descriptionIndex = detectColumn(header.cells, ["description"]);
  const shortDescriptionIndex = detectColumn(header.cells, ["shortdescription"]);
  const rateIndex = detectColumn(header.cells, ["totalrate", "rate"]);

  if (taxCodeIndex < 0 || descriptionIndex < 0) {
    throw new InputLayoutError(source, "expected \"Tax code\" and \"Description\" columns in the header row.");
  }

  const records: SourceRecord[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const row of body) {
    const origin = { source, row: row.number };
    const taxCode = row.cells[taxCodeIndex] ?? "";
    const description = row.cells[descriptionIndex] ?? "";

    const location = parseCityState(description);
    if (!location) {
      diagnostics.push(
        rowDiagnostic("COMMAND", origin, "INVALID_LOCATION", `description "${description}" is not "CITY, ST".`, { taxCode })
      );
      continue;
    }

    if (taxCode.length === 0) {
      diagnostics.push(rowDiagnostic("COMMAND", origin, "MISSING_TAX_CODE", `${description} has no tax code.`));
      continue;
    }

    let totalRate: Decimal | null = null;
    if (rateIndex >= 0) {
      const rawRate = row.cells[rateIndex] ?? "";
      totalRate = parseDecimal(rawRate);
      if (!totalRate) {
        diagnostics.push(
          rowDiagnostic("COMMAND", origin, "MALFORMED_RATE", `rate "${rawRate}" is missing or not numeric.`, { taxCode })
        );
        continue;
      }
    }

    records.push({
      key: normalizeKey(location.city, location.state),
      city: location.city,
      state: location.state,
      taxCode,
      totalRate,
      description: shortDescriptionIndex >= 0 ? row.cells[shortDescriptionIndex] || description : description,
      origin
    });
  }

  return { records, diagnostics };
}
