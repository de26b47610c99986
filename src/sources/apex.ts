import { normalizeKey, parseCityState } from "../domain/jurisdiction/key.js";
import type { Diagnostic, ExtractionResult, RecordOrigin, SourceRecord } from "../domain/reconciliation/types.js";
import { normalizeHeader } from "../shared/csv.js";
import { parseDecimal } from "../shared/decimal.js";
import { rowDiagnostic } from "./diagnostics.js";
import type { SheetRow } from "./sheet-reader.js";

const BLOCK_START_MARKER = "taxcode";
const TOTAL_RATE_MARKER = "totalrate";

interface BlockHeader {
  taxCode: string;
  location: string;
  origin: RecordOrigin;
}

/*
 * APEX exports one block per jurisdiction:
 *
 *   TaxCode     | ADD   | ADDISON, TX
 *   State       | ...               (component rows)
 *   Total Rate  | 0.0825
 *
 * AwaitingBlockStart: outside any block, rows are ignored.
 * InBlock:            header read, no component rows yet.
 * AwaitingRate:       component rows read, waiting for Total Rate.
 */
type ParserState =
  | { kind: "AwaitingBlockStart" }
  | { kind: "InBlock"; header: BlockHeader }
  | { kind: "AwaitingRate"; header: BlockHeader; componentRows: number };

function markerOf(row: SheetRow): "blockStart" | "totalRate" | null {
  const first = normalizeHeader(row.cells[0] ?? "");
  if (first === BLOCK_START_MARKER) {
    return "blockStart";
  }

  return first === TOTAL_RATE_MARKER ? "totalRate" : null;
}

function unterminatedBlock(state: Exclude<ParserState, { kind: "AwaitingBlockStart" }>, reason: string): Diagnostic {
  const { header } = state;
  return rowDiagnostic(
    "APEX",
    header.origin,
    "MISSING_RATE_ROW",
    state.kind === "InBlock"
      ? `block ${header.taxCode || "(no tax code)"} (${header.location}) has no component rows and no Total Rate row before ${reason}.`
      : `block ${header.taxCode || "(no tax code)"} (${header.location}) has no Total Rate row before ${reason}.`,
    {
      taxCode: header.taxCode,
      location: header.location,
      componentRows: state.kind === "AwaitingRate" ? state.componentRows : 0
    }
  );
}

function closeBlock(header: BlockHeader, rateRow: SheetRow): SourceRecord | Diagnostic {
  const rawRate = rateRow.cells[1] ?? "";
  const totalRate = parseDecimal(rawRate);
  if (!totalRate) {
    return rowDiagnostic("APEX", { ...header.origin, row: rateRow.number }, "MALFORMED_RATE", `Total Rate "${rawRate}" is not numeric.`, {
      taxCode: header.taxCode,
      location: header.location
    });
  }

  const location = parseCityState(header.location);
  if (!location) {
    return rowDiagnostic("APEX", header.origin, "INVALID_LOCATION", `location "${header.location}" is not "CITY, ST".`, {
      taxCode: header.taxCode
    });
  }

  if (header.taxCode.length === 0) {
    return rowDiagnostic("APEX", header.origin, "MISSING_TAX_CODE", `block for ${header.location} has no tax code.`);
  }

  return {
    key: normalizeKey(location.city, location.state),
    city: location.city,
    state: location.state,
    taxCode: header.taxCode,
    totalRate,
    origin: header.origin
  };
}

export function extractApexRecords(rows: readonly SheetRow[], source = "APEX"): ExtractionResult<SourceRecord> {
  const records: SourceRecord[] = [];
  const diagnostics: Diagnostic[] = [];
  let state: ParserState = { kind: "AwaitingBlockStart" };

  for (const row of rows) {
    const marker = markerOf(row);

    if (marker === "blockStart") {
      if (state.kind !== "AwaitingBlockStart") {
        diagnostics.push(unterminatedBlock(state, `the next TaxCode row ${row.number}`));
      }

      state = {
        kind: "InBlock",
        header: {
          taxCode: row.cells[1] ?? "",
          location: row.cells[2] ?? "",
          origin: { source, row: row.number }
        }
      };
      continue;
    }

    if (state.kind === "AwaitingBlockStart") {
      continue;
    }

    if (marker === "totalRate") {
      const result = closeBlock(state.header, row);
      if ("code" in result) {
        diagnostics.push(result);
      } else {
        records.push(result);
      }
      state = { kind: "AwaitingBlockStart" };
      continue;
    }

    state = {
      kind: "AwaitingRate",
      header: state.header,
      componentRows: state.kind === "AwaitingRate" ? state.componentRows + 1 : 1
    };
  }

  if (state.kind !== "AwaitingBlockStart") {
    diagnostics.push(unterminatedBlock(state, "the end of the sheet"));
  }

  return { records, diagnostics };
}
