import { readFile } from "node:fs/promises";
import path from "node:path";

import ExcelJS from "exceljs";
import type { CellValue } from "exceljs";

import { InputLayoutError } from "../domain/reconciliation/errors.js";
import { parseCsv } from "../shared/csv.js";

export interface SheetRow {
  // sheet row number (xlsx) or starting line (csv), 1-based
  number: number;
  cells: string[];
}

export function cellToString(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }

  if (typeof value === "object") {
    if ("richText" in value) {
      return value.richText.map((part) => part.text).join("").trim();
    }

    if ("hyperlink" in value) {
      return String(value.text).trim();
    }

    if ("result" in value) {
      return cellToString(value.result);
    }

    return "";
  }

  return String(value).trim();
}

async function readWorkbookRows(filePath: string): Promise<SheetRow[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new InputLayoutError(path.basename(filePath), "workbook has no worksheets.");
  }

  const rows: SheetRow[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    const cells: string[] = [];
    row.eachCell({ includeEmpty: true }, (cell, columnNumber) => {
      cells[columnNumber - 1] = cellToString(cell.value);
    });

    rows.push({
      number: rowNumber,
      cells: Array.from({ length: cells.length }, (_, index) => cells[index] ?? "")
    });
  });

  return rows;
}

async function readCsvRows(filePath: string): Promise<SheetRow[]> {
  const content = await readFile(filePath, "utf8");
  return parseCsv(content.replace(/^\uFEFF/, "")).map((row) => ({ number: row.line, cells: row.cells }));
}

/**
 * Reads the first worksheet of an .xlsx export, or a .csv export, as rows of
 * trimmed strings. Blank rows are skipped.
 */
export async function readSheet(filePath: string): Promise<SheetRow[]> {
  const extension = path.extname(filePath).toLowerCase();
  let rows: SheetRow[];

  if (extension === ".xlsx") {
    rows = await readWorkbookRows(filePath);
  } else if (extension === ".csv") {
    rows = await readCsvRows(filePath);
  } else {
    throw new InputLayoutError(path.basename(filePath), `unsupported file type "${extension}", expected .xlsx or .csv.`);
  }

  return rows.filter((row) => row.cells.some((cell) => cell.length > 0));
}
