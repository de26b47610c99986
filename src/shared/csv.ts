export interface CsvRow {
  // 1-based line the record starts on
  line: number;
  cells: string[];
}

export function parseCsv(content: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let current = "";
  let row: string[] = [];
  let inQuotes = false;
  let line = 1;
  let rowLine = 1;

  for (let index = 0; index < content.length; index += 1) {
    const char = content[index];
    const next = content[index + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      row.push(current.trim());
      current = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && next === "\n") {
        index += 1;
      }

      if (current.length > 0 || row.length > 0) {
        row.push(current.trim());
        rows.push({ line: rowLine, cells: row });
        row = [];
        current = "";
      }
      line += 1;
      rowLine = line;
      continue;
    }

    if (char === "\n") {
      line += 1;
    }

    current += char;
  }

  if (current.length > 0 || row.length > 0) {
    row.push(current.trim());
    rows.push({ line: rowLine, cells: row });
  }

  return rows.filter((item) => item.cells.some((cell) => cell.length > 0));
}

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function buildCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  return [header, ...rows].map((row) => row.map(escapeCell).join(",")).join("\n") + "\n";
}

export function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[^a-z0-9]/g, "");
}

export function detectColumn(headers: string[], candidates: string[]): number {
  const normalized = headers.map(normalizeHeader);
  for (const candidate of candidates) {
    const found = normalized.findIndex((header) => header === candidate);
    if (found >= 0) {
      return found;
    }
  }

  return -1;
}
