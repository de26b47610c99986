import { Decimal } from "decimal.js";

// Rate helpers. Rates never go through binary floating point.
const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

export function parseDecimal(raw: string): Decimal | null {
  const trimmed = raw.trim();
  const isNegative = trimmed.startsWith("(") && trimmed.endsWith(")");
  const normalized = (isNegative ? trimmed.slice(1, -1) : trimmed).replace(/[,\s]/g, "");

  if (!DECIMAL_PATTERN.test(normalized)) {
    return null;
  }

  const value = new Decimal(normalized);
  return isNegative ? value.negated() : value;
}

export function isFiniteDecimal(value: unknown): value is Decimal {
  return Decimal.isDecimal(value) && value.isFinite();
}

export function formatDecimal(value: Decimal): string {
  return value.toFixed();
}

export function formatPercent(value: Decimal, fractionDigits = 2): string {
  return `${value.times(100).toFixed(fractionDigits)}%`;
}
