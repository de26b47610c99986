import { UnknownStateError } from "../reconciliation/errors.js";
import type { StateCodeTable } from "../rulesets/types.js";

export function resolveStateCode(name: string, table: StateCodeTable): string {
  const normalized = name.trim().replace(/\s+/g, " ").toUpperCase();

  const code = table.codes.get(normalized);
  if (code) {
    return code;
  }

  if (table.postalCodes.has(normalized)) {
    return normalized;
  }

  throw new UnknownStateError(name, table.id);
}

export function isKnownPostalCode(code: string, table: StateCodeTable): boolean {
  return table.postalCodes.has(code);
}
