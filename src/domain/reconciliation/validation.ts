import { isFiniteDecimal } from "../../shared/decimal.js";
import { normalizeKey } from "../jurisdiction/key.js";
import { isKnownPostalCode } from "../jurisdiction/state-codes.js";
import type { StateCodeTable } from "../rulesets/types.js";
import {
  InvalidKeyInputError,
  MalformedDateError,
  MalformedRateError,
  MissingTaxCodeError,
  ReconciliationError,
  UnknownStateError,
  errorCodes
} from "./errors.js";
import type { Diagnostic, DiagnosticCode, EditRecord, InputSource, RecordOrigin, SourceRecord } from "./types.js";

function assertKey(key: string, city: string, state: string, stateCodes: StateCodeTable): void {
  if (key.trim().length === 0) {
    throw new InvalidKeyInputError(city, state, "record key is empty");
  }

  if (!/^[A-Z]{2}$/.test(state) || !isKnownPostalCode(state, stateCodes)) {
    throw new UnknownStateError(state, stateCodes.id);
  }

  const expected = normalizeKey(city, state);
  if (key !== expected) {
    throw new InvalidKeyInputError(city, state, `record key ${key} does not match normalized key ${expected}`);
  }
}

function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }

  const date = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export function validateSourceRecord(record: SourceRecord, stateCodes: StateCodeTable): void {
  assertKey(record.key, record.city, record.state, stateCodes);

  if (record.taxCode.trim().length === 0) {
    throw new MissingTaxCodeError(record.key);
  }

  if (record.totalRate !== null && !isFiniteDecimal(record.totalRate)) {
    throw new MalformedRateError("totalRate", record.totalRate, record.origin);
  }
}

export function validateEditRecord(record: EditRecord, stateCodes: StateCodeTable): void {
  assertKey(record.key, record.jurisdictionName, record.state, stateCodes);

  if (!isFiniteDecimal(record.oldRate)) {
    throw new MalformedRateError("oldRate", record.oldRate, record.origin);
  }

  if (!isFiniteDecimal(record.newRate)) {
    throw new MalformedRateError("newRate", record.newRate, record.origin);
  }

  if (!isFiniteDecimal(record.rateChange) || !record.rateChange.eq(record.newRate.minus(record.oldRate))) {
    throw new MalformedRateError("rateChange", record.rateChange, record.origin);
  }

  // the latest-edit tie-break compares these as strings
  if (record.effectiveDate !== null && !isCalendarDate(record.effectiveDate)) {
    throw new MalformedDateError(record.effectiveDate, record.origin);
  }
}

function diagnosticCodeFor(error: ReconciliationError): DiagnosticCode {
  switch (error.code) {
    case errorCodes.MISSING_TAX_CODE:
      return "MISSING_TAX_CODE";
    case errorCodes.UNKNOWN_STATE:
      return "UNKNOWN_STATE";
    case errorCodes.MALFORMED_RATE:
      return "MALFORMED_RATE";
    case errorCodes.MALFORMED_DATE:
      return "MALFORMED_DATE";
    case errorCodes.DUPLICATE_KEY:
      return "DUPLICATE_KEY";
    case errorCodes.INVALID_KEY_INPUT:
      return "INVALID_KEY_INPUT";
    default:
      // run-level failures are not per-record diagnostics
      throw error;
  }
}

export function toDiagnostic(
  error: ReconciliationError,
  source: InputSource,
  record: { key?: string; origin?: RecordOrigin }
): Diagnostic {
  return {
    code: diagnosticCodeFor(error),
    severity: "warning",
    source,
    message: error.message,
    dropped: true,
    ...(record.key ? { key: record.key } : {}),
    ...(record.origin ? { origin: record.origin } : {}),
    evidence: error.details
  };
}

/**
 * Splits a collection into records that pass `validate` and diagnostics for
 * the ones that do not. Only ReconciliationError is treated as a per-record
 * failure; anything else propagates.
 */
export function partitionValid<TRecord extends { key: string; origin?: RecordOrigin }>(
  records: readonly TRecord[],
  source: InputSource,
  validate: (record: TRecord) => void
): { valid: TRecord[]; diagnostics: Diagnostic[] } {
  const valid: TRecord[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const record of records) {
    try {
      validate(record);
      valid.push(record);
    } catch (error) {
      if (!(error instanceof ReconciliationError)) {
        throw error;
      }

      diagnostics.push(toDiagnostic(error, source, record));
    }
  }

  return { valid, diagnostics };
}
