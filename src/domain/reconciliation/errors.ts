import type { Platform, RecordOrigin } from "./types.js";

export const errorCodes = {
  INVALID_KEY_INPUT: "INVALID_KEY_INPUT",
  UNKNOWN_STATE: "UNKNOWN_STATE",
  DUPLICATE_KEY: "DUPLICATE_KEY",
  MALFORMED_RATE: "MALFORMED_RATE",
  MALFORMED_DATE: "MALFORMED_DATE",
  MISSING_TAX_CODE: "MISSING_TAX_CODE",
  MISSING_INPUT: "MISSING_INPUT",
  INPUT_LAYOUT: "INPUT_LAYOUT",
  RULESET_NOT_FOUND: "RULESET_NOT_FOUND",
  RULESET_CHECKSUM_INVALID: "RULESET_CHECKSUM_INVALID",
  RULESET_INVALID: "RULESET_INVALID"
} as const;

export type ErrorCode = (typeof errorCodes)[keyof typeof errorCodes];

export class ReconciliationError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidKeyInputError extends ReconciliationError {
  constructor(city: string, state: string, reason = "city and state must be non-empty") {
    super(errorCodes.INVALID_KEY_INPUT, `Invalid jurisdiction key input "${city}", "${state}": ${reason}.`, {
      city,
      state
    });
  }
}

export class UnknownStateError extends ReconciliationError {
  constructor(stateName: string, tableId: string) {
    super(errorCodes.UNKNOWN_STATE, `State "${stateName}" is not in state code table ${tableId}.`, {
      stateName,
      tableId
    });
  }
}

export interface DuplicateKeyOccurrence {
  city: string;
  state: string;
  taxCode: string;
  origin?: RecordOrigin;
}

export class DuplicateKeyError extends ReconciliationError {
  readonly platform: Platform;
  readonly key: string;
  readonly kept: DuplicateKeyOccurrence;
  readonly dropped: DuplicateKeyOccurrence;

  constructor(platform: Platform, key: string, kept: DuplicateKeyOccurrence, dropped: DuplicateKeyOccurrence) {
    super(
      errorCodes.DUPLICATE_KEY,
      `${platform} has two records for ${key}: "${kept.city}, ${kept.state}" (${kept.taxCode}) and ` +
        `"${dropped.city}, ${dropped.state}" (${dropped.taxCode}); the first one is kept.`,
      { platform, key }
    );
    this.platform = platform;
    this.key = key;
    this.kept = kept;
    this.dropped = dropped;
  }
}

export class MalformedRateError extends ReconciliationError {
  constructor(field: string, raw: unknown, origin?: RecordOrigin) {
    super(errorCodes.MALFORMED_RATE, `Rate field ${field} is missing or not numeric: "${String(raw ?? "")}".`, {
      field,
      raw: raw === undefined ? null : String(raw),
      ...(origin ? { origin } : {})
    });
  }
}

export class MalformedDateError extends ReconciliationError {
  constructor(raw: string, origin?: RecordOrigin) {
    super(errorCodes.MALFORMED_DATE, `Effective date "${raw}" is not a YYYY-MM-DD calendar date.`, {
      raw,
      ...(origin ? { origin } : {})
    });
  }
}

export class MissingTaxCodeError extends ReconciliationError {
  constructor(key: string) {
    super(errorCodes.MISSING_TAX_CODE, `Record ${key} has no tax code.`, { key });
  }
}

export class MissingInputError extends ReconciliationError {
  constructor(input: string, reason: string) {
    super(errorCodes.MISSING_INPUT, `Input ${input} is unavailable: ${reason}`, { input });
  }
}

export class InputLayoutError extends ReconciliationError {
  constructor(input: string, reason: string) {
    super(errorCodes.INPUT_LAYOUT, `Input ${input} has an unexpected layout: ${reason}`, { input });
  }
}

export class RulesetError extends ReconciliationError {
  constructor(
    code: typeof errorCodes.RULESET_NOT_FOUND | typeof errorCodes.RULESET_CHECKSUM_INVALID | typeof errorCodes.RULESET_INVALID,
    message: string,
    rulesetId: string
  ) {
    super(code, message, { rulesetId });
  }
}

export function isReconciliationError(error: unknown): error is ReconciliationError {
  return error instanceof ReconciliationError;
}
