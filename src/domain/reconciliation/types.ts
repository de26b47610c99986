import type { Decimal } from "decimal.js";

import type { BusinessRules, StateCodeTable } from "../rulesets/types.js";

// CITY_ST, see normalizeKey.
export type JurisdictionKey = string;

export type Platform = "APEX" | "COMMAND";

export type InputSource = Platform | "EDITS";

export type Presence = "APEX_ONLY" | "COMMAND_ONLY" | "BOTH";

export type UpdatePlatform = "ADD_TO_APEX" | "ADD_TO_COMMAND" | "BOTH";

export type ActionLabel = "Add to COMMAND" | "Add to APEX" | "Rate increase" | "Rate decrease" | "No change";

export interface RecordOrigin {
  source: string;
  row: number;
}

export interface SourceRecord {
  readonly key: JurisdictionKey;
  readonly city: string;
  readonly state: string;
  readonly taxCode: string;
  // null when the platform export has no rate column at all
  readonly totalRate: Decimal | null;
  readonly description?: string | null;
  readonly origin?: RecordOrigin;
}

export interface EditRecord {
  readonly key: JurisdictionKey;
  readonly state: string;
  readonly stateName?: string | null;
  readonly jurisdictionName: string;
  readonly jurisdictionType?: string | null;
  readonly oldRate: Decimal;
  readonly newRate: Decimal;
  readonly rateChange: Decimal;
  // YYYY-MM-DD
  readonly effectiveDate: string | null;
  readonly changeType: string;
  readonly origin?: RecordOrigin;
}

export interface ReconciledRecord {
  readonly key: JurisdictionKey;
  readonly city: string;
  readonly state: string;
  readonly taxCodeApex: string | null;
  readonly taxCodeCommand: string | null;
  readonly totalRateApex: Decimal | null;
  readonly totalRateCommand: Decimal | null;
  readonly presence: Presence;
}

export interface CandidateReportRecord extends ReconciledRecord {
  readonly jurisdictionName: string;
  readonly oldRate: Decimal;
  readonly newRate: Decimal;
  readonly rateChange: Decimal;
  readonly effectiveDate: string | null;
  readonly changeType: string;
}

export interface ReportRecord extends CandidateReportRecord {
  readonly actionRequired: ActionLabel;
  readonly updatePlatform: UpdatePlatform;
}

export type DiagnosticCode =
  | "INVALID_KEY_INPUT"
  | "UNKNOWN_STATE"
  | "DUPLICATE_KEY"
  | "DUPLICATE_EDIT"
  | "MALFORMED_RATE"
  | "MALFORMED_DATE"
  | "INVALID_LOCATION"
  | "MISSING_RATE_ROW"
  | "MISSING_TAX_CODE"
  | "EMPTY_INPUT";

export interface Diagnostic {
  code: DiagnosticCode;
  severity: "info" | "warning" | "error";
  source: InputSource;
  message: string;
  // true when the record was excluded from every downstream stage
  dropped: boolean;
  key?: JurisdictionKey;
  origin?: RecordOrigin;
  evidence?: Record<string, unknown>;
}

export interface ExtractionResult<TRecord> {
  records: TRecord[];
  diagnostics: Diagnostic[];
}

export interface StageCounts {
  totalApex: number;
  totalCommand: number;
  totalEdits: number;
  afterOuterJoin: number;
  afterInnerJoin: number;
}

export interface ReportSummary extends StageCounts {
  afterFilter: number;
  byPlatform: Record<UpdatePlatform, number>;
  byAction: Partial<Record<ActionLabel, number>>;
  byState: Record<string, number>;
  dropped: {
    total: number;
    byCode: Partial<Record<DiagnosticCode, number>>;
  };
}

export interface AssembledReport {
  rows: ReportRecord[];
  summary: ReportSummary;
}

export interface ReconciliationInput {
  apex: readonly SourceRecord[];
  command: readonly SourceRecord[];
  edits: readonly EditRecord[];
  // carried over from the extractors so the run reports every drop
  diagnostics?: readonly Diagnostic[];
}

export interface ReconciliationRules {
  stateCodes: StateCodeTable;
  businessRules: BusinessRules;
}

export interface ReconciliationResult extends AssembledReport {
  diagnostics: Diagnostic[];
  rulesets: {
    stateCodes: string;
    businessRules: string;
  };
}
