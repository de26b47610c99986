export type RulesetKind = "state-codes" | "business-rules";

export type RulesetStatus = "validated" | "stale" | "draft";

export interface StateCodeTable {
  id: string;
  effectiveFrom: string;
  // full upper-case state name -> 2-letter postal code
  codes: ReadonlyMap<string, string>;
  postalCodes: ReadonlySet<string>;
}

export interface BusinessRules {
  id: string;
  effectiveFrom: string;
  excludedChangeTypes: readonly string[];
  minAbsoluteRateChange: string;
}

export interface RulesetMetaEntry {
  id: string;
  kind: RulesetKind;
  path: string;
  effectiveFrom: string;
  status: RulesetStatus;
  approvedBy: string;
  approvedAt: string;
}

export interface RulesetVersions {
  stateCodes: string;
  businessRules: string;
}

export interface RulesetMeta {
  active: RulesetVersions;
  versions: RulesetMetaEntry[];
}
