import { Decimal } from "decimal.js";

import type { BusinessRules } from "../rulesets/types.js";
import type { CandidateReportRecord, EditRecord, JurisdictionKey, ReconciledRecord } from "./types.js";

export interface EditCrossReference {
  records: CandidateReportRecord[];
  // inner-join size before the business filters
  matched: number;
  // edits that lost the latest-effective-date tie-break
  superseded: EditRecord[];
  excluded: {
    zeroChange: number;
    excludedChangeType: number;
  };
}

// null dates sort first; equal dates keep the later record in feed order
function supersedes(candidate: EditRecord, current: EditRecord): boolean {
  if (candidate.effectiveDate === null) {
    return current.effectiveDate === null;
  }

  return current.effectiveDate === null || candidate.effectiveDate >= current.effectiveDate;
}

export function indexLatestEdits(edits: readonly EditRecord[]): {
  index: Map<JurisdictionKey, EditRecord>;
  superseded: EditRecord[];
} {
  const index = new Map<JurisdictionKey, EditRecord>();
  const superseded: EditRecord[] = [];

  for (const edit of edits) {
    const current = index.get(edit.key);
    if (!current) {
      index.set(edit.key, edit);
      continue;
    }

    if (supersedes(edit, current)) {
      superseded.push(current);
      index.set(edit.key, edit);
    } else {
      superseded.push(edit);
    }
  }

  return { index, superseded };
}

/**
 * Inner join of the reconciled platform records against the official edits,
 * keeping only actionable rate changes.
 */
export function crossReference(
  platform: readonly ReconciledRecord[],
  edits: readonly EditRecord[],
  rules: BusinessRules
): EditCrossReference {
  const { index, superseded } = indexLatestEdits(edits);
  const minimumChange = new Decimal(rules.minAbsoluteRateChange);
  const records: CandidateReportRecord[] = [];
  let matched = 0;
  let zeroChange = 0;
  let excludedChangeType = 0;

  for (const reconciled of platform) {
    const edit = index.get(reconciled.key);
    if (!edit) {
      continue;
    }

    matched += 1;

    if (!edit.rateChange.abs().gt(minimumChange)) {
      zeroChange += 1;
      continue;
    }

    if (rules.excludedChangeTypes.includes(edit.changeType.trim())) {
      excludedChangeType += 1;
      continue;
    }

    records.push({
      ...reconciled,
      jurisdictionName: edit.jurisdictionName,
      oldRate: edit.oldRate,
      newRate: edit.newRate,
      rateChange: edit.rateChange,
      effectiveDate: edit.effectiveDate,
      changeType: edit.changeType
    });
  }

  return {
    records,
    matched,
    superseded,
    excluded: {
      zeroChange,
      excludedChangeType
    }
  };
}
