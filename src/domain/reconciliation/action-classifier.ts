import type { ActionLabel, CandidateReportRecord, ReportRecord, UpdatePlatform } from "./types.js";

function decide(record: CandidateReportRecord): { updatePlatform: UpdatePlatform; actionRequired: ActionLabel } {
  switch (record.presence) {
    case "APEX_ONLY":
      return { updatePlatform: "ADD_TO_COMMAND", actionRequired: "Add to COMMAND" };
    case "COMMAND_ONLY":
      return { updatePlatform: "ADD_TO_APEX", actionRequired: "Add to APEX" };
    case "BOTH":
      if (record.rateChange.gt(0)) {
        return { updatePlatform: "BOTH", actionRequired: "Rate increase" };
      }

      if (record.rateChange.lt(0)) {
        return { updatePlatform: "BOTH", actionRequired: "Rate decrease" };
      }

      // zero changes are filtered out before classification
      return { updatePlatform: "BOTH", actionRequired: "No change" };
    default: {
      const unreachable: never = record.presence;
      throw new Error(`Unknown presence ${String(unreachable)}`);
    }
  }
}

/**
 * Presence wins over rate direction: a jurisdiction missing from one
 * platform is reported as an add even when its rate also moved.
 */
export function classify(record: CandidateReportRecord): ReportRecord {
  return {
    ...record,
    ...decide(record)
  };
}
