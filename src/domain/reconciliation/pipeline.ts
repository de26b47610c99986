import { classify } from "./action-classifier.js";
import { crossReference } from "./edit-cross-reference.js";
import { MissingInputError } from "./errors.js";
import { reconcile } from "./platform-reconciler.js";
import { assemble } from "./report-assembler.js";
import type {
  Diagnostic,
  EditRecord,
  Platform,
  ReconciliationInput,
  ReconciliationResult,
  ReconciliationRules,
  SourceRecord
} from "./types.js";
import { partitionValid, validateEditRecord, validateSourceRecord } from "./validation.js";

function assertInputs(input: ReconciliationInput, diagnostics: Diagnostic[]): void {
  const collections: Array<[string, readonly unknown[] | undefined]> = [
    ["APEX", input.apex],
    ["COMMAND", input.command],
    ["EDITS", input.edits]
  ];

  for (const [name, collection] of collections) {
    if (!Array.isArray(collection)) {
      throw new MissingInputError(name, "record collection is missing.");
    }
  }

  if (input.edits.length === 0) {
    throw new MissingInputError("EDITS", "no rate edits were supplied, nothing can be reconciled.");
  }

  if (input.apex.length === 0 && input.command.length === 0) {
    throw new MissingInputError("APEX/COMMAND", "both platform collections are empty.");
  }

  const emptyPlatforms: Array<[Platform, readonly SourceRecord[]]> = [
    ["APEX", input.apex],
    ["COMMAND", input.command]
  ];
  for (const [platform, records] of emptyPlatforms) {
    if (records.length === 0) {
      diagnostics.push({
        code: "EMPTY_INPUT",
        severity: "warning",
        source: platform,
        message: `${platform} supplied no records; every matched jurisdiction will be reported as missing there.`,
        dropped: false
      });
    }
  }
}

function supersededDiagnostic(edit: EditRecord): Diagnostic {
  return {
    code: "DUPLICATE_EDIT",
    severity: "info",
    source: "EDITS",
    message: `A later edit for ${edit.key} supersedes the one effective ${edit.effectiveDate ?? "(no date)"}.`,
    dropped: true,
    key: edit.key,
    ...(edit.origin ? { origin: edit.origin } : {}),
    evidence: {
      effectiveDate: edit.effectiveDate,
      changeType: edit.changeType
    }
  };
}

/**
 * Runs the three merge stages over already-extracted collections:
 * outer join of the platforms, inner join with the edits, then action
 * classification. Per-record problems end up in `diagnostics`; only
 * structural problems throw.
 */
export function reconcileJurisdictions(input: ReconciliationInput, rules: ReconciliationRules): ReconciliationResult {
  const diagnostics: Diagnostic[] = [...(input.diagnostics ?? [])];
  assertInputs(input, diagnostics);

  const apex = partitionValid(input.apex, "APEX", (record) => validateSourceRecord(record, rules.stateCodes));
  const command = partitionValid(input.command, "COMMAND", (record) => validateSourceRecord(record, rules.stateCodes));
  const edits = partitionValid(input.edits, "EDITS", (record) => validateEditRecord(record, rules.stateCodes));
  diagnostics.push(...apex.diagnostics, ...command.diagnostics, ...edits.diagnostics);

  const platform = reconcile(apex.valid, command.valid);
  for (const duplicate of platform.duplicates) {
    diagnostics.push({
      code: "DUPLICATE_KEY",
      severity: "warning",
      source: duplicate.platform,
      message: duplicate.message,
      dropped: true,
      key: duplicate.key,
      ...(duplicate.dropped.origin ? { origin: duplicate.dropped.origin } : {}),
      evidence: {
        kept: duplicate.kept,
        dropped: duplicate.dropped
      }
    });
  }

  const matched = crossReference(platform.records, edits.valid, rules.businessRules);
  diagnostics.push(...matched.superseded.map(supersededDiagnostic));

  const classified = matched.records.map(classify).filter((record) => record.actionRequired !== "No change");

  const assembled = assemble(
    classified,
    {
      totalApex: input.apex.length,
      totalCommand: input.command.length,
      totalEdits: input.edits.length,
      afterOuterJoin: platform.records.length,
      afterInnerJoin: matched.matched
    },
    diagnostics
  );

  return {
    ...assembled,
    diagnostics,
    rulesets: {
      stateCodes: rules.stateCodes.id,
      businessRules: rules.businessRules.id
    }
  };
}
