import type {
  ActionLabel,
  AssembledReport,
  Diagnostic,
  DiagnosticCode,
  ReportRecord,
  StageCounts,
  UpdatePlatform
} from "./types.js";

function compareRows(left: ReportRecord, right: ReportRecord): number {
  return (
    left.state.localeCompare(right.state, "en") ||
    left.city.localeCompare(right.city, "en") ||
    (left.key < right.key ? -1 : left.key > right.key ? 1 : 0)
  );
}

function increment<TKey extends string>(counts: Partial<Record<TKey, number>>, key: TKey): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function countDropped(diagnostics: readonly Diagnostic[]): {
  total: number;
  byCode: Partial<Record<DiagnosticCode, number>>;
} {
  const byCode: Partial<Record<DiagnosticCode, number>> = {};
  let total = 0;

  for (const diagnostic of diagnostics) {
    if (!diagnostic.dropped) {
      continue;
    }

    total += 1;
    increment(byCode, diagnostic.code);
  }

  return { total, byCode };
}

/**
 * Final rows plus the summary handed to the report writers. Stage counts are
 * the sizes the pipeline actually observed; afterFilter is the row count.
 */
export function assemble(
  records: readonly ReportRecord[],
  stages: StageCounts,
  diagnostics: readonly Diagnostic[] = []
): AssembledReport {
  const rows = [...records].sort(compareRows);
  const byPlatform: Record<UpdatePlatform, number> = {
    ADD_TO_APEX: 0,
    ADD_TO_COMMAND: 0,
    BOTH: 0
  };
  const byAction: Partial<Record<ActionLabel, number>> = {};
  const byState: Record<string, number> = {};

  for (const row of rows) {
    byPlatform[row.updatePlatform] += 1;
    increment(byAction, row.actionRequired);
    byState[row.state] = (byState[row.state] ?? 0) + 1;
  }

  return {
    rows,
    summary: {
      ...stages,
      afterFilter: rows.length,
      byPlatform,
      byAction,
      byState,
      dropped: countDropped(diagnostics)
    }
  };
}
