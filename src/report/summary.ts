import type { ReconciliationResult } from "../domain/reconciliation/types.js";

export interface SummaryMetric {
  metric: string;
  value: string | number;
}

export function summaryMetrics(result: ReconciliationResult, generatedAt: Date): SummaryMetric[] {
  const { summary } = result;
  const metrics: SummaryMetric[] = [
    { metric: "APEX records", value: summary.totalApex },
    { metric: "COMMAND records", value: summary.totalCommand },
    { metric: "EDITS records", value: summary.totalEdits },
    { metric: "After outer join", value: summary.afterOuterJoin },
    { metric: "After inner join", value: summary.afterInnerJoin },
    { metric: "Records requiring update", value: summary.afterFilter },
    { metric: "Dropped input records", value: summary.dropped.total },
    { metric: "State code table", value: result.rulesets.stateCodes },
    { metric: "Business rules", value: result.rulesets.businessRules },
    { metric: "Report generated", value: generatedAt.toISOString() }
  ];

  for (const [platform, count] of Object.entries(summary.byPlatform)) {
    metrics.push({ metric: `Platform: ${platform}`, value: count });
  }

  for (const [action, count] of Object.entries(summary.byAction)) {
    metrics.push({ metric: `Action: ${action}`, value: count ?? 0 });
  }

  for (const [code, count] of Object.entries(summary.dropped.byCode)) {
    metrics.push({ metric: `Dropped: ${code}`, value: count ?? 0 });
  }

  return metrics;
}

export function topStates(byState: Record<string, number>, limit = 10): Array<[string, number]> {
  return Object.entries(byState)
    .sort(([leftState, left], [rightState, right]) => right - left || leftState.localeCompare(rightState, "en"))
    .slice(0, limit);
}
