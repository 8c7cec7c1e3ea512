import { safePercent } from "@/lib/metrics";
import type { ReportInputs, ScenarioRow } from "@/types/report";

export type ScenarioProjections = Pick<
  ReportInputs,
  "historicalTrend" | "linearExtrapolation" | "blendedEstimate"
>;

export function buildScenarioRows(
  projections: ScenarioProjections,
  budget: number
): ScenarioRow[] {
  const row = (label: ScenarioRow["label"], amount: number): ScenarioRow => ({
    label,
    amount,
    percentOfBudget: safePercent(amount, budget),
  });

  return [
    row("Historical Trend", projections.historicalTrend),
    row("Linear Extrapolation", projections.linearExtrapolation),
    row("Blended Estimate", projections.blendedEstimate),
  ];
}
