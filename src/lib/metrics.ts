import type { DerivedMetrics, ReportInputs } from "@/types/report";

/**
 * `numerator / denominator * 100`, or 0 when the denominator is zero or not a
 * finite number.
 */
export function safePercent(numerator: number, denominator: number): number {
  if (denominator === 0 || !Number.isFinite(denominator)) return 0;
  return (numerator / denominator) * 100;
}

export function calculateMetrics(inputs: ReportInputs): DerivedMetrics {
  const weeklyVariance = inputs.currentWeekRevenue - inputs.weeklyBudget;

  return {
    revenueGap: inputs.budget - inputs.mtdRevenue,
    achievementPct: safePercent(inputs.mtdRevenue, inputs.budget),
    weeklyVariance,
    weeklyVariancePct: safePercent(weeklyVariance, inputs.weeklyBudget),
    growthRate: safePercent(
      inputs.currentWeekRevenue - inputs.previousWeekRevenue,
      inputs.previousWeekRevenue
    ),
    closingPct: safePercent(inputs.blendedEstimate, inputs.budget),
    shortSupplyImpactPct: safePercent(
      inputs.shortSupplies,
      inputs.currentWeekRevenue
    ),
    returnsImpactPct: safePercent(inputs.returns, inputs.currentWeekRevenue),
  };
}

export type PeriodComparison = {
  period: "Weekly" | "Monthly";
  budget: number;
  actual: number;
};

// Chart-ready budget vs actual pairs for the dashboard.
export function buildPeriodComparison(
  inputs: ReportInputs
): PeriodComparison[] {
  return [
    {
      period: "Weekly",
      budget: inputs.weeklyBudget,
      actual: inputs.currentWeekRevenue,
    },
    { period: "Monthly", budget: inputs.budget, actual: inputs.mtdRevenue },
  ];
}
