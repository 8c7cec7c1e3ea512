import { describe, expect, it } from "vitest";
import { buildPeriodComparison, calculateMetrics, safePercent } from "@/lib/metrics";
import type { ReportInputs } from "@/types/report";

const inputs: ReportInputs = {
  budget: 100000,
  mtdRevenue: 50000,
  weeklyBudget: 20000,
  currentWeekRevenue: 25000,
  previousWeekRevenue: 20000,
  shortSupplies: 2500,
  returns: 500,
  historicalTrend: 90000,
  linearExtrapolation: 110000,
  blendedEstimate: 95000,
  highlightMay25: false,
  parmesanPriceIncrease: false,
  weekNumber: 3,
  reportDate: "2025-05-26",
};

describe("safePercent", () => {
  it("returns the ratio as a percentage", () => {
    expect(safePercent(1, 4)).toBe(25);
  });

  it("returns 0 for a zero denominator", () => {
    expect(safePercent(10, 0)).toBe(0);
  });

  it("returns 0 for a non-finite denominator", () => {
    expect(safePercent(10, Number.NaN)).toBe(0);
    expect(safePercent(10, Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("calculateMetrics", () => {
  it("derives every metric from the inputs", () => {
    expect(calculateMetrics(inputs)).toEqual({
      revenueGap: 50000,
      achievementPct: 50,
      weeklyVariance: 5000,
      weeklyVariancePct: 25,
      growthRate: 25,
      closingPct: 95,
      shortSupplyImpactPct: 10,
      returnsImpactPct: 2,
    });
  });

  it("reports a negative gap once the budget is exceeded", () => {
    const metrics = calculateMetrics({ ...inputs, mtdRevenue: 120000 });
    expect(metrics.revenueGap).toBe(-20000);
    expect(metrics.achievementPct).toBe(120);
  });

  it("yields 0 for ratios over a zero budget", () => {
    const metrics = calculateMetrics({ ...inputs, budget: 0 });
    expect(metrics.achievementPct).toBe(0);
    expect(metrics.closingPct).toBe(0);
    expect(metrics.revenueGap).toBe(-50000);
  });

  it("yields 0 growth when there was no revenue the previous week", () => {
    expect(calculateMetrics({ ...inputs, previousWeekRevenue: 0 }).growthRate).toBe(0);
  });

  it("yields 0 impact when the current week has no revenue", () => {
    const metrics = calculateMetrics({ ...inputs, currentWeekRevenue: 0 });
    expect(metrics.shortSupplyImpactPct).toBe(0);
    expect(metrics.returnsImpactPct).toBe(0);
    expect(metrics.weeklyVariance).toBe(-20000);
    expect(metrics.weeklyVariancePct).toBe(-100);
  });

  it("computes week-on-week growth for realistic figures", () => {
    const metrics = calculateMetrics({
      ...inputs,
      currentWeekRevenue: 20943811,
      previousWeekRevenue: 20353938,
    });
    expect(metrics.growthRate).toBeCloseTo(2.898, 3);
  });
});

describe("buildPeriodComparison", () => {
  it("pairs budget and actual for the week and the month", () => {
    expect(buildPeriodComparison(inputs)).toEqual([
      { period: "Weekly", budget: 20000, actual: 25000 },
      { period: "Monthly", budget: 100000, actual: 50000 },
    ]);
  });
});
