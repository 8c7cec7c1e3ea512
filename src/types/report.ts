export type ReportInputs = {
  budget: number;
  mtdRevenue: number;
  weeklyBudget: number;
  currentWeekRevenue: number;
  previousWeekRevenue: number;
  shortSupplies: number;
  returns: number;
  historicalTrend: number;
  linearExtrapolation: number;
  blendedEstimate: number;
  highlightMay25: boolean;
  parmesanPriceIncrease: boolean;
  weekNumber: number;
  reportDate: string;
};

export type MoneyField =
  | "budget"
  | "mtdRevenue"
  | "weeklyBudget"
  | "currentWeekRevenue"
  | "previousWeekRevenue"
  | "shortSupplies"
  | "returns"
  | "historicalTrend"
  | "linearExtrapolation"
  | "blendedEstimate";

export type DerivedMetrics = {
  revenueGap: number;
  achievementPct: number;
  weeklyVariance: number;
  weeklyVariancePct: number;
  growthRate: number;
  closingPct: number;
  shortSupplyImpactPct: number;
  returnsImpactPct: number;
};

export type ScenarioLabel =
  | "Historical Trend"
  | "Linear Extrapolation"
  | "Blended Estimate";

export type ScenarioRow = {
  label: ScenarioLabel;
  amount: number;
  percentOfBudget: number;
};

export type SupplementaryTable = {
  columns: string[];
  rows: Record<string, string>[];
};

export type SupplementaryResult =
  | { status: "loaded"; fileName: string; table: SupplementaryTable }
  | { status: "failed"; fileName: string; message: string };

export type SupplementaryKind = "shortSupply" | "marketReturns";

export type ReportBlock =
  | { type: "heading"; text: string; level: 0 | 1; align?: "center" }
  | { type: "paragraph"; text: string; align?: "center" }
  | { type: "bullet"; text: string; level: 0 | 1 }
  | { type: "table"; header: string[]; rows: string[][] };

export type GeneratedReport = {
  readonly title: string;
  readonly weekNumber: number;
  readonly reportDate: string;
  readonly generatedAt: Date;
  readonly blocks: readonly ReportBlock[];
};
