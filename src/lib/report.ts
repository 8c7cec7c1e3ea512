import {
  formatCurrency,
  formatNumber,
  formatPercent,
  formatTimestamp,
} from "@/lib/format";
import type {
  DerivedMetrics,
  GeneratedReport,
  ReportBlock,
  ReportInputs,
  ScenarioRow,
  SupplementaryResult,
} from "@/types/report";

export type ComposeReportOptions = {
  inputs: ReportInputs;
  metrics: DerivedMetrics;
  scenarios: ScenarioRow[];
  shortSupply: SupplementaryResult | null;
  marketReturns: SupplementaryResult | null;
  generatedAt: Date;
  currency: string;
};

export const SUPPLEMENTARY_HEADINGS = {
  shortSupply: "Top 10 Short Supplied Items",
  marketReturns: "Top 10 Market Returns",
} as const;

const heading = (text: string): ReportBlock => ({ type: "heading", text, level: 1 });
const paragraph = (text: string): ReportBlock => ({ type: "paragraph", text });

function supplementarySection(
  title: string,
  result: SupplementaryResult
): ReportBlock[] {
  if (result.status === "failed") {
    return [heading(title), paragraph(result.message)];
  }
  const { columns, rows } = result.table;
  return [
    heading(title),
    {
      type: "table",
      header: columns,
      rows: rows.map((row) => columns.map((column) => row[column] ?? "")),
    },
  ];
}

export function composeReport({
  inputs,
  metrics,
  scenarios,
  shortSupply,
  marketReturns,
  generatedAt,
  currency,
}: ComposeReportOptions): GeneratedReport {
  const money = (value: number) => formatCurrency(value, currency);
  const title = `Week ${inputs.weekNumber} Sales Report`;
  const growth = formatPercent(metrics.growthRate, 2, true);
  const comparedTo =
    inputs.weekNumber > 1 ? `Week ${inputs.weekNumber - 1}` : "the previous week";
  const budgetClause =
    metrics.weeklyVariance < 0 ? "though still under budget" : "and met its weekly budget";

  const blocks: ReportBlock[] = [
    { type: "heading", text: title, level: 0, align: "center" },
    { type: "paragraph", text: `Report date: ${inputs.reportDate}`, align: "center" },
    {
      type: "paragraph",
      text: `Generated on: ${formatTimestamp(generatedAt)}`,
      align: "center",
    },

    heading("MTD Sales Revenue Update"),
    paragraph(`Budget: ${money(inputs.budget)}`),
    paragraph(`MTD Revenue: ${money(inputs.mtdRevenue)}`),
    paragraph(`Achievement vs Budget: ${formatPercent(metrics.achievementPct)}`),
    paragraph(
      `Revenue Gap to Budget: ${money(metrics.revenueGap)} (${formatPercent(
        100 - metrics.achievementPct
      )})`
    ),
    paragraph(
      `Closing Revenue Estimate: ${money(inputs.blendedEstimate)} (${formatPercent(
        metrics.closingPct
      )} of Budget)`
    ),

    heading("Current Week Performance"),
    paragraph(`Weekly Budget: ${money(inputs.weeklyBudget)}`),
    paragraph(`Current Week Revenue: ${money(inputs.currentWeekRevenue)}`),
    paragraph(
      `Variance to Budget: ${money(metrics.weeklyVariance)} (${formatPercent(
        metrics.weeklyVariancePct,
        0,
        true
      )})`
    ),
    paragraph(`Previous Week Revenue: ${money(inputs.previousWeekRevenue)}`),
    paragraph(`Growth Rate: ${growth}`),

    heading("Operational Insights"),
    paragraph(
      `Short Supplies: ${money(inputs.shortSupplies)} (~${formatPercent(
        metrics.shortSupplyImpactPct,
        1
      )} impact)`
    ),
    paragraph(
      `Returns: ${money(inputs.returns)} (~${formatPercent(
        metrics.returnsImpactPct,
        1
      )} impact)`
    ),

    heading("Key Highlights"),
    paragraph(
      `Week ${inputs.weekNumber} showed a ${growth} growth over ${comparedTo}, ${budgetClause}.`
    ),
    paragraph(
      `MTD Revenue is now at ${formatPercent(metrics.achievementPct)} of budget with ${money(
        metrics.revenueGap
      )} to go.`
    ),
  ];

  if (inputs.highlightMay25) {
    blocks.push({
      type: "bullet",
      text: "May 25 sales exceeded the historical trend.",
      level: 0,
    });
    if (inputs.parmesanPriceIncrease) {
      blocks.push({
        type: "bullet",
        text: "This was likely due to an increase in Parmesan price.",
        level: 1,
      });
    }
  }

  blocks.push(heading("Closing Estimates Summary"), {
    type: "table",
    header: ["Scenario", "Estimate", "% of Budget"],
    rows: scenarios.map((row) => [
      row.label,
      formatNumber(row.amount),
      formatPercent(row.percentOfBudget, 1),
    ]),
  });

  if (shortSupply) {
    blocks.push(...supplementarySection(SUPPLEMENTARY_HEADINGS.shortSupply, shortSupply));
  }
  if (marketReturns) {
    blocks.push(
      ...supplementarySection(SUPPLEMENTARY_HEADINGS.marketReturns, marketReturns)
    );
  }

  return Object.freeze({
    title,
    weekNumber: inputs.weekNumber,
    reportDate: inputs.reportDate,
    generatedAt,
    blocks: Object.freeze(blocks),
  });
}

/** Plain-text rendering of the blocks, used by the preview's copy action. */
export function reportToText(report: GeneratedReport): string {
  return report.blocks
    .map((block) => {
      switch (block.type) {
        case "heading":
          return block.level === 0 ? block.text.toUpperCase() : `\n${block.text}`;
        case "paragraph":
          return block.text;
        case "bullet":
          return `${block.level === 1 ? "    " : ""}• ${block.text}`;
        case "table":
          return [block.header, ...block.rows].map((row) => row.join(" | ")).join("\n");
      }
    })
    .join("\n");
}
