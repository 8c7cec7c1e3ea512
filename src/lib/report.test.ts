import { describe, expect, it } from "vitest";
import { defaultInputs } from "@/lib/config";
import { calculateMetrics } from "@/lib/metrics";
import { composeReport, reportToText, type ComposeReportOptions } from "@/lib/report";
import { buildScenarioRows } from "@/lib/scenarios";
import type { ReportBlock, ReportInputs, SupplementaryResult } from "@/types/report";

const inputs: ReportInputs = { ...defaultInputs, reportDate: "2025-05-26" };
const generatedAt = new Date(2025, 4, 26, 9, 5);

const options = (overrides: Partial<ComposeReportOptions> = {}): ComposeReportOptions => {
  const base = overrides.inputs ?? inputs;
  return {
    inputs: base,
    metrics: calculateMetrics(base),
    scenarios: buildScenarioRows(base, base.budget),
    shortSupply: null,
    marketReturns: null,
    generatedAt,
    currency: "KSH",
    ...overrides,
  };
};

const texts = (blocks: readonly ReportBlock[]) =>
  blocks.flatMap((block) => (block.type === "table" ? [] : [block.text]));

const sectionHeadings = (blocks: readonly ReportBlock[]) =>
  blocks.flatMap((block) => (block.type === "heading" && block.level === 1 ? [block.text] : []));

describe("composeReport", () => {
  it("opens with the centered title and dates", () => {
    const report = composeReport(options());
    expect(report.title).toBe("Week 22 Sales Report");
    expect(report.blocks.slice(0, 3)).toEqual([
      { type: "heading", text: "Week 22 Sales Report", level: 0, align: "center" },
      { type: "paragraph", text: "Report date: 2025-05-26", align: "center" },
      { type: "paragraph", text: "Generated on: 2025-05-26 09:05", align: "center" },
    ]);
  });

  it("lays out the sections in a fixed order", () => {
    expect(sectionHeadings(composeReport(options()).blocks)).toEqual([
      "MTD Sales Revenue Update",
      "Current Week Performance",
      "Operational Insights",
      "Key Highlights",
      "Closing Estimates Summary",
    ]);
  });

  it("formats the month-to-date and weekly figures", () => {
    const lines = texts(composeReport(options()).blocks);
    expect(lines).toContain("Budget: KSH 113,998,325");
    expect(lines).toContain("Achievement vs Budget: 82%");
    expect(lines).toContain("Revenue Gap to Budget: KSH 20,582,907 (18%)");
    expect(lines).toContain("Closing Revenue Estimate: KSH 93,904,753 (82% of Budget)");
    expect(lines).toContain("Variance to Budget: KSH -5,535,314 (-21%)");
    expect(lines).toContain("Growth Rate: +2.90%");
    expect(lines).toContain("Short Supplies: KSH 1,266,460 (~6.0% impact)");
    expect(lines).toContain("Returns: KSH 193,615 (~0.9% impact)");
  });

  it("writes the highlights with both bullets", () => {
    const lines = texts(composeReport(options()).blocks);
    expect(lines).toContain(
      "Week 22 showed a +2.90% growth over Week 21, though still under budget."
    );
    expect(lines).toContain("MTD Revenue is now at 82% of budget with KSH 20,582,907 to go.");

    const bullets = composeReport(options()).blocks.filter((block) => block.type === "bullet");
    expect(bullets).toEqual([
      { type: "bullet", text: "May 25 sales exceeded the historical trend.", level: 0 },
      { type: "bullet", text: "This was likely due to an increase in Parmesan price.", level: 1 },
    ]);
  });

  it("leaves out the Parmesan bullet when the May 25 highlight is off", () => {
    const report = composeReport(
      options({ inputs: { ...inputs, highlightMay25: false, parmesanPriceIncrease: true } })
    );
    expect(report.blocks.some((block) => block.type === "bullet")).toBe(false);
  });

  it("leaves out only the Parmesan bullet when it is off", () => {
    const report = composeReport(options({ inputs: { ...inputs, parmesanPriceIncrease: false } }));
    expect(report.blocks.filter((block) => block.type === "bullet")).toHaveLength(1);
  });

  it("notes a met weekly budget and the first week of the series", () => {
    const firstWeek: ReportInputs = {
      ...inputs,
      weekNumber: 1,
      weeklyBudget: 20000,
      currentWeekRevenue: 25000,
      previousWeekRevenue: 20000,
    };
    expect(texts(composeReport(options({ inputs: firstWeek })).blocks)).toContain(
      "Week 1 showed a +25.00% growth over the previous week, and met its weekly budget."
    );
  });

  it("tabulates the closing scenarios", () => {
    const table = composeReport(options()).blocks.find((block) => block.type === "table");
    expect(table).toEqual({
      type: "table",
      header: ["Scenario", "Estimate", "% of Budget"],
      rows: [
        ["Historical Trend", "89,936,015", "78.9%"],
        ["Linear Extrapolation", "99,857,861", "87.6%"],
        ["Blended Estimate", "93,904,753", "82.4%"],
      ],
    });
  });

  it("appends loaded attachments as tables", () => {
    const marketReturns: SupplementaryResult = {
      status: "loaded",
      fileName: "returns.csv",
      table: {
        columns: ["Item", "Qty"],
        rows: [{ Item: "Brie", Qty: "7" }, { Item: "Feta" }],
      },
    };
    const report = composeReport(options({ marketReturns }));
    expect(report.blocks.slice(-2)).toEqual([
      { type: "heading", text: "Top 10 Market Returns", level: 1 },
      { type: "table", header: ["Item", "Qty"], rows: [["Brie", "7"], ["Feta", ""]] },
    ]);
  });

  it("embeds a failed attachment without disturbing the other sections", () => {
    const shortSupply: SupplementaryResult = {
      status: "failed",
      fileName: "notes.txt",
      message: 'Unsupported file type for "notes.txt". Upload an .xlsx, .xls or .csv file.',
    };
    const plain = composeReport(options());
    const report = composeReport(options({ shortSupply }));

    expect(report.blocks.slice(0, plain.blocks.length)).toEqual(plain.blocks);
    expect(report.blocks.slice(plain.blocks.length)).toEqual([
      { type: "heading", text: "Top 10 Short Supplied Items", level: 1 },
      {
        type: "paragraph",
        text: 'Unsupported file type for "notes.txt". Upload an .xlsx, .xls or .csv file.',
      },
    ]);
  });

  it("freezes the composed report", () => {
    const report = composeReport(options());
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.blocks)).toBe(true);
  });
});

describe("reportToText", () => {
  it("renders the blocks as plain text lines", () => {
    const lines = reportToText(composeReport(options())).split("\n");
    expect(lines.slice(0, 6)).toEqual([
      "WEEK 22 SALES REPORT",
      "Report date: 2025-05-26",
      "Generated on: 2025-05-26 09:05",
      "",
      "MTD Sales Revenue Update",
      "Budget: KSH 113,998,325",
    ]);
    expect(lines).toContain("• May 25 sales exceeded the historical trend.");
    expect(lines).toContain("    • This was likely due to an increase in Parmesan price.");
    expect(lines.slice(-4)).toEqual([
      "Scenario | Estimate | % of Budget",
      "Historical Trend | 89,936,015 | 78.9%",
      "Linear Extrapolation | 99,857,861 | 87.6%",
      "Blended Estimate | 93,904,753 | 82.4%",
    ]);
  });
});
