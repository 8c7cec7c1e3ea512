import { describe, expect, it } from "vitest";
import {
  createDefaultDraft,
  draftFromInputs,
  labelFor,
  parseReportDraft,
  type ReportDraft,
} from "@/lib/inputs";

const draft = (overrides: Partial<ReportDraft> = {}): ReportDraft => ({
  ...createDefaultDraft(new Date(2025, 4, 26)),
  ...overrides,
});

describe("createDefaultDraft", () => {
  it("prefills the configured figures and today's date", () => {
    const result = createDefaultDraft(new Date(2025, 4, 26));
    expect(result.budget).toBe("113998325");
    expect(result.blendedEstimate).toBe("93904753");
    expect(result.weekNumber).toBe("22");
    expect(result.reportDate).toBe("2025-05-26");
    expect(result.highlightMay25).toBe(true);
    expect(result.parmesanPriceIncrease).toBe(true);
  });
});

describe("parseReportDraft", () => {
  it("coerces every field of a complete draft", () => {
    const result = parseReportDraft(draft());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.inputs.budget).toBe(113998325);
    expect(result.inputs.currentWeekRevenue).toBe(20943811);
    expect(result.inputs.weekNumber).toBe(22);
    expect(result.inputs.reportDate).toBe("2025-05-26");
  });

  it("accepts thousands separators and surrounding spaces", () => {
    const result = parseReportDraft(draft({ budget: " 1,234,567 ", returns: "0" }));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.inputs.budget).toBe(1234567);
    expect(result.inputs.returns).toBe(0);
  });

  it("reports one message per invalid field", () => {
    const result = parseReportDraft(
      draft({ budget: "", mtdRevenue: "abc", returns: "-5", weekNumber: "2.5" })
    );
    expect(result).toEqual({
      ok: false,
      errors: {
        budget: "Required",
        mtdRevenue: "Must be a number",
        returns: "Cannot be negative",
        weekNumber: "Must be a whole number",
      },
    });
  });

  it("requires a week number of at least 1", () => {
    expect(parseReportDraft(draft({ weekNumber: "0" }))).toEqual({
      ok: false,
      errors: { weekNumber: "Must be 1 or more" },
    });
  });

  it("requires an ISO date", () => {
    expect(parseReportDraft(draft({ reportDate: "26/05/2025" }))).toEqual({
      ok: false,
      errors: { reportDate: "Pick a date" },
    });
  });

  it("round-trips through draftFromInputs", () => {
    const first = parseReportDraft(draft({ budget: "1,000" }));
    expect(first.ok).toBe(true);
    if (!first.ok) return;
    const again = draftFromInputs(first.inputs);
    expect(again.budget).toBe("1000");
    expect(parseReportDraft(again)).toEqual(first);
  });
});

describe("labelFor", () => {
  it("names money fields and the remaining fields", () => {
    expect(labelFor("blendedEstimate")).toBe("Blended Conservative Estimate");
    expect(labelFor("weekNumber")).toBe("Week Number");
    expect(labelFor("parmesanPriceIncrease")).toBe("Due to Parmesan price increase");
  });
});
