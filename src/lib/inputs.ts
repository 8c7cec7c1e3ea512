import { z } from "zod";
import { defaultInputs } from "@/lib/config";
import type { MoneyField, ReportInputs } from "@/types/report";

export type ReportDraft = Record<MoneyField, string> & {
  highlightMay25: boolean;
  parmesanPriceIncrease: boolean;
  weekNumber: string;
  reportDate: string;
};

export type DraftErrors = Partial<Record<keyof ReportDraft, string>>;

export type MoneyFieldConfig = {
  key: MoneyField;
  label: string;
  group: "performance" | "projection";
};

export const MONEY_FIELDS: MoneyFieldConfig[] = [
  { key: "budget", label: "Monthly Budget", group: "performance" },
  { key: "mtdRevenue", label: "MTD Revenue", group: "performance" },
  { key: "weeklyBudget", label: "Weekly Budget", group: "performance" },
  { key: "currentWeekRevenue", label: "Current Week Revenue", group: "performance" },
  { key: "previousWeekRevenue", label: "Previous Week Revenue", group: "performance" },
  { key: "shortSupplies", label: "Short Supplies", group: "performance" },
  { key: "returns", label: "Returns", group: "performance" },
  { key: "historicalTrend", label: "Historical Trend", group: "projection" },
  { key: "linearExtrapolation", label: "Linear Extrapolation", group: "projection" },
  { key: "blendedEstimate", label: "Blended Conservative Estimate", group: "projection" },
];

const requiredText = z.string().trim().min(1, "Required");

const money = requiredText
  .transform((value) => value.replaceAll(",", ""))
  .pipe(
    z.coerce
      .number({ invalid_type_error: "Must be a number" })
      .finite("Must be a number")
      .nonnegative("Cannot be negative")
  );

export const reportDraftSchema = z.object({
  budget: money,
  mtdRevenue: money,
  weeklyBudget: money,
  currentWeekRevenue: money,
  previousWeekRevenue: money,
  shortSupplies: money,
  returns: money,
  historicalTrend: money,
  linearExtrapolation: money,
  blendedEstimate: money,
  highlightMay25: z.boolean(),
  parmesanPriceIncrease: z.boolean(),
  weekNumber: requiredText.pipe(
    z.coerce
      .number({ invalid_type_error: "Must be a whole number" })
      .int("Must be a whole number")
      .min(1, "Must be 1 or more")
  ),
  reportDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Pick a date")
    .refine((value) => !Number.isNaN(Date.parse(value)), "Pick a valid date"),
});

export type DraftParseResult =
  | { ok: true; inputs: ReportInputs }
  | { ok: false; errors: DraftErrors };

const isDraftKey = (key: unknown): key is keyof ReportDraft =>
  typeof key === "string" && key in reportDraftSchema.shape;

export function parseReportDraft(draft: ReportDraft): DraftParseResult {
  const parsed = reportDraftSchema.safeParse(draft);
  if (parsed.success) {
    return { ok: true, inputs: parsed.data };
  }

  const errors: DraftErrors = {};
  for (const issue of parsed.error.issues) {
    const [key] = issue.path;
    if (isDraftKey(key) && !errors[key]) {
      errors[key] = issue.message;
    }
  }
  return { ok: false, errors };
}

const toIsoDate = (date: Date) =>
  `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, "0")}-${String(
    date.getDate()
  ).padStart(2, "0")}`;

export function draftFromInputs(inputs: ReportInputs): ReportDraft {
  return {
    budget: String(inputs.budget),
    mtdRevenue: String(inputs.mtdRevenue),
    weeklyBudget: String(inputs.weeklyBudget),
    currentWeekRevenue: String(inputs.currentWeekRevenue),
    previousWeekRevenue: String(inputs.previousWeekRevenue),
    shortSupplies: String(inputs.shortSupplies),
    returns: String(inputs.returns),
    historicalTrend: String(inputs.historicalTrend),
    linearExtrapolation: String(inputs.linearExtrapolation),
    blendedEstimate: String(inputs.blendedEstimate),
    highlightMay25: inputs.highlightMay25,
    parmesanPriceIncrease: inputs.parmesanPriceIncrease,
    weekNumber: String(inputs.weekNumber),
    reportDate: inputs.reportDate,
  };
}

export function createDefaultDraft(today: Date = new Date()): ReportDraft {
  return draftFromInputs({ ...defaultInputs, reportDate: toIsoDate(today) });
}

export function labelFor(key: keyof ReportDraft): string {
  const money = MONEY_FIELDS.find((field) => field.key === key);
  if (money) return money.label;
  switch (key) {
    case "weekNumber":
      return "Week Number";
    case "reportDate":
      return "Report Date";
    case "highlightMay25":
      return "May 25 sales exceeded trend";
    case "parmesanPriceIncrease":
      return "Due to Parmesan price increase";
    default:
      return key;
  }
}
