import { calculateMetrics } from "@/lib/metrics";
import { ReportError, describeError } from "@/lib/errors";
import { buildReportFilename, renderReportPdf } from "@/lib/pdf";
import { composeReport } from "@/lib/report";
import { buildScenarioRows } from "@/lib/scenarios";
import type { SessionAttachments } from "@/lib/session";
import { loadSupplementaryTable } from "@/lib/supplementary";
import type {
  GeneratedReport,
  ReportInputs,
  SupplementaryKind,
  SupplementaryResult,
} from "@/types/report";

export type LoadedSupplements = Record<SupplementaryKind, SupplementaryResult | null>;

export type ReportArtifact = {
  report: GeneratedReport;
  filename: string;
  bytes: ArrayBuffer;
  supplements: LoadedSupplements;
};

export async function loadSupplements(
  attachments: SessionAttachments
): Promise<LoadedSupplements> {
  const [shortSupply, marketReturns] = await Promise.all([
    loadSupplementaryTable(attachments.shortSupply),
    loadSupplementaryTable(attachments.marketReturns),
  ]);
  return { shortSupply, marketReturns };
}

export function buildReport(
  inputs: ReportInputs,
  supplements: LoadedSupplements,
  generatedAt: Date,
  currency: string
): GeneratedReport {
  return composeReport({
    inputs,
    metrics: calculateMetrics(inputs),
    scenarios: buildScenarioRows(inputs, inputs.budget),
    shortSupply: supplements.shortSupply,
    marketReturns: supplements.marketReturns,
    generatedAt,
    currency,
  });
}

export type GenerateReportOptions = {
  inputs: ReportInputs | null;
  attachments: SessionAttachments;
  generatedAt: Date;
  currency: string;
  appTitle: string;
};

export async function generateReportArtifact({
  inputs,
  attachments,
  generatedAt,
  currency,
  appTitle,
}: GenerateReportOptions): Promise<ReportArtifact> {
  if (!inputs) {
    throw new ReportError(
      "MISSING_INPUTS",
      "Enter and save the report data first",
      "Open Data Input, fill in every field and press Save."
    );
  }

  const supplements = await loadSupplements(attachments);
  const report = buildReport(inputs, supplements, generatedAt, currency);

  let bytes: ArrayBuffer;
  try {
    bytes = renderReportPdf(report, appTitle);
  } catch (error) {
    throw new ReportError("RENDER_FAILED", "Could not create the PDF document", describeError(error));
  }

  return {
    report,
    filename: buildReportFilename(inputs.weekNumber, generatedAt),
    bytes,
    supplements,
  };
}

export function failedSupplements(
  supplements: LoadedSupplements
): Extract<SupplementaryResult, { status: "failed" }>[] {
  return [supplements.shortSupply, supplements.marketReturns].filter(
    (result): result is Extract<SupplementaryResult, { status: "failed" }> =>
      result?.status === "failed"
  );
}
