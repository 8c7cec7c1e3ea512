import { describe, expect, it } from "vitest";
import { defaultInputs } from "@/lib/config";
import { ReportError } from "@/lib/errors";
import { failedSupplements, generateReportArtifact, loadSupplements } from "@/lib/generate";
import { emptyAttachments } from "@/lib/session";
import { fakeFile } from "@/test/fakeFile";

const inputs = { ...defaultInputs, reportDate: "2025-05-26" };
const generatedAt = new Date(2025, 4, 26, 9, 5);

describe("generateReportArtifact", () => {
  it("refuses to generate before inputs are saved", async () => {
    const attempt = generateReportArtifact({
      inputs: null,
      attachments: emptyAttachments(),
      generatedAt,
      currency: "KSH",
      appTitle: "Weekly Sales Report",
    });
    await expect(attempt).rejects.toBeInstanceOf(ReportError);
    await expect(attempt).rejects.toMatchObject({ code: "MISSING_INPUTS" });
  });

  it("builds the report, the PDF bytes and the file name", async () => {
    const artifact = await generateReportArtifact({
      inputs,
      attachments: {
        shortSupply: fakeFile("short-supply.csv", "Item,Value\nParmesan,120000\n"),
        marketReturns: fakeFile("returns.txt", "Feta"),
      },
      generatedAt,
      currency: "KSH",
      appTitle: "Weekly Sales Report",
    });

    expect(artifact.filename).toBe("Week22_Sales_Report_20250526_0905.pdf");
    expect(artifact.report.title).toBe("Week 22 Sales Report");
    expect(artifact.bytes.byteLength).toBeGreaterThan(0);
    expect(artifact.supplements.shortSupply?.status).toBe("loaded");
    expect(failedSupplements(artifact.supplements)).toEqual([
      {
        status: "failed",
        fileName: "returns.txt",
        message: 'Unsupported file type for "returns.txt". Upload an .xlsx, .xls or .csv file.',
      },
    ]);
  });
});

describe("loadSupplements", () => {
  it("skips attachments that were not provided", async () => {
    expect(await loadSupplements(emptyAttachments())).toEqual({
      shortSupply: null,
      marketReturns: null,
    });
  });
});
