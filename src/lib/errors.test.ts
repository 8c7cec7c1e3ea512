import { describe, expect, it } from "vitest";
import { ReportError, describeError, isReportError } from "@/lib/errors";

describe("ReportError", () => {
  it("carries a code and details", () => {
    const error = new ReportError("RENDER_FAILED", "Could not create the PDF document", "out of memory");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ReportError");
    expect(error.code).toBe("RENDER_FAILED");
    expect(error.details).toBe("out of memory");
    expect(isReportError(error)).toBe(true);
    expect(isReportError(new Error("plain"))).toBe(false);
  });
});

describe("describeError", () => {
  it("uses the message of errors and strings", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("bad input")).toBe("bad input");
  });

  it("falls back for anything else", () => {
    expect(describeError({ status: 500 })).toBe("Unknown error");
    expect(describeError(new Error(""), "Failed")).toBe("Failed");
  });
});
