import { describe, expect, it } from "vitest";
import { createDefaultDraft } from "@/lib/inputs";
import {
  createReportSession,
  emptyAttachments,
  reportSessionReducer,
  type UploadedFile,
} from "@/lib/session";
import type { ReportInputs } from "@/types/report";

const inputs: ReportInputs = {
  budget: 1000,
  mtdRevenue: 500,
  weeklyBudget: 250,
  currentWeekRevenue: 200,
  previousWeekRevenue: 100,
  shortSupplies: 10,
  returns: 5,
  historicalTrend: 900,
  linearExtrapolation: 1100,
  blendedEstimate: 1000,
  highlightMay25: true,
  parmesanPriceIncrease: false,
  weekNumber: 4,
  reportDate: "2025-05-26",
};

const file: UploadedFile = {
  name: "short-supply.csv",
  arrayBuffer: async () => new ArrayBuffer(0),
};

describe("createReportSession", () => {
  it("starts empty", () => {
    const session = createReportSession();
    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(session.draft).toBeNull();
    expect(session.inputs).toBeNull();
    expect(session.savedAt).toBeNull();
    expect(session.attachments).toEqual({ shortSupply: null, marketReturns: null });
  });
});

describe("reportSessionReducer", () => {
  it("replaces every stored value on save and keeps the session id", () => {
    const initial = createReportSession();
    const draft = createDefaultDraft(new Date(2025, 4, 26));
    const savedAt = new Date(2025, 4, 26, 10, 0);
    const attachments = { ...emptyAttachments(), shortSupply: file };

    const saved = reportSessionReducer(initial, {
      type: "save",
      draft,
      inputs,
      attachments,
      savedAt,
    });

    expect(saved).toEqual({ id: initial.id, draft, inputs, attachments, savedAt });
    expect(saved.attachments).not.toBe(attachments);
  });

  it("drops attachments that are no longer part of the save", () => {
    const withFile = reportSessionReducer(createReportSession(), {
      type: "save",
      draft: createDefaultDraft(),
      inputs,
      attachments: { shortSupply: file, marketReturns: file },
      savedAt: new Date(),
    });
    const next = reportSessionReducer(withFile, {
      type: "save",
      draft: createDefaultDraft(),
      inputs,
      attachments: emptyAttachments(),
      savedAt: new Date(),
    });
    expect(next.attachments).toEqual({ shortSupply: null, marketReturns: null });
  });

  it("starts a new session on reset", () => {
    const saved = reportSessionReducer(createReportSession(), {
      type: "save",
      draft: createDefaultDraft(),
      inputs,
      attachments: emptyAttachments(),
      savedAt: new Date(),
    });
    const reset = reportSessionReducer(saved, { type: "reset" });
    expect(reset.id).not.toBe(saved.id);
    expect(reset.inputs).toBeNull();
    expect(reset.draft).toBeNull();
    expect(reset.savedAt).toBeNull();
  });
});
