import { v4 as uuidv4 } from "uuid";
import type { ReportDraft } from "@/lib/inputs";
import type { ReportInputs, SupplementaryKind } from "@/types/report";

/** Anything with a name and readable bytes; a browser `File` qualifies. */
export interface UploadedFile {
  name: string;
  size?: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type SessionAttachments = Record<SupplementaryKind, UploadedFile | null>;

export type ReportSession = {
  id: string;
  draft: ReportDraft | null;
  inputs: ReportInputs | null;
  attachments: SessionAttachments;
  savedAt: Date | null;
};

export type ReportSessionAction =
  | {
      type: "save";
      draft: ReportDraft;
      inputs: ReportInputs;
      attachments: SessionAttachments;
      savedAt: Date;
    }
  | { type: "reset" };

export const emptyAttachments = (): SessionAttachments => ({
  shortSupply: null,
  marketReturns: null,
});

export function createReportSession(): ReportSession {
  return {
    id: uuidv4(),
    draft: null,
    inputs: null,
    attachments: emptyAttachments(),
    savedAt: null,
  };
}

// Saves replace every stored value at once; there are no field-level updates.
export function reportSessionReducer(
  session: ReportSession,
  action: ReportSessionAction
): ReportSession {
  switch (action.type) {
    case "save":
      return {
        id: session.id,
        draft: action.draft,
        inputs: action.inputs,
        attachments: { ...action.attachments },
        savedAt: action.savedAt,
      };
    case "reset":
      return createReportSession();
  }
}
