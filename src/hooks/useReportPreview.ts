import { useEffect, useMemo, useState } from "react";
import { useReportSession } from "@/contexts/ReportSessionContext";
import { config } from "@/lib/config";
import { buildReport, loadSupplements, type LoadedSupplements } from "@/lib/generate";

const noSupplements: LoadedSupplements = {
  shortSupply: null,
  marketReturns: null,
};

/**
 * Composes the report for the saved session. Attachments are re-read
 * whenever the session is saved again.
 */
export function useReportPreview() {
  const { session } = useReportSession();
  const [supplements, setSupplements] = useState<LoadedSupplements>(noSupplements);
  const [loadingAttachments, setLoadingAttachments] = useState(false);

  useEffect(() => {
    let cancelled = false;
    const { attachments } = session;
    if (!attachments.shortSupply && !attachments.marketReturns) {
      setSupplements(noSupplements);
      setLoadingAttachments(false);
      return;
    }

    setLoadingAttachments(true);
    loadSupplements(attachments)
      .then((loaded) => {
        if (!cancelled) setSupplements(loaded);
      })
      .catch((error: unknown) => {
        console.error("Error reading attachments:", error);
        if (!cancelled) setSupplements(noSupplements);
      })
      .finally(() => {
        if (!cancelled) setLoadingAttachments(false);
      });

    return () => {
      cancelled = true;
    };
  }, [session]);

  const report = useMemo(() => {
    if (!session.inputs) return null;
    return buildReport(
      session.inputs,
      supplements,
      session.savedAt ?? new Date(),
      config.currencyPrefix
    );
  }, [session, supplements]);

  return {
    report,
    loadingAttachments,
    hasAttachments: Boolean(
      session.attachments.shortSupply || session.attachments.marketReturns
    ),
  };
}
