import { useCallback, useEffect, useState } from "react";
import { toast } from "sonner";
import { useReportSession } from "@/contexts/ReportSessionContext";
import { config } from "@/lib/config";
import { downloadBytes } from "@/lib/download";
import { describeError } from "@/lib/errors";
import {
  failedSupplements,
  generateReportArtifact,
  type ReportArtifact,
} from "@/lib/generate";
import { handleError, handleSuccess, showToast } from "@/lib/toast";

export function useReportGenerator() {
  const { session } = useReportSession();
  const [artifact, setArtifact] = useState<ReportArtifact | null>(null);
  const [generating, setGenerating] = useState(false);
  const [error, setError] = useState<string | null>(null);

  // A download always matches the data currently saved in the session.
  useEffect(() => {
    setArtifact(null);
    setError(null);
  }, [session]);

  const generate = useCallback(async () => {
    if (!session.inputs) {
      const errorMsg = "Enter and save the report data before generating.";
      setError(errorMsg);
      showToast.warning("Missing inputs", {
        description: errorMsg,
        duration: 5000,
      });
      return;
    }

    setGenerating(true);
    setError(null);
    setArtifact(null);

    const loadingToast = showToast.loading("Generating report...");

    try {
      const result = await generateReportArtifact({
        inputs: session.inputs,
        attachments: session.attachments,
        generatedAt: new Date(),
        currency: config.currencyPrefix,
        appTitle: config.appTitle,
      });

      setArtifact(result);
      toast.dismiss(loadingToast);
      handleSuccess("Report generated and ready to download!", "composed the report");

      const failures = failedSupplements(result.supplements);
      if (failures.length > 0) {
        showToast.warning("Some attachments could not be read", {
          description: failures.map((failure) => failure.message).join(" "),
          duration: 8000,
        });
      }
    } catch (e) {
      toast.dismiss(loadingToast);
      console.error("Error generating report:", e);
      setError(describeError(e, "Failed to generate report"));
      handleError(e, "generate the report");
    } finally {
      setGenerating(false);
    }
  }, [session]);

  const download = useCallback(() => {
    if (!artifact) return;
    downloadBytes(artifact.filename, artifact.bytes);
  }, [artifact]);

  return {
    artifact,
    generating,
    error,
    canGenerate: session.inputs !== null,
    generate,
    download,
  };
}
