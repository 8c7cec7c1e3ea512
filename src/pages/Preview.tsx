import { Copy, PencilLine } from 'lucide-react'
import { EmptyState } from '@/components/common/EmptyState'
import { PageShell } from '@/components/common/PageShell'
import { ReportPreview } from '@/components/report/ReportPreview'
import { Button } from '@/components/ui/button'
import { useReportPreview } from '@/hooks/useReportPreview'
import { reportToText } from '@/lib/report'
import { handleError, handleSuccess } from '@/lib/toast'
import type { View } from '@/types/view'

interface PreviewProps {
  onNavigate: (view: View) => void
}

export default function Preview({ onNavigate }: PreviewProps) {
  const { report, loadingAttachments } = useReportPreview()

  const handleCopy = () => {
    if (!report) return
    navigator.clipboard
      .writeText(reportToText(report))
      .then(() => handleSuccess('Report text copied'))
      .catch((error: unknown) => handleError(error, 'copy the report text'))
  }

  return (
    <PageShell
      currentView="preview"
      onNavigate={onNavigate}
      title="Report Preview"
      description="The report as it will appear in the generated document."
      actions={
        report && (
          <Button variant="outline" size="sm" onClick={handleCopy}>
            <Copy className="w-4 h-4" />
            Copy text
          </Button>
        )
      }
    >
      {report ? (
        <ReportPreview blocks={report.blocks} loadingAttachments={loadingAttachments} />
      ) : (
        <EmptyState title="Nothing to preview">
          <p className="mb-4">Save the weekly figures first and the report will be composed here.</p>
          <Button size="sm" onClick={() => onNavigate('input')}>
            <PencilLine className="w-4 h-4" />
            Go to Data Input
          </Button>
        </EmptyState>
      )}
    </PageShell>
  )
}
