import { AlertCircle, FileCheck2, FileDown, Loader2 } from 'lucide-react'
import { PageShell } from '@/components/common/PageShell'
import { ReportDownloadButton } from '@/components/report/ReportDownloadButton'
import { Badge } from '@/components/ui/badge'
import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { useReportSession } from '@/contexts/ReportSessionContext'
import { useReportGenerator } from '@/hooks/useReportGenerator'
import { SUPPLEMENTARY_HEADINGS } from '@/lib/report'
import { formatTimestamp } from '@/lib/format'
import type { SupplementaryKind, SupplementaryResult } from '@/types/report'
import type { View } from '@/types/view'

interface GenerateProps {
  onNavigate: (view: View) => void
}

const KINDS: SupplementaryKind[] = ['shortSupply', 'marketReturns']

interface AttachmentStatusProps {
  kind: SupplementaryKind
  attachedName: string | null
  result: SupplementaryResult | null
}

function AttachmentStatus({ kind, attachedName, result }: AttachmentStatusProps) {
  return (
    <li className="flex items-start justify-between gap-3 text-sm">
      <div className="min-w-0">
        <div className="font-medium text-slate-800 dark:text-slate-200">{SUPPLEMENTARY_HEADINGS[kind]}</div>
        {(result || attachedName) && (
          <div className="text-xs text-slate-500 dark:text-slate-400 truncate">
            {result?.status === 'failed' ? result.message : attachedName}
          </div>
        )}
      </div>
      {!attachedName ? (
        <Badge variant="default" className="!bg-slate-200 !text-slate-600 dark:!bg-slate-800 dark:!text-slate-300">
          Not attached
        </Badge>
      ) : !result ? (
        <Badge variant="default">Attached</Badge>
      ) : result.status === 'loaded' ? (
        <Badge variant="success">{result.table.rows.length} rows</Badge>
      ) : (
        <Badge variant="warning">Skipped</Badge>
      )}
    </li>
  )
}

export default function Generate({ onNavigate }: GenerateProps) {
  const { session } = useReportSession()
  const { artifact, generating, error, canGenerate, generate, download } = useReportGenerator()

  return (
    <PageShell
      currentView="generate"
      onNavigate={onNavigate}
      title="Generate Report"
      description="Create the weekly sales report as a PDF document and download it."
    >
      <div className="grid gap-6 lg:grid-cols-2">
        <Card>
          <CardHeader>
            <CardTitle className="flex items-center gap-2">
              <FileDown className="w-5 h-5 text-teal-600" />
              Document
            </CardTitle>
            <CardDescription>
              {canGenerate
                ? 'The report uses the figures and attachments saved on the Data Input page.'
                : 'Save the weekly figures on the Data Input page to enable report generation.'}
            </CardDescription>
          </CardHeader>
          <CardContent className="space-y-4">
            <div className="flex flex-wrap gap-2">
              <Button onClick={() => void generate()} disabled={!canGenerate || generating}>
                {generating ? <Loader2 className="w-4 h-4 animate-spin" /> : <FileCheck2 className="w-4 h-4" />}
                {generating ? 'Generating...' : 'Generate Report'}
              </Button>
              {!canGenerate && (
                <Button variant="outline" onClick={() => onNavigate('input')}>
                  Go to Data Input
                </Button>
              )}
            </div>

            {error && (
              <div className="flex items-start gap-2 rounded-lg border border-red-200 bg-red-50 p-3 text-sm text-red-700 dark:border-red-800 dark:bg-red-900/20 dark:text-red-300">
                <AlertCircle className="w-4 h-4 mt-0.5 flex-shrink-0" />
                <span>{error}</span>
              </div>
            )}

            {artifact && (
              <div className="space-y-2 rounded-lg border border-slate-200 dark:border-slate-700 p-3">
                <div className="text-sm text-slate-600 dark:text-slate-300">
                  {artifact.report.title}, generated {formatTimestamp(artifact.report.generatedAt)}
                </div>
                <ReportDownloadButton filename={artifact.filename} onDownload={download} />
              </div>
            )}
          </CardContent>
        </Card>

        <Card>
          <CardHeader>
            <CardTitle>Attachments</CardTitle>
            <CardDescription>Attachments that cannot be read are reported in their section of the document.</CardDescription>
          </CardHeader>
          <CardContent>
            <ul className="space-y-3">
              {KINDS.map((kind) => (
                <AttachmentStatus
                  key={kind}
                  kind={kind}
                  attachedName={session.attachments[kind]?.name ?? null}
                  result={artifact ? artifact.supplements[kind] : null}
                />
              ))}
            </ul>
          </CardContent>
        </Card>
      </div>
    </PageShell>
  )
}
