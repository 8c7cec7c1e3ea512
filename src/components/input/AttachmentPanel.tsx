import { FileSpreadsheet, PackageX, UploadCloud } from 'lucide-react'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { FileDrop } from '@/components/common/FileDrop'
import type { SessionAttachments } from '@/lib/session'
import type { SupplementaryKind } from '@/types/report'

interface AttachmentPanelProps {
  attachments: SessionAttachments
  onChange: (kind: SupplementaryKind, file: File | null) => void
}

export function AttachmentPanel({ attachments, onChange }: AttachmentPanelProps) {
  const fileCount = Object.values(attachments).filter(Boolean).length

  return (
    <Card className="shadow-sm border bg-white/70 dark:bg-slate-900/70">
      <CardHeader className="pb-4">
        <div className="flex items-center gap-3">
          <div className="flex items-center justify-center w-8 h-8 bg-gradient-to-br from-cyan-500 to-teal-600 rounded-lg">
            <UploadCloud className="w-4 h-4 text-white" />
          </div>
          <div>
            <CardTitle className="text-base font-semibold">Supplementary Data</CardTitle>
            <p className="text-xs text-slate-600 dark:text-slate-400 mt-1">
              {fileCount > 0 ? `${fileCount} of 2 files attached` : 'Optional: attach the weekly top 10 lists'}
            </p>
          </div>
        </div>
      </CardHeader>
      <CardContent className="space-y-3">
        <FileDrop
          label="Top 10 Short Supplied Items"
          file={attachments.shortSupply}
          onFile={(f) => onChange('shortSupply', f)}
          icon={<FileSpreadsheet className="w-4 h-4" />}
          description="Excel (.xlsx, .xls) or CSV with one row per item"
        />
        <FileDrop
          label="Top 10 Market Returns"
          file={attachments.marketReturns}
          onFile={(f) => onChange('marketReturns', f)}
          icon={<PackageX className="w-4 h-4" />}
          description="Excel (.xlsx, .xls) or CSV with one row per returned item"
        />
      </CardContent>
    </Card>
  )
}
