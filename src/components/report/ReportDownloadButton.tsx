import { Download } from 'lucide-react'
import { Button } from '@/components/ui/button'

export function ReportDownloadButton({ filename, onDownload }: { filename: string | null; onDownload: () => void }) {
  return (
    <div className="flex items-center gap-2">
      <Button
        size="sm"
        onClick={onDownload}
        disabled={!filename}
        className="!bg-teal-600 hover:!bg-teal-700 dark:!bg-teal-500 dark:hover:!bg-teal-600 !text-white"
      >
        <Download className="w-4 h-4" />
        Download PDF
      </Button>
      {filename && <span className="text-xs text-slate-500 dark:text-slate-400 font-mono truncate">{filename}</span>}
    </div>
  )
}
