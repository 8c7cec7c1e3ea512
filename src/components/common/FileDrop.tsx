import { useCallback, useRef, useState, type ChangeEvent, type DragEvent, type MouseEvent, type ReactNode } from 'react'
import { CheckCircle2, Plus, X } from 'lucide-react'
import { Input } from '@/components/ui/input'
import { cn } from '@/lib/utils'
import type { UploadedFile } from '@/lib/session'

type Props = {
  label: string
  file: UploadedFile | null
  onFile: (file: File | null) => void
  accept?: string
  icon?: ReactNode
  description?: string
}

export function FileDrop({ label, file, onFile, accept = '.xlsx,.xls,.csv', icon, description }: Props) {
  const inputRef = useRef<HTMLInputElement | null>(null)
  const [dragOver, setDragOver] = useState(false)

  const onChange = useCallback((e: ChangeEvent<HTMLInputElement>) => {
    onFile(e.target.files?.[0] ?? null)
  }, [onFile])

  // Any dropped file is kept; the loader reports unsupported types in the report.
  const handleDrop = useCallback((e: DragEvent) => {
    e.preventDefault()
    setDragOver(false)
    const dropped = e.dataTransfer.files?.[0] ?? null
    if (dropped) onFile(dropped)
  }, [onFile])

  const handleRemoveFile = useCallback((e: MouseEvent) => {
    e.preventDefault()
    e.stopPropagation()
    onFile(null)
    // Clear the input value to allow re-selecting the same file
    if (inputRef.current) {
      inputRef.current.value = ''
    }
  }, [onFile])

  return (
    <div
      className={cn(
        'relative rounded-xl border-2 border-dashed p-4 transition-all duration-200 cursor-pointer group',
        dragOver
          ? 'border-cyan-400 bg-cyan-50/50 dark:bg-cyan-950/20'
          : file
          ? 'border-teal-300 bg-teal-50/50 dark:bg-teal-950/20'
          : 'border-slate-200 dark:border-slate-700 hover:border-slate-300 dark:hover:border-slate-600 bg-slate-50/30 dark:bg-slate-800/30'
      )}
      onDragOver={(e) => { e.preventDefault(); setDragOver(true) }}
      onDragLeave={() => setDragOver(false)}
      onDrop={handleDrop}
      onClick={() => inputRef.current?.click()}
    >
      <div className="flex items-center gap-3">
        {icon && <div className="text-2xl flex-shrink-0">{icon}</div>}
        <div className="flex-1 min-w-0">
          <div className="font-medium text-slate-900 dark:text-slate-100 mb-1">{label}</div>
          {description && (
            <div className="text-xs text-slate-500 dark:text-slate-400 mb-2">{description}</div>
          )}
          {file ? (
            <div className="flex items-center gap-2 text-sm">
              <CheckCircle2 className="w-4 h-4 text-teal-600" />
              <span className="text-teal-700 dark:text-teal-300 font-medium truncate" title={file.name}>
                {file.name}
              </span>
              {file.size !== undefined && (
                <span className="text-slate-500 text-xs">({(file.size / 1024).toFixed(1)} KB)</span>
              )}
            </div>
          ) : (
            <div className="text-sm text-slate-500 dark:text-slate-400">
              Click to browse or drag & drop an Excel or CSV file
            </div>
          )}
        </div>
        <div className="flex-shrink-0">
          {file ? (
            <button
              onClick={handleRemoveFile}
              className="w-8 h-8 rounded-lg flex items-center justify-center !bg-red-100 dark:!bg-red-900/30 hover:!bg-red-200 dark:hover:!bg-red-900/50 transition-colors"
              title="Remove file"
              type="button"
            >
              <X className="w-4 h-4 text-red-600 dark:text-red-400" />
            </button>
          ) : (
            <div className="w-8 h-8 bg-slate-100 dark:bg-slate-800 rounded-lg flex items-center justify-center group-hover:bg-slate-200 dark:group-hover:bg-slate-700 transition-colors">
              <Plus className="w-4 h-4 text-slate-500 dark:text-slate-400" />
            </div>
          )}
        </div>
      </div>

      <Input ref={inputRef} type="file" accept={accept} onChange={onChange} className="hidden" />
    </div>
  )
}
