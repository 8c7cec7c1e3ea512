import { ClipboardList } from 'lucide-react'
import type { ReactNode } from 'react'

export function EmptyState({ title, children }: { title: string; children: ReactNode }) {
  return (
    <div className="flex flex-col items-center justify-center h-80 rounded-2xl border-2 border-dashed border-slate-200 dark:border-slate-600 bg-slate-50/50 dark:bg-slate-800/20">
      <div className="text-center">
        <ClipboardList className="mx-auto h-12 w-12 text-slate-400 dark:text-slate-500 mb-4" />
        <h3 className="text-lg font-semibold text-slate-900 dark:text-slate-100 mb-2">{title}</h3>
        <div className="text-slate-500 dark:text-slate-400 max-w-sm">{children}</div>
      </div>
    </div>
  )
}
