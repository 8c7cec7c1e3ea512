import { BarChart3, FileDown, FileText, PencilLine } from 'lucide-react'
import type { ReactNode } from 'react'
import { Button } from '@/components/ui/button'
import { config } from '@/lib/config'
import { cn } from '@/lib/utils'
import type { View } from '@/types/view'
import { ThemeToggle } from './ThemeToggle'

interface TopNavProps {
  currentView: View
  onNavigate: (view: View) => void
}

const NAV_ITEMS: { view: View; label: string; icon: ReactNode }[] = [
  { view: 'input', label: 'Data Input', icon: <PencilLine className="w-4 h-4" /> },
  { view: 'dashboard', label: 'Dashboard', icon: <BarChart3 className="w-4 h-4" /> },
  { view: 'preview', label: 'Preview', icon: <FileText className="w-4 h-4" /> },
  { view: 'generate', label: 'Generate', icon: <FileDown className="w-4 h-4" /> },
]

export function TopNav({ currentView, onNavigate }: TopNavProps) {
  return (
    <nav className="flex flex-wrap items-center justify-between gap-3 py-4 mb-6">
      <div className="flex items-center gap-3">
        <div className="flex items-center justify-center w-8 h-8 rounded-lg bg-gradient-to-br from-cyan-500 to-teal-600">
          <BarChart3 className="w-4 h-4 text-white" />
        </div>
        <div className="font-bold text-xl bg-gradient-to-r from-slate-900 to-slate-600 dark:from-slate-100 dark:to-slate-300 bg-clip-text text-transparent">
          {config.appTitle}
        </div>
      </div>

      <div className="flex items-center gap-1">
        {NAV_ITEMS.map((item) => (
          <Button
            key={item.view}
            onClick={() => onNavigate(item.view)}
            variant="ghost"
            size="sm"
            aria-current={currentView === item.view ? 'page' : undefined}
            className={cn(
              'rounded-lg !bg-white !text-slate-700 !border !border-slate-300 hover:!bg-slate-100 dark:!bg-transparent dark:!text-slate-400 dark:hover:!bg-slate-800 dark:!border-slate-700',
              currentView === item.view &&
                '!bg-blue-50 !text-blue-700 !border-blue-200 font-semibold dark:!bg-blue-900/30 dark:!text-blue-200 dark:!border-blue-800'
            )}
          >
            {item.icon}
            <span className="hidden sm:inline">{item.label}</span>
          </Button>
        ))}

        <div className="ml-2 pl-2 border-l border-slate-200 dark:border-slate-700">
          <ThemeToggle />
        </div>
      </div>
    </nav>
  )
}
