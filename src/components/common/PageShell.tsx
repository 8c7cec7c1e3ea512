import type { ReactNode } from 'react'
import type { View } from '@/types/view'
import { TopNav } from './TopNav'

interface PageShellProps {
  currentView: View
  onNavigate: (view: View) => void
  title: string
  description?: string
  actions?: ReactNode
  children: ReactNode
}

export function PageShell({ currentView, onNavigate, title, description, actions, children }: PageShellProps) {
  return (
    <div className="min-h-dvh bg-gradient-to-br from-slate-50 via-cyan-50/30 to-blue-50/50 dark:from-slate-950 dark:via-slate-900/20 dark:to-slate-800/30 text-slate-900 dark:text-slate-100">
      <div className="relative max-w-7xl mx-auto px-4 md:px-6 py-4 md:py-6">
        <TopNav currentView={currentView} onNavigate={onNavigate} />

        <header className="flex flex-wrap items-end justify-between gap-4 mb-6">
          <div>
            <h1 className="text-3xl font-bold bg-gradient-to-r from-cyan-600 via-blue-600 to-teal-600 bg-clip-text text-transparent">
              {title}
            </h1>
            {description && (
              <p className="text-slate-600 dark:text-slate-300 max-w-2xl mt-1">{description}</p>
            )}
          </div>
          {actions && <div className="flex items-center gap-2">{actions}</div>}
        </header>

        {children}
      </div>
    </div>
  )
}
