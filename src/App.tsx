import { useState } from 'react'
import { Toaster } from 'sonner'
import DataInput from '@/pages/DataInput'
import Dashboard from '@/pages/Dashboard'
import Preview from '@/pages/Preview'
import Generate from '@/pages/Generate'
import { ErrorBoundary } from '@/components/common/ErrorBoundary'
import { ThemeProvider } from '@/components/common/ThemeProvider'
import { useReportSession } from '@/contexts/ReportSessionContext'
import { ReportSessionProvider } from '@/contexts/ReportSessionProvider'
import type { View } from '@/types/view'

function Views() {
  const { session } = useReportSession()
  const [currentView, setCurrentView] = useState<View>('input')

  switch (currentView) {
    case 'input':
      // a reset hands out a new session id, which remounts the form with defaults
      return <DataInput key={session.id} onNavigate={setCurrentView} />
    case 'dashboard':
      return <Dashboard onNavigate={setCurrentView} />
    case 'preview':
      return <Preview onNavigate={setCurrentView} />
    case 'generate':
      return <Generate onNavigate={setCurrentView} />
  }
}

export default function App() {
  return (
    <ThemeProvider defaultTheme="system" storageKey="sales-report-theme">
      <ReportSessionProvider>
        <ErrorBoundary>
          <Views />
        </ErrorBoundary>
      </ReportSessionProvider>
      <Toaster
        position="top-right"
        expand={true}
        richColors={false}
        closeButton={true}
        theme="system"
      />
    </ThemeProvider>
  )
}
