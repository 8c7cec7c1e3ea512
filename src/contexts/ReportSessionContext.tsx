import { createContext, useContext } from 'react'
import type { ReportDraft } from '@/lib/inputs'
import type { ReportSession, SessionAttachments } from '@/lib/session'
import type { ReportInputs } from '@/types/report'

interface ReportSessionContextType {
  session: ReportSession
  saveSession: (draft: ReportDraft, inputs: ReportInputs, attachments: SessionAttachments) => void
  resetSession: () => void
}

export const ReportSessionContext = createContext<ReportSessionContextType | undefined>(undefined)

export function useReportSession() {
  const context = useContext(ReportSessionContext)
  if (context === undefined) {
    throw new Error('useReportSession must be used within a ReportSessionProvider')
  }
  return context
}
