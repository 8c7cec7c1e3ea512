import { useCallback, useMemo, useReducer, type ReactNode } from 'react'
import { ReportSessionContext } from './ReportSessionContext'
import { createReportSession, reportSessionReducer, type SessionAttachments } from '@/lib/session'
import type { ReportDraft } from '@/lib/inputs'
import type { ReportInputs } from '@/types/report'

interface ReportSessionProviderProps {
  children: ReactNode
}

export function ReportSessionProvider({ children }: ReportSessionProviderProps) {
  const [session, dispatch] = useReducer(reportSessionReducer, undefined, createReportSession)

  const saveSession = useCallback(
    (draft: ReportDraft, inputs: ReportInputs, attachments: SessionAttachments) => {
      dispatch({ type: 'save', draft, inputs, attachments, savedAt: new Date() })
    },
    []
  )

  const resetSession = useCallback(() => {
    dispatch({ type: 'reset' })
  }, [])

  const value = useMemo(
    () => ({ session, saveSession, resetSession }),
    [session, saveSession, resetSession]
  )

  return <ReportSessionContext.Provider value={value}>{children}</ReportSessionContext.Provider>
}
