import { useState } from 'react'
import { RotateCcw, Save } from 'lucide-react'
import { PageShell } from '@/components/common/PageShell'
import { AttachmentPanel } from '@/components/input/AttachmentPanel'
import { MoneyInput } from '@/components/input/MoneyInput'
import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Switch } from '@/components/ui/switch'
import { useReportSession } from '@/contexts/ReportSessionContext'
import {
  MONEY_FIELDS,
  createDefaultDraft,
  labelFor,
  parseReportDraft,
  type DraftErrors,
  type MoneyFieldConfig,
  type ReportDraft,
} from '@/lib/inputs'
import type { SessionAttachments } from '@/lib/session'
import { handleSuccess, handleWarning } from '@/lib/toast'
import type { View } from '@/types/view'

interface DataInputProps {
  onNavigate: (view: View) => void
}

export default function DataInput({ onNavigate }: DataInputProps) {
  const { session, saveSession, resetSession } = useReportSession()
  const [draft, setDraft] = useState<ReportDraft>(() => session.draft ?? createDefaultDraft())
  const [attachments, setAttachments] = useState<SessionAttachments>(session.attachments)
  const [errors, setErrors] = useState<DraftErrors>({})

  const update = <K extends keyof ReportDraft>(key: K, value: ReportDraft[K]) => {
    setDraft((current) => ({ ...current, [key]: value }))
  }

  const handleSave = () => {
    const parsed = parseReportDraft(draft)
    if (!parsed.ok) {
      setErrors(parsed.errors)
      const fields = Object.keys(parsed.errors).filter((key): key is keyof ReportDraft => key in draft)
      handleWarning('Some fields need attention', fields.map(labelFor).join(', '))
      return
    }

    setErrors({})
    saveSession(draft, parsed.inputs, attachments)
    handleSuccess('Report data saved', 'saved the weekly figures')
  }

  const renderMoneyFields = (fields: MoneyFieldConfig[]) =>
    fields.map((field) => (
      <MoneyInput
        key={field.key}
        id={field.key}
        label={field.label}
        value={draft[field.key]}
        error={errors[field.key]}
        onChange={(value) => update(field.key, value)}
      />
    ))

  return (
    <PageShell
      currentView="input"
      onNavigate={onNavigate}
      title="Weekly Sales Data"
      description="Enter the month-to-date and weekly figures, then save them to update the dashboard and the report."
      actions={
        <>
          <Button variant="outline" size="sm" onClick={resetSession}>
            <RotateCcw className="w-4 h-4" />
            Reset
          </Button>
          <Button size="sm" onClick={handleSave}>
            <Save className="w-4 h-4" />
            Save
          </Button>
        </>
      }
    >
      <div className="grid gap-6 lg:grid-cols-3">
        <div className="space-y-6 lg:col-span-2">
          <Card>
            <CardHeader>
              <CardTitle>MTD & Weekly Performance</CardTitle>
              <CardDescription>Budget and actual revenue for the month and the current week.</CardDescription>
            </CardHeader>
            <CardContent className="grid gap-4 sm:grid-cols-2">
              {renderMoneyFields(MONEY_FIELDS.filter((field) => field.group === 'performance'))}
            </CardContent>
          </Card>

          <Card>
            <CardHeader>
              <CardTitle>Revenue Projections</CardTitle>
              <CardDescription>Closing estimates for the month from each forecasting method.</CardDescription>
            </CardHeader>
            <CardContent className="grid gap-4 sm:grid-cols-3">
              {renderMoneyFields(MONEY_FIELDS.filter((field) => field.group === 'projection'))}
            </CardContent>
          </Card>
        </div>

        <div className="space-y-6">
          <Card>
            <CardHeader>
              <CardTitle>Report Details</CardTitle>
            </CardHeader>
            <CardContent className="space-y-4">
              <div className="space-y-1.5">
                <Label htmlFor="weekNumber">{labelFor('weekNumber')}</Label>
                <Input
                  id="weekNumber"
                  type="number"
                  min={1}
                  step={1}
                  value={draft.weekNumber}
                  aria-invalid={Boolean(errors.weekNumber)}
                  onChange={(e) => update('weekNumber', e.target.value)}
                />
                {errors.weekNumber && <p className="text-xs text-red-600 dark:text-red-400">{errors.weekNumber}</p>}
              </div>
              <div className="space-y-1.5">
                <Label htmlFor="reportDate">{labelFor('reportDate')}</Label>
                <Input
                  id="reportDate"
                  type="date"
                  value={draft.reportDate}
                  aria-invalid={Boolean(errors.reportDate)}
                  onChange={(e) => update('reportDate', e.target.value)}
                />
                {errors.reportDate && <p className="text-xs text-red-600 dark:text-red-400">{errors.reportDate}</p>}
              </div>
              <div className="flex items-center justify-between gap-3">
                <Label htmlFor="highlightMay25">{labelFor('highlightMay25')}</Label>
                <Switch
                  id="highlightMay25"
                  checked={draft.highlightMay25}
                  onCheckedChange={(checked) => update('highlightMay25', checked)}
                />
              </div>
              <div className="flex items-center justify-between gap-3">
                <Label htmlFor="parmesanPriceIncrease">{labelFor('parmesanPriceIncrease')}</Label>
                <Switch
                  id="parmesanPriceIncrease"
                  checked={draft.parmesanPriceIncrease}
                  disabled={!draft.highlightMay25}
                  onCheckedChange={(checked) => update('parmesanPriceIncrease', checked)}
                />
              </div>
            </CardContent>
          </Card>

          <AttachmentPanel
            attachments={attachments}
            onChange={(kind, file) => setAttachments((current) => ({ ...current, [kind]: file }))}
          />

          {session.savedAt && (
            <p className="text-xs text-slate-500 dark:text-slate-400 text-right">
              Last saved {session.savedAt.toLocaleTimeString([], { hour: '2-digit', minute: '2-digit' })}
            </p>
          )}
        </div>
      </div>
    </PageShell>
  )
}
