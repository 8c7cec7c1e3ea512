import { useMemo } from 'react'
import { PencilLine } from 'lucide-react'
import { EmptyState } from '@/components/common/EmptyState'
import { PageShell } from '@/components/common/PageShell'
import { MetricCards } from '@/components/dashboard/MetricCards'
import { PeriodComparisonChart } from '@/components/dashboard/PeriodComparisonChart'
import { ScenarioPanel } from '@/components/dashboard/ScenarioPanel'
import { Button } from '@/components/ui/button'
import { useReportSession } from '@/contexts/ReportSessionContext'
import { buildPeriodComparison, calculateMetrics } from '@/lib/metrics'
import { buildScenarioRows } from '@/lib/scenarios'
import type { View } from '@/types/view'

interface DashboardProps {
  onNavigate: (view: View) => void
}

export default function Dashboard({ onNavigate }: DashboardProps) {
  const { session } = useReportSession()
  const { inputs } = session

  const overview = useMemo(() => {
    if (!inputs) return null
    return {
      metrics: calculateMetrics(inputs),
      periods: buildPeriodComparison(inputs),
      scenarios: buildScenarioRows(inputs, inputs.budget),
    }
  }, [inputs])

  return (
    <PageShell
      currentView="dashboard"
      onNavigate={onNavigate}
      title="Performance Dashboard"
      description={inputs ? `Week ${inputs.weekNumber} as of ${inputs.reportDate}` : 'Key sales metrics for the saved week.'}
    >
      {inputs && overview ? (
        <div className="space-y-6">
          <MetricCards inputs={inputs} metrics={overview.metrics} />
          <div className="grid gap-6 lg:grid-cols-2">
            <PeriodComparisonChart data={overview.periods} />
            <ScenarioPanel rows={overview.scenarios} />
          </div>
        </div>
      ) : (
        <EmptyState title="No saved data yet">
          <p className="mb-4">Enter this week's figures and save them to see the dashboard.</p>
          <Button size="sm" onClick={() => onNavigate('input')}>
            <PencilLine className="w-4 h-4" />
            Go to Data Input
          </Button>
        </EmptyState>
      )}
    </PageShell>
  )
}
