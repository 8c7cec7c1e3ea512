import { AlertTriangle, ArrowDownRight, ArrowUpRight, PackageX, Target, TrendingUp, Wallet } from 'lucide-react'
import type { ReactNode } from 'react'
import { Badge } from '@/components/ui/badge'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { config } from '@/lib/config'
import { formatCurrency, formatPercent } from '@/lib/format'
import type { DerivedMetrics, ReportInputs } from '@/types/report'

type MetricCard = {
  title: string
  value: string
  description: string
  icon: ReactNode
  color: string
  tone?: 'good' | 'bad'
}

export function MetricCards({ inputs, metrics }: { inputs: ReportInputs; metrics: DerivedMetrics }) {
  const money = (value: number) => formatCurrency(value, config.currencyPrefix)
  const aheadOfWeek = metrics.weeklyVariance >= 0

  const items: MetricCard[] = [
    {
      title: 'Achievement vs Budget',
      value: formatPercent(metrics.achievementPct, 1),
      description: `${money(inputs.mtdRevenue)} of ${money(inputs.budget)}`,
      icon: <Target className="w-5 h-5 text-blue-600" />,
      color: 'from-blue-500 to-cyan-500',
    },
    {
      title: 'Revenue Gap',
      value: money(metrics.revenueGap),
      description: metrics.revenueGap > 0 ? 'Still to go this month' : 'Budget exceeded',
      icon: <Wallet className="w-5 h-5 text-teal-600" />,
      color: 'from-teal-500 to-green-500',
      tone: metrics.revenueGap > 0 ? 'bad' : 'good',
    },
    {
      title: 'Weekly Variance',
      value: money(metrics.weeklyVariance),
      description: `${formatPercent(metrics.weeklyVariancePct, 0, true)} vs weekly budget`,
      icon: aheadOfWeek ? <ArrowUpRight className="w-5 h-5 text-green-600" /> : <ArrowDownRight className="w-5 h-5 text-red-600" />,
      color: aheadOfWeek ? 'from-green-500 to-emerald-500' : 'from-red-500 to-pink-500',
      tone: aheadOfWeek ? 'good' : 'bad',
    },
    {
      title: 'Week-on-Week Growth',
      value: formatPercent(metrics.growthRate, 2, true),
      description: `vs ${money(inputs.previousWeekRevenue)} last week`,
      icon: <TrendingUp className="w-5 h-5 text-cyan-600" />,
      color: 'from-cyan-500 to-blue-500',
      tone: metrics.growthRate >= 0 ? 'good' : 'bad',
    },
    {
      title: 'Closing Estimate',
      value: formatPercent(metrics.closingPct, 1),
      description: `${money(inputs.blendedEstimate)} blended estimate`,
      icon: <Target className="w-5 h-5 text-indigo-600" />,
      color: 'from-indigo-500 to-blue-500',
    },
    {
      title: 'Short Supply Impact',
      value: formatPercent(metrics.shortSupplyImpactPct, 1),
      description: `${money(inputs.shortSupplies)} short supplied`,
      icon: <AlertTriangle className="w-5 h-5 text-orange-600" />,
      color: 'from-orange-500 to-yellow-500',
    },
    {
      title: 'Returns Impact',
      value: formatPercent(metrics.returnsImpactPct, 1),
      description: `${money(inputs.returns)} returned`,
      icon: <PackageX className="w-5 h-5 text-rose-600" />,
      color: 'from-rose-500 to-red-500',
    },
  ]

  return (
    <div className="grid grid-cols-2 lg:grid-cols-4 gap-3 sm:gap-4">
      {items.map((item) => (
        <Card key={item.title} className="relative overflow-hidden border-0 shadow-lg hover:shadow-xl transition-all duration-300 group">
          <div className={`absolute inset-0 bg-gradient-to-br ${item.color} opacity-5 group-hover:opacity-10 transition-opacity`}></div>
          <CardHeader className="pb-2 sm:pb-3 relative">
            <div className="flex items-center gap-2 sm:gap-3 min-w-0">
              <div className="flex-shrink-0">{item.icon}</div>
              <CardTitle className="text-xs sm:text-sm font-medium text-slate-600 dark:text-slate-400 truncate">
                {item.title}
              </CardTitle>
              {item.tone && (
                <Badge variant={item.tone === 'good' ? 'success' : 'destructive'} className="ml-auto">
                  {item.tone === 'good' ? 'On track' : 'Behind'}
                </Badge>
              )}
            </div>
          </CardHeader>
          <CardContent className="pt-0 relative">
            <div className="text-xl sm:text-2xl font-bold text-slate-900 dark:text-slate-100 break-words">
              {item.value}
            </div>
            <p className="text-xs text-slate-500 dark:text-slate-500 mt-1 truncate">{item.description}</p>
          </CardContent>
        </Card>
      ))}
    </div>
  )
}
