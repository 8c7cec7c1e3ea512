import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { config } from '@/lib/config'
import { formatCurrency, formatNumber } from '@/lib/format'
import type { PeriodComparison } from '@/lib/metrics'

export function PeriodComparisonChart({ data }: { data: PeriodComparison[] }) {
  return (
    <Card>
      <CardHeader>
        <CardTitle>Budget vs Actual</CardTitle>
      </CardHeader>
      <CardContent>
        <div className="h-80">
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={data}>
              <CartesianGrid strokeDasharray="3 3" className="stroke-slate-200 dark:stroke-slate-700" />
              <XAxis dataKey="period" className="text-slate-600 dark:text-slate-400" />
              <YAxis
                className="text-slate-600 dark:text-slate-400"
                width={90}
                tickFormatter={(value: number) => formatNumber(value / 1_000_000, 1) + 'M'}
              />
              <Tooltip
                contentStyle={{
                  backgroundColor: 'rgb(248 250 252)',
                  border: '1px solid rgb(226 232 240)',
                  borderRadius: '0.5rem',
                }}
                formatter={(value) => formatCurrency(Number(value), config.currencyPrefix)}
              />
              <Legend />
              <Bar dataKey="budget" name="Budget" fill="rgb(148 163 184)" radius={[4, 4, 0, 0]} />
              <Bar dataKey="actual" name="Actual" fill="rgb(13 148 136)" radius={[4, 4, 0, 0]} />
            </BarChart>
          </ResponsiveContainer>
        </div>
      </CardContent>
    </Card>
  )
}
