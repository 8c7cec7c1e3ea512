import { useState } from 'react'
import { Bar, BarChart, CartesianGrid, ReferenceLine, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import { Button } from '@/components/ui/button'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import { config } from '@/lib/config'
import { formatCurrency, formatPercent } from '@/lib/format'
import type { ScenarioRow } from '@/types/report'

export function ScenarioPanel({ rows }: { rows: ScenarioRow[] }) {
  const [viewMode, setViewMode] = useState<'chart' | 'table'>('chart')

  return (
    <Card>
      <CardHeader className="flex-row items-center justify-between space-y-0">
        <CardTitle>Closing Estimates</CardTitle>
        <div className="flex gap-2">
          <Button variant={viewMode === 'chart' ? 'default' : 'outline'} size="sm" onClick={() => setViewMode('chart')}>
            Chart
          </Button>
          <Button variant={viewMode === 'table' ? 'default' : 'outline'} size="sm" onClick={() => setViewMode('table')}>
            Table
          </Button>
        </div>
      </CardHeader>
      <CardContent>
        {viewMode === 'chart' ? (
          <div className="h-80">
            <ResponsiveContainer width="100%" height="100%">
              <BarChart data={rows}>
                <CartesianGrid strokeDasharray="3 3" className="stroke-slate-200 dark:stroke-slate-700" />
                <XAxis dataKey="label" className="text-slate-600 dark:text-slate-400" />
                <YAxis
                  className="text-slate-600 dark:text-slate-400"
                  tickFormatter={(value: number) => `${value}%`}
                  domain={[0, (max: number) => Math.max(110, Math.ceil(max / 10) * 10)]}
                />
                <Tooltip
                  contentStyle={{
                    backgroundColor: 'rgb(248 250 252)',
                    border: '1px solid rgb(226 232 240)',
                    borderRadius: '0.5rem',
                  }}
                  formatter={(value) => [formatPercent(Number(value), 1), '% of Budget']}
                />
                <ReferenceLine y={100} stroke="rgb(239 68 68)" strokeDasharray="6 3" label="Budget" />
                <Bar dataKey="percentOfBudget" fill="rgb(59 130 246)" radius={[4, 4, 0, 0]} barSize={48} />
              </BarChart>
            </ResponsiveContainer>
          </div>
        ) : (
          <div className="rounded-md border overflow-x-auto">
            <Table>
              <TableHeader>
                <TableRow>
                  <TableHead>Scenario</TableHead>
                  <TableHead className="text-right">Estimate</TableHead>
                  <TableHead className="text-right">% of Budget</TableHead>
                </TableRow>
              </TableHeader>
              <TableBody>
                {rows.map((row) => (
                  <TableRow key={row.label}>
                    <TableCell className="font-medium">{row.label}</TableCell>
                    <TableCell className="text-right">{formatCurrency(row.amount, config.currencyPrefix)}</TableCell>
                    <TableCell className="text-right">{formatPercent(row.percentOfBudget, 1)}</TableCell>
                  </TableRow>
                ))}
              </TableBody>
            </Table>
          </div>
        )}
      </CardContent>
    </Card>
  )
}
