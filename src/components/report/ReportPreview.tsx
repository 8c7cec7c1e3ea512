import type { ReportBlock } from '@/types/report'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import { Skeleton } from '@/components/ui/skeleton'
import { cn } from '@/lib/utils'

function PreviewBlock({ block }: { block: ReportBlock }) {
  switch (block.type) {
    case 'heading':
      return block.level === 0 ? (
        <h2 className={cn('text-2xl font-bold text-slate-900 dark:text-slate-100', block.align === 'center' && 'text-center')}>
          {block.text}
        </h2>
      ) : (
        <h3 className="text-lg font-semibold text-teal-700 dark:text-teal-300 pt-4 border-b border-slate-200 dark:border-slate-700 pb-1">
          {block.text}
        </h3>
      )
    case 'paragraph':
      return (
        <p className={cn('text-sm text-slate-700 dark:text-slate-300', block.align === 'center' && 'text-center text-slate-500 dark:text-slate-400')}>
          {block.text}
        </p>
      )
    case 'bullet':
      return (
        <p className={cn('text-sm text-slate-700 dark:text-slate-300 flex gap-2', block.level === 1 ? 'pl-10' : 'pl-4')}>
          <span aria-hidden="true">{block.level === 1 ? '◦' : '•'}</span>
          <span>{block.text}</span>
        </p>
      )
    case 'table':
      return (
        <div className="rounded-md border overflow-x-auto">
          <Table>
            <TableHeader>
              <TableRow>
                {block.header.map((cell, i) => (
                  <TableHead key={i}>{cell}</TableHead>
                ))}
              </TableRow>
            </TableHeader>
            <TableBody>
              {block.rows.map((row, r) => (
                <TableRow key={r}>
                  {row.map((cell, c) => (
                    <TableCell key={c}>{cell}</TableCell>
                  ))}
                </TableRow>
              ))}
            </TableBody>
          </Table>
        </div>
      )
  }
}

export function ReportPreview({ blocks, loadingAttachments }: { blocks: readonly ReportBlock[]; loadingAttachments: boolean }) {
  return (
    <article className="mx-auto max-w-3xl rounded-xl bg-white dark:bg-slate-900 shadow-lg border border-slate-200 dark:border-slate-700 p-6 sm:p-10 space-y-2">
      {blocks.map((block, i) => (
        <PreviewBlock key={i} block={block} />
      ))}
      {loadingAttachments && (
        <div className="space-y-2 pt-4">
          <Skeleton className="h-5 w-48" />
          <Skeleton className="h-24 w-full" />
        </div>
      )}
    </article>
  )
}
