import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { config } from '@/lib/config'

interface MoneyInputProps {
  id: string
  label: string
  value: string
  error?: string
  onChange: (value: string) => void
}

export function MoneyInput({ id, label, value, error, onChange }: MoneyInputProps) {
  return (
    <div className="space-y-1.5">
      <Label htmlFor={id}>
        {label} <span className="text-slate-400">({config.currencyPrefix})</span>
      </Label>
      <Input
        id={id}
        inputMode="decimal"
        value={value}
        aria-invalid={Boolean(error)}
        onChange={(e) => onChange(e.target.value)}
      />
      {error && <p className="text-xs text-red-600 dark:text-red-400">{error}</p>}
    </div>
  )
}
