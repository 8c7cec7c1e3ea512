import { Monitor, Moon, Sun } from 'lucide-react'
import { useTheme } from '@/hooks/useTheme'
import { Button } from '@/components/ui/button'
import type { Theme } from './ThemeProvider'

const NEXT_THEME: Record<Theme, Theme> = {
  light: 'dark',
  dark: 'system',
  system: 'light',
}

const LABELS: Record<Theme, string> = {
  light: 'Switch to dark mode',
  dark: 'Switch to system theme',
  system: 'Switch to light mode',
}

export function ThemeToggle() {
  const { theme, setTheme } = useTheme()

  const icon =
    theme === 'light' ? <Sun className="w-5 h-5" /> : theme === 'dark' ? <Moon className="w-5 h-5" /> : <Monitor className="w-5 h-5" />

  return (
    <Button
      variant="ghost"
      size="sm"
      onClick={() => setTheme(NEXT_THEME[theme])}
      className="w-9 h-9 p-0 rounded-lg !text-slate-500 hover:!text-slate-700 dark:!text-slate-300 dark:hover:!text-slate-100"
      title={LABELS[theme]}
      aria-label={LABELS[theme]}
    >
      {icon}
    </Button>
  )
}
