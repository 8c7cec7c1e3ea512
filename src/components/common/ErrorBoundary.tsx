import { Component, type ErrorInfo, type ReactNode } from 'react'
import { describeError } from '@/lib/errors'

interface ErrorBoundaryProps {
  children: ReactNode
  fallback?: ReactNode
}

interface ErrorBoundaryState {
  hasError: boolean
  message?: string
}

export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { hasError: false }

  static getDerivedStateFromError(error: unknown): ErrorBoundaryState {
    return { hasError: true, message: describeError(error) }
  }

  componentDidCatch(error: unknown, errorInfo: ErrorInfo) {
    console.error('UI ErrorBoundary caught:', error, errorInfo)
  }

  render() {
    if (this.state.hasError) {
      return this.props.fallback ?? (
        <div className="p-6">
          <div className="rounded-lg border border-red-200 bg-red-50 dark:border-red-900 dark:bg-red-950/30 p-4">
            <div className="text-red-800 dark:text-red-200 font-medium mb-1">Something went wrong</div>
            <div className="text-sm text-red-700 dark:text-red-300">{this.state.message}</div>
          </div>
        </div>
      )
    }
    return this.props.children
  }
}
