interface ErrorMessageProps {
  title?: string
  message: string
  tone?: 'error' | 'warning'
  onRetry?: () => void
}

const TONES = {
  error: {
    box: 'bg-red-50 dark:bg-red-900/20 border-red-200 dark:border-red-800',
    title: 'text-red-800 dark:text-red-400',
    text: 'text-red-700 dark:text-red-300',
  },
  warning: {
    box: 'bg-amber-50 dark:bg-amber-900/20 border-amber-200 dark:border-amber-800',
    title: 'text-amber-800 dark:text-amber-400',
    text: 'text-amber-700 dark:text-amber-300',
  },
} as const

export function ErrorMessage({ title = 'Error', message, tone = 'error', onRetry }: ErrorMessageProps) {
  const colors = TONES[tone]
  return (
    <div className={`border rounded-md p-4 ${colors.box}`} role="alert">
      <h4 className={`text-sm font-semibold mb-1 ${colors.title}`}>{title}</h4>
      <p className={`text-sm ${colors.text}`}>{message}</p>
      {onRetry && (
        <button onClick={onRetry} className={`mt-2 text-sm hover:underline ${colors.title}`}>
          Try again
        </button>
      )}
    </div>
  )
}
