interface StatCardProps {
  title: string
  value: string
  subtitle?: string
  trend?: 'up' | 'down' | 'flat'
}

const TREND_CLASSES = {
  up: 'text-green-600',
  down: 'text-red-600',
  flat: 'text-blue-600',
} as const

export function StatCard({ title, value, subtitle, trend = 'flat' }: StatCardProps) {
  return (
    <div className="bg-white dark:bg-gray-800 rounded-lg shadow-md p-4">
      <h3 className="text-sm font-medium text-gray-600 dark:text-gray-400 mb-1">{title}</h3>
      <div className={`text-2xl font-bold ${TREND_CLASSES[trend]}`}>{value}</div>
      {subtitle && <p className="text-xs text-gray-500 dark:text-gray-500 mt-1">{subtitle}</p>}
    </div>
  )
}

export function trendOf(change: number | null): 'up' | 'down' | 'flat' {
  if (change == null || change === 0) return 'flat'
  return change > 0 ? 'up' : 'down'
}
