/**
 * Shows how old the quotes on screen are and whether they came from the
 * local cache.
 */

import type { DataFreshnessInfo } from '@/lib/utils/data-validation'
import { getFreshnessColorClass, getFreshnessLabel } from '@/lib/utils/data-validation'

interface DataFreshnessBadgeProps {
  freshness: DataFreshnessInfo
  cached: boolean
  className?: string
}

export function DataFreshnessBadge({ freshness, cached, className = '' }: DataFreshnessBadgeProps) {
  const { status, formattedAge, warningMessage } = freshness
  const label = getFreshnessLabel(status)

  return (
    <div className={`inline-flex items-center gap-2 ${className}`}>
      <span
        className={`inline-flex items-center gap-1 px-2 py-0.5 rounded-full text-xs font-medium ${getFreshnessColorClass(status)}`}
        title={warningMessage ?? `Data status: ${label}`}
      >
        <span className={`w-2 h-2 rounded-full ${DOT_CLASSES[status]}`} aria-hidden />
        {label}
      </span>
      <span className="text-xs text-gray-500 dark:text-gray-400" title="Time since the provider was queried">
        {cached ? 'from cache, ' : ''}
        {formattedAge}
      </span>
    </div>
  )
}

const DOT_CLASSES: Record<DataFreshnessInfo['status'], string> = {
  live: 'bg-green-600 dark:bg-green-400',
  delayed: 'bg-yellow-600 dark:bg-yellow-400',
  stale: 'bg-red-600 dark:bg-red-400',
  error: 'bg-gray-600 dark:bg-gray-400',
}
