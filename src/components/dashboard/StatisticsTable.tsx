import type { PriceStatistics } from '@/lib/calculations/statistics'
import { formatNumber } from '@/lib/utils/format'

export function StatisticsTable({ stats }: { stats: PriceStatistics }) {
  const rows: Array<[string, string]> = [
    ['Observations', String(stats.count)],
    ['Mean', formatNumber(stats.mean)],
    ['Std. deviation', formatNumber(stats.std)],
    ['Minimum', formatNumber(stats.min)],
    ['25%', formatNumber(stats.q25)],
    ['Median', formatNumber(stats.median)],
    ['75%', formatNumber(stats.q75)],
    ['Maximum', formatNumber(stats.max)],
  ]
  return (
    <table className="w-full text-sm">
      <tbody>
        {rows.map(([label, value]) => (
          <tr key={label} className="border-t border-gray-100 dark:border-gray-700">
            <th className="px-3 py-1.5 text-left font-normal text-gray-600 dark:text-gray-400">{label}</th>
            <td className="px-3 py-1.5 text-right tabular-nums">{value}</td>
          </tr>
        ))}
      </tbody>
    </table>
  )
}
