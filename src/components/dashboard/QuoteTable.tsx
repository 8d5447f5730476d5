import type { PercentChangePoint } from '@/lib/calculations/statistics'
import type { PricePoint, ValuePoint } from '@/lib/quotes/types'
import { formatDay, formatNumber, formatPercentage } from '@/lib/utils/format'

interface QuoteTableProps {
  series: PricePoint[]
  movingAverage: ValuePoint[]
  changes: PercentChangePoint[]
  unit: string
}

export function QuoteTable({ series, movingAverage, changes, unit }: QuoteTableProps) {
  const ma = new Map(movingAverage.map((p) => [p.date, p.value]))
  const change = new Map(changes.map((p) => [p.date, p.change]))
  // Newest first, as in the provider's bulletin
  const rows = [...series].reverse()

  return (
    <div className="max-h-96 overflow-y-auto">
      <table className="w-full text-sm">
        <thead className="sticky top-0 bg-gray-50 dark:bg-gray-900">
          <tr className="text-left text-gray-600 dark:text-gray-400">
            <th className="px-3 py-2">Date</th>
            <th className="px-3 py-2 text-right">Price (R$ / {unit})</th>
            <th className="px-3 py-2 text-right">Moving avg.</th>
            <th className="px-3 py-2 text-right">Daily change</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.date} className="border-t border-gray-100 dark:border-gray-700">
              <td className="px-3 py-1.5">{formatDay(row.date)}</td>
              <td className="px-3 py-1.5 text-right tabular-nums">{formatNumber(row.price)}</td>
              <td className="px-3 py-1.5 text-right tabular-nums">{formatNumber(ma.get(row.date) ?? null)}</td>
              <td className="px-3 py-1.5 text-right tabular-nums">{formatPercentage(change.get(row.date) ?? null)}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
