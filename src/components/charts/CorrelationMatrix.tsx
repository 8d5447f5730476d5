import type { CorrelationMatrix as Matrix } from '@/lib/calculations/correlation'

interface CorrelationMatrixProps {
  matrix: Matrix
  labels: Record<string, string>
}

// Red for negative, blue for positive, white around zero
function cellColor(r: number | null): string {
  if (r == null) return 'transparent'
  const alpha = Math.min(1, Math.abs(r)).toFixed(2)
  return r >= 0 ? `rgba(37, 99, 235, ${alpha})` : `rgba(220, 38, 38, ${alpha})`
}

export function CorrelationMatrix({ matrix, labels }: CorrelationMatrixProps) {
  const names = matrix.productIds.map((id) => labels[id] ?? id)
  return (
    <div className="overflow-x-auto">
      <table className="text-sm border-collapse">
        <thead>
          <tr>
            <th />
            {names.map((name) => (
              <th key={name} className="px-3 py-2 font-medium text-gray-700 dark:text-gray-300">
                {name}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {matrix.values.map((row, i) => (
            <tr key={matrix.productIds[i]}>
              <th className="px-3 py-2 text-left font-medium text-gray-700 dark:text-gray-300">{names[i]}</th>
              {row.map((r, j) => (
                <td
                  key={matrix.productIds[j]}
                  className="px-3 py-2 text-center tabular-nums"
                  style={{ backgroundColor: cellColor(r), color: r != null && Math.abs(r) > 0.6 ? '#fff' : undefined }}
                >
                  {r == null ? '—' : r.toFixed(2)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      <p className="text-xs text-gray-500 mt-2">Pearson correlation over {matrix.commonDates} common dates</p>
    </div>
  )
}
