import { ResponsiveContainer, BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip } from 'recharts'
import type { HistogramBin } from '@/lib/calculations/distribution'

interface DistributionChartProps {
  bins: HistogramBin[]
}

export function DistributionChart({ bins }: DistributionChartProps) {
  const data = bins.map((b) => ({ label: `${b.from.toFixed(2)}–${b.to.toFixed(2)}`, count: b.count }))
  return (
    <ResponsiveContainer width="100%" height={240}>
      <BarChart data={data} margin={{ left: 8, right: 8, top: 8, bottom: 8 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
        <XAxis dataKey="label" stroke="#666" fontSize={10} interval="preserveStartEnd" />
        <YAxis stroke="#666" fontSize={12} allowDecimals={false} />
        <Tooltip formatter={(value: number) => [value, 'Days']} />
        <Bar dataKey="count" fill="#38bdf8" />
      </BarChart>
    </ResponsiveContainer>
  )
}
