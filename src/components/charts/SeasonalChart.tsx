import { ResponsiveContainer, BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip } from 'recharts'
import { format, parseISO } from 'date-fns'
import type { MonthlyAverage } from '@/lib/calculations/distribution'

interface SeasonalChartProps {
  months: MonthlyAverage[]
  valueFormatter?: (v: number) => string
}

export function SeasonalChart({ months, valueFormatter = (v) => v.toFixed(2) }: SeasonalChartProps) {
  return (
    <ResponsiveContainer width="100%" height={240}>
      <BarChart data={months} margin={{ left: 8, right: 8, top: 8, bottom: 8 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
        <XAxis dataKey="month" tickFormatter={(v: string) => format(parseISO(`${v}-01`), 'MMM yyyy')} stroke="#666" fontSize={12} />
        <YAxis stroke="#666" fontSize={12} domain={['auto', 'auto']} />
        <Tooltip formatter={(value: number) => [valueFormatter(Number(value)), 'Monthly average']} />
        <Bar dataKey="average" fill="#14b8a6" />
      </BarChart>
    </ResponsiveContainer>
  )
}
