import { ResponsiveContainer, LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Legend, Brush } from 'recharts'
import { format, parseISO } from 'date-fns'
import type { PricePoint, ValuePoint } from '@/lib/quotes/types'

interface PriceHistoryChartProps {
  series: PricePoint[]
  movingAverage: ValuePoint[]
  window: number
  valueFormatter?: (v: number) => string
}

interface Row {
  date: string
  price: number
  average: number | null
}

export function mergeSeries(series: PricePoint[], movingAverage: ValuePoint[]): Row[] {
  const ma = new Map(movingAverage.map((p) => [p.date, p.value]))
  return series.map((p) => ({ date: p.date, price: p.price, average: ma.get(p.date) ?? null }))
}

export function PriceHistoryChart({ series, movingAverage, window, valueFormatter = (v) => v.toFixed(2) }: PriceHistoryChartProps) {
  const data = mergeSeries(series, movingAverage)
  return (
    <ResponsiveContainer width="100%" height={320}>
      <LineChart data={data} margin={{ left: 8, right: 8, top: 8, bottom: 8 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#e0e0e0" />
        <XAxis dataKey="date" tickFormatter={(v: string) => format(parseISO(v), 'dd/MM')} minTickGap={24} stroke="#666" fontSize={12} />
        <YAxis stroke="#666" fontSize={12} domain={['auto', 'auto']} />
        <Tooltip
          formatter={(value: number, name: string) => [valueFormatter(Number(value)), name]}
          labelFormatter={(label: string) => format(parseISO(label), 'dd/MM/yyyy')}
          contentStyle={{ backgroundColor: '#fff', border: '1px solid #ccc', borderRadius: '4px' }}
        />
        <Legend />
        <Line type="monotone" dataKey="price" name="Daily price" stroke="#2563eb" strokeWidth={2} dot={false} />
        <Line
          type="monotone"
          dataKey="average"
          name={`${window}-day average`}
          stroke="#f97316"
          strokeWidth={2}
          strokeDasharray="4 3"
          dot={false}
          connectNulls={false}
        />
        {data.length > 30 && <Brush dataKey="date" height={22} travellerWidth={8} stroke="#94a3b8" />}
      </LineChart>
    </ResponsiveContainer>
  )
}
