'use client'

import type { Product } from '@/lib/products/catalog'
import type { DateRange } from '@/lib/utils/dates'

export type AnalysisType = 'history' | 'distribution' | 'seasonal' | 'compare'

export const ANALYSIS_OPTIONS: Array<{ value: AnalysisType; label: string }> = [
  { value: 'history', label: 'Price history' },
  { value: 'distribution', label: 'Price distribution' },
  { value: 'seasonal', label: 'Seasonal view' },
  { value: 'compare', label: 'Compare products' },
]

const WINDOW_OPTIONS = [3, 5, 7, 14, 30] as const

interface QuoteControlsProps {
  products: Product[]
  selected: string[]
  onSelectedChange: (ids: string[]) => void
  range: DateRange
  onRangeChange: (range: DateRange) => void
  maxDay: string
  window: number
  onWindowChange: (window: number) => void
  analysis: AnalysisType
  onAnalysisChange: (analysis: AnalysisType) => void
  showRaw: boolean
  onShowRawChange: (value: boolean) => void
}

export function QuoteControls(props: QuoteControlsProps) {
  const { products, selected, range, window, analysis } = props

  const toggle = (id: string) => {
    props.onSelectedChange(selected.includes(id) ? selected.filter((s) => s !== id) : [...selected, id])
  }

  return (
    <aside className="space-y-5">
      <section>
        <h2 className="text-sm font-semibold mb-2">Products</h2>
        <ul className="space-y-1">
          {products.map((p) => (
            <li key={p.id}>
              <label className="flex items-center gap-2 text-sm">
                <input type="checkbox" checked={selected.includes(p.id)} onChange={() => toggle(p.id)} />
                {p.displayName}
                <span className="text-xs text-gray-500">({p.category})</span>
              </label>
            </li>
          ))}
        </ul>
      </section>

      <section className="grid grid-cols-2 gap-2">
        <label className="text-sm">
          Start
          <input
            type="date"
            value={range.start}
            max={range.end}
            onChange={(e) => e.target.value && props.onRangeChange({ ...range, start: e.target.value })}
            className="block w-full border rounded-md px-2 py-1 bg-white dark:bg-gray-800"
          />
        </label>
        <label className="text-sm">
          End
          <input
            type="date"
            value={range.end}
            min={range.start}
            max={props.maxDay}
            onChange={(e) => e.target.value && props.onRangeChange({ ...range, end: e.target.value })}
            className="block w-full border rounded-md px-2 py-1 bg-white dark:bg-gray-800"
          />
        </label>
      </section>

      <label className="block text-sm">
        Moving average (days)
        <select
          value={window}
          onChange={(e) => props.onWindowChange(Number(e.target.value))}
          className="block w-full border rounded-md px-2 py-1 bg-white dark:bg-gray-800"
        >
          {WINDOW_OPTIONS.map((w) => (
            <option key={w} value={w}>
              {w}
            </option>
          ))}
        </select>
      </label>

      <label className="block text-sm">
        Analysis
        <select
          value={analysis}
          onChange={(e) => {
            const next = ANALYSIS_OPTIONS.find((o) => o.value === e.target.value)
            if (next) props.onAnalysisChange(next.value)
          }}
          className="block w-full border rounded-md px-2 py-1 bg-white dark:bg-gray-800"
        >
          {ANALYSIS_OPTIONS.map((o) => (
            <option key={o.value} value={o.value}>
              {o.label}
            </option>
          ))}
        </select>
      </label>

      <label className="flex items-center gap-2 text-sm">
        <input type="checkbox" checked={props.showRaw} onChange={(e) => props.onShowRawChange(e.target.checked)} />
        Show raw data
      </label>
    </aside>
  )
}
