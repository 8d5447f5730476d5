'use client'

import { useState } from 'react'
import { exportUrl } from '@/hooks/use-quotes'
import type { ExportFormat } from '@/lib/export/quotes-export'
import type { Product } from '@/lib/products/catalog'
import type { DateRange } from '@/lib/utils/dates'

interface ExportPanelProps {
  products: Product[]
  range: DateRange
  window: number
}

const FORMATS: Array<{ value: ExportFormat; label: string }> = [
  { value: 'csv', label: 'CSV' },
  { value: 'xlsx', label: 'Excel' },
  { value: 'json', label: 'JSON' },
]

export function ExportPanel({ products, range, window }: ExportPanelProps) {
  const [format, setFormat] = useState<ExportFormat>('csv')

  return (
    <div className="space-y-3">
      <label className="flex items-center gap-2 text-sm">
        Format
        <select
          value={format}
          onChange={(e) => setFormat(FORMATS.find((f) => f.value === e.target.value)?.value ?? 'csv')}
          className="border rounded-md px-2 py-1 bg-white dark:bg-gray-800"
        >
          {FORMATS.map((f) => (
            <option key={f.value} value={f.value}>
              {f.label}
            </option>
          ))}
        </select>
      </label>
      <div className="flex flex-wrap gap-2">
        {products.map((p) => (
          <a
            key={p.id}
            href={exportUrl(p.id, range, window, format)}
            download
            className="px-3 py-1.5 text-sm bg-gray-100 dark:bg-gray-700 rounded-md hover:bg-gray-200 dark:hover:bg-gray-600"
          >
            Download {p.displayName}
          </a>
        ))}
      </div>
    </div>
  )
}
