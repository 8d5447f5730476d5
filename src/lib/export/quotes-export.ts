import * as XLSX from 'xlsx'
import { movingAverage } from '@/lib/calculations/moving-average'
import { percentChanges } from '@/lib/calculations/statistics'
import type { Quote } from '@/lib/quotes/types'
import type { DateRange } from '@/lib/utils/dates'

export const EXPORT_FORMATS = ['csv', 'xlsx', 'json'] as const
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export interface ExportRow {
  date: string
  price: number
  unit: string
  moving_average: number | null
  pct_change: number | null
}

export interface ExportFile {
  filename: string
  contentType: string
  body: Buffer
}

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  json: 'application/json; charset=utf-8',
}

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value)
}

/**
 * Table rows for export: each quote with its trailing moving average and the
 * change from the previous observation.
 */
export function buildExportRows(quotes: readonly Quote[], window: number): ExportRow[] {
  const ma = new Map(movingAverage(quotes, window).map((p) => [p.date, p.value]))
  const changes = percentChanges(quotes, 1)
  return quotes.map((q, i) => ({
    date: q.date,
    price: q.price,
    unit: q.unit,
    moving_average: ma.get(q.date) ?? null,
    pct_change: changes[i]?.change ?? null,
  }))
}

export function exportFilename(productId: string, range: DateRange, format: ExportFormat): string {
  return `quotes_${productId.toLowerCase()}_${range.start}_${range.end}.${format}`
}

function toSheet(rows: readonly ExportRow[]): XLSX.WorkSheet {
  const header = ['date', 'price', 'unit', 'moving_average', 'pct_change']
  // Empty cells instead of nulls so every format renders the same gaps
  const cells = rows.map((r) => ({ ...r, moving_average: r.moving_average ?? '', pct_change: r.pct_change ?? '' }))
  return XLSX.utils.json_to_sheet(cells, { header })
}

export function serializeRows(rows: readonly ExportRow[], format: ExportFormat): Buffer {
  switch (format) {
    case 'json':
      return Buffer.from(JSON.stringify(rows, null, 2), 'utf-8')
    case 'csv':
      return Buffer.from(XLSX.utils.sheet_to_csv(toSheet(rows)), 'utf-8')
    case 'xlsx': {
      const wb = XLSX.utils.book_new()
      XLSX.utils.book_append_sheet(wb, toSheet(rows), 'Quotes')
      const out: unknown = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' })
      if (!Buffer.isBuffer(out)) throw new Error('xlsx writer did not return a buffer')
      return out
    }
  }
}

export function exportQuotes(productId: string, range: DateRange, quotes: readonly Quote[], format: ExportFormat, window: number): ExportFile {
  return {
    filename: exportFilename(productId, range, format),
    contentType: CONTENT_TYPES[format],
    body: serializeRows(buildExportRows(quotes, window), format),
  }
}
