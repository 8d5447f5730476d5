import type { Quote } from '@/lib/quotes/types'
import { ValidationError } from '@/lib/utils/errors'

export interface HistogramBin {
  from: number
  to: number
  count: number
}

export interface MonthlyAverage {
  month: string
  average: number
  observations: number
}

export function priceHistogram(quotes: readonly Quote[], bins: number): HistogramBin[] {
  if (!Number.isInteger(bins) || bins < 1) {
    throw new ValidationError(`Histogram bin count must be a positive integer, got ${bins}`, 'bins')
  }
  if (!quotes.length) return []

  const prices = quotes.map((q) => q.price)
  const min = Math.min(...prices)
  const max = Math.max(...prices)
  if (min === max) return [{ from: min, to: max, count: prices.length }]

  const width = (max - min) / bins
  const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + i * width,
    to: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }))
  for (const p of prices) {
    // The maximum falls into the last (closed) bin
    const idx = Math.min(bins - 1, Math.floor((p - min) / width))
    result[idx]!.count++
  }
  return result
}

/** Seasonal view: mean price per calendar month (`YYYY-MM`), ascending. */
export function monthlyAverages(quotes: readonly Quote[]): MonthlyAverage[] {
  const buckets = new Map<string, { sum: number; n: number }>()
  for (const q of quotes) {
    const month = q.date.slice(0, 7)
    const bucket = buckets.get(month) ?? { sum: 0, n: 0 }
    bucket.sum += q.price
    bucket.n++
    buckets.set(month, bucket)
  }
  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([month, { sum, n }]) => ({ month, average: sum / n, observations: n }))
}
