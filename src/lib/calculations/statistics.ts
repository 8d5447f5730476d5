import type { Quote } from '@/lib/quotes/types'

export interface PriceStatistics {
  count: number
  mean: number
  std: number | null
  min: number
  q25: number
  median: number
  q75: number
  max: number
}

export interface PercentChangePoint {
  date: string
  change: number | null
}

export interface QuoteSummary {
  latestPrice: number
  latestDate: string
  unit: string
  periodChangePct: number | null
  change30Pct: number | null
}

/**
 * Quantile with linear interpolation between closest ranks.
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (!sorted.length) return NaN
  const pos = (sorted.length - 1) * q
  const lower = Math.floor(pos)
  const upper = Math.ceil(pos)
  const lo = sorted[lower]!
  const hi = sorted[upper]!
  return lo + (hi - lo) * (pos - lower)
}

export function describePrices(quotes: readonly Quote[]): PriceStatistics | null {
  if (!quotes.length) return null
  const values = quotes.map((q) => q.price)
  const sorted = [...values].sort((a, b) => a - b)
  const n = values.length
  const mean = values.reduce((acc, v) => acc + v, 0) / n

  // Sample standard deviation; undefined for a single observation
  let std: number | null = null
  if (n > 1) {
    const sq = values.reduce((acc, v) => acc + (v - mean) ** 2, 0)
    std = Math.sqrt(sq / (n - 1))
  }

  return {
    count: n,
    mean,
    std,
    min: sorted[0]!,
    q25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q75: quantile(sorted, 0.75),
    max: sorted[n - 1]!,
  }
}

function pctChange(from: number, to: number): number | null {
  if (from === 0) return null
  return (to / from - 1) * 100
}

/**
 * Percentage change against the observation `periods` steps earlier.
 */
export function percentChanges(quotes: readonly Quote[], periods: number = 1): PercentChangePoint[] {
  return quotes.map((q, i) => {
    const prev = i >= periods ? quotes[i - periods] : undefined
    return { date: q.date, change: prev ? pctChange(prev.price, q.price) : null }
  })
}

export function summarizeQuotes(quotes: readonly Quote[], changePeriods: number = 30): QuoteSummary | null {
  const first = quotes[0]
  const latest = quotes[quotes.length - 1]
  if (!first || !latest) return null

  const base = quotes[quotes.length - 1 - changePeriods]
  return {
    latestPrice: latest.price,
    latestDate: latest.date,
    unit: latest.unit,
    periodChangePct: quotes.length > 1 ? pctChange(first.price, latest.price) : null,
    change30Pct: base ? pctChange(base.price, latest.price) : null,
  }
}
