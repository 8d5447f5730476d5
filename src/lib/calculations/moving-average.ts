import type { PricePoint, Quote, ValuePoint } from '@/lib/quotes/types'
import { isWithinRange, type DateRange } from '@/lib/utils/dates'
import { ValidationError } from '@/lib/utils/errors'

export interface AggregateResult {
  series: PricePoint[]
  movingAverage: ValuePoint[]
}

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new ValidationError(`Moving average window must be a positive integer, got ${window}`, 'window')
  }
}

/**
 * Trailing mean over exactly `window` observations. Dates before the first
 * full window are omitted.
 */
export function movingAverage(prices: readonly PricePoint[], window: number): ValuePoint[] {
  assertWindow(window)
  const result: ValuePoint[] = []

  for (let i = window - 1; i < prices.length; i++) {
    let sum = 0
    for (let j = i - window + 1; j <= i; j++) {
      sum += prices[j]!.price
    }
    result.push({ date: prices[i]!.date, value: sum / window })
  }
  return result
}

/**
 * Price series plus its moving average. Expects quotes sorted ascending by
 * date; an empty input yields empty sequences.
 */
export function aggregate(quotes: readonly Quote[], window: number): AggregateResult {
  assertWindow(window)
  const series = quotes.map((q) => ({ date: q.date, price: q.price }))
  return {
    series,
    movingAverage: movingAverage(series, window),
  }
}

export function selectRange(quotes: readonly Quote[], range: DateRange): Quote[] {
  return quotes.filter((q) => isWithinRange(q.date, range))
}

/** One moving-average series per window, keyed by window size. */
export function movingAverages(quotes: readonly Quote[], windows: readonly number[]): Record<number, ValuePoint[]> {
  const series = quotes.map((q) => ({ date: q.date, price: q.price }))
  const result: Record<number, ValuePoint[]> = {}
  for (const window of windows) {
    result[window] = movingAverage(series, window)
  }
  return result
}
