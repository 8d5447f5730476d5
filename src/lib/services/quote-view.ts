import { aggregate, movingAverages } from '@/lib/calculations/moving-average'
import { monthlyAverages, priceHistogram, type HistogramBin, type MonthlyAverage } from '@/lib/calculations/distribution'
import {
  describePrices,
  percentChanges,
  summarizeQuotes,
  type PercentChangePoint,
  type PriceStatistics,
  type QuoteSummary,
} from '@/lib/calculations/statistics'
import { CONFIG } from '@/lib/config'
import type { Product } from '@/lib/products/catalog'
import type { PricePoint, QuoteSource, ValuePoint } from '@/lib/quotes/types'
import {
  calculateDataFreshness,
  thresholdsForTtl,
  validateQuoteSeries,
  type DataFreshnessInfo,
  type ValidationResult,
} from '@/lib/utils/data-validation'
import type { DateRange } from '@/lib/utils/dates'
import type { QuoteResult } from './quote-service'

export interface QuoteView {
  product: Product
  range: DateRange
  window: number
  source: QuoteSource
  fetchedAt: string
  series: PricePoint[]
  movingAverage: ValuePoint[]
  movingAverages: Record<number, ValuePoint[]>
  dailyChanges: PercentChangePoint[]
  statistics: PriceStatistics | null
  summary: QuoteSummary | null
  histogram: HistogramBin[]
  monthly: MonthlyAverage[]
  freshness: DataFreshnessInfo
  validation: ValidationResult
}

/**
 * Everything the dashboard renders for one product, computed from a
 * QuoteResult without further I/O.
 */
export function buildQuoteView(result: QuoteResult, window: number, ttlSeconds: number, now: Date = new Date()): QuoteView {
  const { quotes } = result
  const { series, movingAverage } = aggregate(quotes, window)

  return {
    product: result.product,
    range: result.range,
    window,
    source: result.source,
    fetchedAt: result.fetchedAt,
    series,
    movingAverage,
    movingAverages: movingAverages(quotes, CONFIG.quotes.movingAverageWindows),
    dailyChanges: percentChanges(quotes, 1),
    statistics: describePrices(quotes),
    summary: summarizeQuotes(quotes, CONFIG.quotes.changePeriods),
    histogram: priceHistogram(quotes, CONFIG.quotes.histogramBins),
    monthly: monthlyAverages(quotes),
    freshness: calculateDataFreshness(result.fetchedAt, thresholdsForTtl(ttlSeconds), now),
    validation: validateQuoteSeries(quotes),
  }
}
