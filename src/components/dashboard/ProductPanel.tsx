'use client'

import { useQuoteView } from '@/hooks/use-quotes'
import { ChartContainer } from '@/components/charts/ChartContainer'
import { DistributionChart } from '@/components/charts/DistributionChart'
import { PriceHistoryChart } from '@/components/charts/PriceHistoryChart'
import { SeasonalChart } from '@/components/charts/SeasonalChart'
import { QuoteTable } from '@/components/dashboard/QuoteTable'
import { StatCard, trendOf } from '@/components/dashboard/StatCard'
import { StatisticsTable } from '@/components/dashboard/StatisticsTable'
import type { AnalysisType } from '@/components/dashboard/QuoteControls'
import { DataFreshnessBadge } from '@/components/ui/data-freshness-badge'
import { ErrorMessage } from '@/components/ui/error-message'
import type { Product } from '@/lib/products/catalog'
import type { DateRange } from '@/lib/utils/dates'
import { formatDay, formatPercentage, formatPrice } from '@/lib/utils/format'

interface ProductPanelProps {
  product: Product
  range: DateRange
  window: number
  analysis: AnalysisType
  showRaw: boolean
}

export function ProductPanel({ product, range, window, analysis, showRaw }: ProductPanelProps) {
  const { data, error, isLoading, refetch } = useQuoteView(product.id, range, window)

  if (isLoading) {
    return <div className="h-40 rounded-lg bg-gray-100 dark:bg-gray-800 animate-pulse" aria-label={`Loading ${product.displayName}`} />
  }
  if (error) {
    return <ErrorMessage title={`${product.displayName}: not available`} message={error.message} onRetry={() => void refetch()} />
  }
  if (!data) return null

  const view = data.data
  const price = (v: number) => formatPrice(v, view.summary?.unit ?? product.unit)

  if (!view.series.length) {
    return <ErrorMessage tone="warning" title={product.displayName} message="No quotes found for the selected period." />
  }

  return (
    <section className="space-y-4">
      <header className="flex items-center justify-between">
        <h2 className="text-xl font-semibold">{product.displayName}</h2>
        <DataFreshnessBadge freshness={view.freshness} cached={data.cached} />
      </header>

      {view.summary && (
        <div className="grid grid-cols-1 sm:grid-cols-3 gap-4">
          <StatCard title="Latest price" value={price(view.summary.latestPrice)} subtitle={formatDay(view.summary.latestDate)} />
          <StatCard
            title="Change in period"
            value={formatPercentage(view.summary.periodChangePct)}
            trend={trendOf(view.summary.periodChangePct)}
          />
          <StatCard
            title="Change over 30 quotes"
            value={formatPercentage(view.summary.change30Pct)}
            subtitle={view.summary.change30Pct == null ? 'Not enough history' : undefined}
            trend={trendOf(view.summary.change30Pct)}
          />
        </div>
      )}

      {view.validation.warnings.length > 0 && (
        <ErrorMessage tone="warning" title="Data gaps" message={view.validation.warnings.join('; ')} />
      )}

      {analysis === 'history' && (
        <ChartContainer title="Price history" subtitle={`${formatDay(view.range.start)} – ${formatDay(view.range.end)}`}>
          <PriceHistoryChart series={view.series} movingAverage={view.movingAverage} window={view.window} valueFormatter={price} />
        </ChartContainer>
      )}
      {analysis === 'distribution' && (
        <ChartContainer title="Price distribution">
          <DistributionChart bins={view.histogram} />
        </ChartContainer>
      )}
      {analysis === 'seasonal' && (
        <ChartContainer title="Monthly average price">
          <SeasonalChart months={view.monthly} valueFormatter={price} />
        </ChartContainer>
      )}

      {view.statistics && (
        <ChartContainer title="Descriptive statistics">
          <StatisticsTable stats={view.statistics} />
        </ChartContainer>
      )}

      {showRaw && (
        <ChartContainer title="Quotes">
          <QuoteTable series={view.series} movingAverage={view.movingAverage} changes={view.dailyChanges} unit={view.summary?.unit ?? product.unit} />
        </ChartContainer>
      )}
    </section>
  )
}
