'use client'

import { useEffect, useMemo, useState } from 'react'
import { useProducts } from '@/hooks/use-quotes'
import { ComparisonPanel } from '@/components/dashboard/ComparisonPanel'
import { ExportPanel } from '@/components/dashboard/ExportPanel'
import { ProductPanel } from '@/components/dashboard/ProductPanel'
import { QuoteControls, type AnalysisType } from '@/components/dashboard/QuoteControls'
import { RefreshButton } from '@/components/dashboard/RefreshButton'
import { ErrorMessage } from '@/components/ui/error-message'
import { QUOTE_DEFAULTS } from '@/lib/quotes/defaults'
import { toIsoDay, trailingRange, type DateRange } from '@/lib/utils/dates'

export default function DashboardPage() {
  const products = useProducts()
  const today = useMemo(() => toIsoDay(new Date()), [])

  const [selected, setSelected] = useState<string[]>([])
  const [range, setRange] = useState<DateRange>(() => trailingRange(new Date(), QUOTE_DEFAULTS.defaultRangeDays))
  const [window, setWindow] = useState<number>(QUOTE_DEFAULTS.defaultWindow)
  const [analysis, setAnalysis] = useState<AnalysisType>('history')
  const [showRaw, setShowRaw] = useState(false)

  // Preselect the first product once the catalog arrives
  useEffect(() => {
    const first = products.data?.[0]
    if (first) setSelected((current) => (current.length ? current : [first.id]))
  }, [products.data])

  const selectedProducts = useMemo(
    () => (products.data ?? []).filter((p) => selected.includes(p.id)),
    [products.data, selected]
  )

  return (
    <main className="max-w-7xl mx-auto px-4 py-6">
      <header className="flex items-center justify-between mb-6">
        <div>
          <h1 className="text-2xl font-bold">Commodity Quotes</h1>
          <p className="text-sm text-gray-600 dark:text-gray-400">Daily prices for agricultural commodities</p>
        </div>
        <RefreshButton productIds={selected} range={range} window={window} />
      </header>

      {products.error && <ErrorMessage title="Could not load the product list" message={products.error.message} onRetry={() => void products.refetch()} />}

      <div className="grid grid-cols-1 lg:grid-cols-[260px_1fr] gap-6">
        <QuoteControls
          products={products.data ?? []}
          selected={selected}
          onSelectedChange={setSelected}
          range={range}
          onRangeChange={setRange}
          maxDay={today}
          window={window}
          onWindowChange={setWindow}
          analysis={analysis}
          onAnalysisChange={setAnalysis}
          showRaw={showRaw}
          onShowRawChange={setShowRaw}
        />

        <div className="space-y-8">
          {selectedProducts.length === 0 && products.data && (
            <ErrorMessage tone="warning" title="No product selected" message="Select at least one product." />
          )}

          {analysis === 'compare' ? (
            <ComparisonPanel products={selectedProducts} range={range} />
          ) : (
            selectedProducts.map((p) => (
              <ProductPanel key={p.id} product={p} range={range} window={window} analysis={analysis} showRaw={showRaw} />
            ))
          )}

          {selectedProducts.length > 0 && (
            <section>
              <h2 className="text-lg font-semibold mb-2">Export</h2>
              <ExportPanel products={selectedProducts} range={range} window={window} />
            </section>
          )}
        </div>
      </div>
    </main>
  )
}
