'use client'

import { useComparison } from '@/hooks/use-quotes'
import { ChartContainer } from '@/components/charts/ChartContainer'
import { CorrelationMatrix } from '@/components/charts/CorrelationMatrix'
import { ErrorMessage } from '@/components/ui/error-message'
import type { Product } from '@/lib/products/catalog'
import type { DateRange } from '@/lib/utils/dates'

interface ComparisonPanelProps {
  products: Product[]
  range: DateRange
}

export function ComparisonPanel({ products, range }: ComparisonPanelProps) {
  const ids = products.map((p) => p.id)
  const { data, error, isLoading } = useComparison(ids, range, true)

  if (products.length < 2) {
    return <ErrorMessage tone="warning" title="Compare products" message="Select at least two products to compare." />
  }
  if (isLoading) return <div className="h-40 rounded-lg bg-gray-100 dark:bg-gray-800 animate-pulse" />
  if (error) return <ErrorMessage title="Comparison failed" message={error.message} />
  if (!data) return null

  const labels = Object.fromEntries(products.map((p) => [p.id, p.displayName]))
  return (
    <div className="space-y-3">
      {data.errors.length > 0 && <ErrorMessage tone="warning" title="Some products are not available" message={data.errors.join('; ')} />}
      {data.correlation ? (
        <ChartContainer title="Correlation between products">
          <CorrelationMatrix matrix={data.correlation} labels={labels} />
        </ChartContainer>
      ) : (
        <ErrorMessage tone="warning" title="Compare products" message="Not enough data to correlate the selected products." />
      )}
    </div>
  )
}
