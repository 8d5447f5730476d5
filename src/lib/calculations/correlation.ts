import type { Quote } from '@/lib/quotes/types'
import { ValidationError } from '@/lib/utils/errors'

export interface CorrelationMatrix {
  productIds: string[]
  /** `values[i][j]` is the correlation of product i with product j, null when undefined */
  values: (number | null)[][]
  commonDates: number
}

function isConstant(values: readonly number[]): boolean {
  return values.every((v) => v === values[0])
}

/**
 * Pearson correlation coefficient. NaN when it is undefined: mismatched or
 * too short input, or a series with no variance.
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length || x.length < 2) return NaN
  if (isConstant(x) || isConstant(y)) return NaN

  const n = x.length
  let sumX = 0
  let sumY = 0
  let sumXY = 0
  let sumX2 = 0
  let sumY2 = 0

  for (let i = 0; i < n; i++) {
    sumX += x[i]!
    sumY += y[i]!
    sumXY += x[i]! * y[i]!
    sumX2 += x[i]! * x[i]!
    sumY2 += y[i]! * y[i]!
  }

  const numerator = n * sumXY - sumX * sumY
  const denominator = Math.sqrt((n * sumX2 - sumX * sumX) * (n * sumY2 - sumY * sumY))

  if (!(denominator > 0)) return NaN
  return numerator / denominator
}

/**
 * Pairwise correlation of closing prices over the dates every product has a
 * quote for.
 */
export function correlationMatrix(seriesByProduct: ReadonlyMap<string, readonly Quote[]>): CorrelationMatrix {
  const productIds = [...seriesByProduct.keys()]
  if (productIds.length < 2) {
    throw new ValidationError('At least two products are required for a correlation', 'products')
  }

  const priceMaps = productIds.map((id) => new Map((seriesByProduct.get(id) ?? []).map((q) => [q.date, q.price])))
  const [firstMap, ...rest] = priceMaps
  const dates = [...(firstMap?.keys() ?? [])].filter((d) => rest.every((m) => m.has(d))).sort()
  const columns = priceMaps.map((m) => dates.map((d) => m.get(d) ?? NaN))

  const values = productIds.map((_, i) =>
    productIds.map((__, j) => {
      if (dates.length < 2) return null
      if (i === j) return isConstant(columns[i]!) ? null : 1
      const r = pearsonCorrelation(columns[i]!, columns[j]!)
      return Number.isFinite(r) ? r : null
    })
  )

  return { productIds, values, commonDates: dates.length }
}
