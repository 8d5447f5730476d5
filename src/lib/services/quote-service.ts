import type { QuoteFetcher } from '@/lib/api-clients/quotes-provider'
import type { QuoteCache } from '@/lib/cache/quote-store'
import { selectRange } from '@/lib/calculations/moving-average'
import { correlationMatrix, type CorrelationMatrix } from '@/lib/calculations/correlation'
import type { Product, ProductCatalog } from '@/lib/products/catalog'
import type { Quote, QuoteSource } from '@/lib/quotes/types'
import type { DateRange } from '@/lib/utils/dates'
import { CacheIOError, NotFoundError, getErrorMessage } from '@/lib/utils/errors'

export interface QuoteServiceDeps {
  catalog: ProductCatalog
  cache: QuoteCache
  fetcher: QuoteFetcher
  now?: () => Date
}

export interface QuoteResult {
  product: Product
  range: DateRange
  quotes: Quote[]
  source: QuoteSource
  fetchedAt: string
}

export interface ComparisonResult {
  range: DateRange
  correlation: CorrelationMatrix | null
  quotes: Record<string, Quote[]>
  errors: string[]
}

export class QuoteService {
  private readonly catalog: ProductCatalog
  private readonly cache: QuoteCache
  private readonly fetcher: QuoteFetcher
  private readonly now: () => Date

  constructor(deps: QuoteServiceDeps) {
    this.catalog = deps.catalog
    this.cache = deps.cache
    this.fetcher = deps.fetcher
    this.now = deps.now ?? (() => new Date())
  }

  requireProduct(productId: string): Product {
    const product = this.catalog.get(productId)
    if (!product) {
      throw new NotFoundError(`Unknown product ${productId}`, productId)
    }
    return product
  }

  /**
   * Cached quotes when a fresh entry covers the range, otherwise a provider
   * fetch. Cache failures are logged and the fetch proceeds without caching.
   */
  async getQuotes(productId: string, range: DateRange, options: { fresh?: boolean } = {}): Promise<QuoteResult> {
    const product = this.requireProduct(productId)
    let cacheUsable = true

    if (!options.fresh) {
      try {
        const entry = await this.cache.get(product.id, range)
        if (entry) {
          return { product, range, quotes: selectRange(entry.quotes, range), source: 'cache', fetchedAt: entry.fetchedAt }
        }
      } catch (error) {
        if (!(error instanceof CacheIOError)) throw error
        console.warn(`[cache] get failed for ${product.id}, fetching without cache:`, getErrorMessage(error))
        cacheUsable = false
      }
    }

    const quotes = await this.fetcher.fetchQuotes(product, range)

    if (cacheUsable) {
      try {
        const entry = await this.cache.put(product.id, range, quotes)
        return { product, range, quotes: entry.quotes, source: 'provider', fetchedAt: entry.fetchedAt }
      } catch (error) {
        if (!(error instanceof CacheIOError)) throw error
        console.warn(`[cache] put failed for ${product.id}:`, getErrorMessage(error))
      }
    }

    return { product, range, quotes, source: 'provider-uncached', fetchedAt: this.now().toISOString() }
  }

  /**
   * Load several products and correlate them. A product that fails is
   * reported in `errors` and left out of the matrix.
   */
  async getComparison(productIds: readonly string[], range: DateRange): Promise<ComparisonResult> {
    const settled = await Promise.allSettled(productIds.map((id) => this.getQuotes(id, range)))
    const series = new Map<string, Quote[]>()
    const errors: string[] = []

    settled.forEach((res, i) => {
      const id = productIds[i]!
      if (res.status === 'fulfilled') series.set(id, res.value.quotes)
      else errors.push(`${id}: ${getErrorMessage(res.reason)}`)
    })

    return {
      range,
      correlation: series.size >= 2 ? correlationMatrix(series) : null,
      quotes: Object.fromEntries(series),
      errors,
    }
  }
}
