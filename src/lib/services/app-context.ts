import { QuoteProviderClient } from '@/lib/api-clients/quotes-provider'
import { FileQuoteCache } from '@/lib/cache/quote-store'
import { loadRuntimeConfig, type RuntimeConfig } from '@/lib/config'
import { loadProductCatalog, type ProductCatalog } from '@/lib/products/catalog'
import { QuoteService } from './quote-service'

export interface AppContext {
  config: RuntimeConfig
  catalog: ProductCatalog
  cache: FileQuoteCache
  quotes: QuoteService
}

export async function createAppContext(config: RuntimeConfig): Promise<AppContext> {
  const catalog = await loadProductCatalog(config.productsFile)
  const cache = new FileQuoteCache({ dir: config.cache.dir, ttlSeconds: config.cache.ttlSeconds })
  const fetcher = new QuoteProviderClient(config.provider)
  return {
    config,
    catalog,
    cache,
    quotes: new QuoteService({ catalog, cache, fetcher }),
  }
}

let contextPromise: Promise<AppContext> | null = null

/**
 * Context shared by the route handlers, created on first use. A failed
 * startup is not memoised so the next request tries again.
 */
export function getAppContext(): Promise<AppContext> {
  if (!contextPromise) {
    contextPromise = createAppContext(loadRuntimeConfig()).catch((error: unknown) => {
      contextPromise = null
      console.error('[quotes] failed to initialise:', error)
      throw error
    })
  }
  return contextPromise
}
