import { writeFile } from 'node:fs/promises'
import path from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { QuoteFetcher } from '@/lib/api-clients/quotes-provider'
import { FileQuoteCache, type QuoteCache } from '@/lib/cache/quote-store'
import type { CacheEntry, Quote } from '@/lib/quotes/types'
import { QuoteService } from '@/lib/services/quote-service'
import { rangeCovers, type DateRange } from '@/lib/utils/dates'
import { AuthError, CacheIOError, NotFoundError, ProviderError } from '@/lib/utils/errors'
import { makeTempDir, quote, testCatalog, threeDayQuotes } from '../../_utils/fixtures'

const RANGE = { start: '2024-01-01', end: '2024-01-03' }
const NOW = new Date('2024-01-04T09:00:00.000Z')

/** In-memory cache with the same hit rule as the file cache, minus expiry. */
class MemoryQuoteCache implements QuoteCache {
  readonly entries = new Map<string, CacheEntry>()
  failGet = false
  failPut = false
  puts = 0

  async get(productId: string, range: DateRange): Promise<CacheEntry | null> {
    if (this.failGet) throw new CacheIOError('disk unreadable', 'get')
    const entry = this.entries.get(productId)
    return entry && rangeCovers(entry.range, range) ? entry : null
  }

  async put(productId: string, range: DateRange, quotes: readonly Quote[]): Promise<CacheEntry> {
    this.puts++
    if (this.failPut) throw new CacheIOError('disk full', 'set')
    const entry = { productId, range, fetchedAt: NOW.toISOString(), quotes: [...quotes] }
    this.entries.set(productId, entry)
    return entry
  }
}

function fakeFetcher(impl: QuoteFetcher['fetchQuotes'] = async (product) => threeDayQuotes(product.id)) {
  return { fetchQuotes: vi.fn(impl) }
}

describe('QuoteService.getQuotes', () => {
  let cache: MemoryQuoteCache

  beforeEach(() => {
    cache = new MemoryQuoteCache()
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  it('fetches on a miss, stores the result and serves the next request from the cache', async () => {
    const fetcher = fakeFetcher()
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher, now: () => NOW })

    const first = await service.getQuotes('BGI', RANGE)
    expect(first.source).toBe('provider')
    expect(first.quotes).toEqual(threeDayQuotes())
    expect(cache.puts).toBe(1)

    const second = await service.getQuotes('BGI', RANGE)
    expect(second.source).toBe('cache')
    expect(second.quotes).toEqual(threeDayQuotes())
    expect(second.fetchedAt).toBe('2024-01-04T09:00:00.000Z')
    expect(fetcher.fetchQuotes).toHaveBeenCalledTimes(1)
  })

  it('returns only the requested days from a wider cached entry', async () => {
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher: fakeFetcher(), now: () => NOW })
    await service.getQuotes('BGI', RANGE)

    const narrow = await service.getQuotes('BGI', { start: '2024-01-02', end: '2024-01-02' })
    expect(narrow.source).toBe('cache')
    expect(narrow.quotes).toEqual([quote('2024-01-02', 12)])
  })

  it('bypasses the cache when fresh data is requested', async () => {
    const fetcher = fakeFetcher()
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher, now: () => NOW })
    await service.getQuotes('BGI', RANGE)

    const refreshed = await service.getQuotes('BGI', RANGE, { fresh: true })
    expect(refreshed.source).toBe('provider')
    expect(fetcher.fetchQuotes).toHaveBeenCalledTimes(2)
    expect(cache.puts).toBe(2)
  })

  it('fetches without caching when the cache cannot be read', async () => {
    cache.failGet = true
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher: fakeFetcher(), now: () => NOW })

    const result = await service.getQuotes('BGI', RANGE)
    expect(result).toMatchObject({ source: 'provider-uncached', fetchedAt: '2024-01-04T09:00:00.000Z' })
    expect(result.quotes).toEqual(threeDayQuotes())
    expect(cache.puts).toBe(0)
  })

  it('still returns the quotes when the cache cannot be written', async () => {
    cache.failPut = true
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher: fakeFetcher(), now: () => NOW })

    const result = await service.getQuotes('BGI', RANGE)
    expect(result.source).toBe('provider-uncached')
    expect(result.quotes).toEqual(threeDayQuotes())
  })

  it('treats a corrupt cache file as unusable and serves provider data', async () => {
    const { dir, cleanup } = await makeTempDir()
    try {
      await writeFile(path.join(dir, 'BGI.json'), 'garbage', 'utf-8')
      const fileCache = new FileQuoteCache({ dir, ttlSeconds: 3600, now: () => NOW })
      const service = new QuoteService({ catalog: testCatalog(), cache: fileCache, fetcher: fakeFetcher(), now: () => NOW })

      const result = await service.getQuotes('BGI', RANGE)
      expect(result.source).toBe('provider-uncached')
      expect(result.quotes).toEqual(threeDayQuotes())
    } finally {
      await cleanup()
    }
  })

  it('rejects products missing from the catalog without calling the provider', async () => {
    const fetcher = fakeFetcher()
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher })

    await expect(service.getQuotes('XXX', RANGE)).rejects.toBeInstanceOf(NotFoundError)
    expect(fetcher.fetchQuotes).not.toHaveBeenCalled()
  })

  it('propagates provider failures and caches nothing', async () => {
    const fetcher = fakeFetcher(async () => {
      throw new AuthError('COMMODITY_API_KEY is required', 'test-provider')
    })
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher })

    await expect(service.getQuotes('BGI', RANGE)).rejects.toBeInstanceOf(AuthError)
    expect(cache.puts).toBe(0)
  })

  it('caches an empty result', async () => {
    const service = new QuoteService({ catalog: testCatalog(), cache, fetcher: fakeFetcher(async () => []), now: () => NOW })

    expect((await service.getQuotes('BGI', RANGE)).quotes).toEqual([])
    expect((await service.getQuotes('BGI', RANGE)).source).toBe('cache')
  })
})

describe('QuoteService.getComparison', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  it('correlates the products that loaded and reports the ones that failed', async () => {
    const fetcher = fakeFetcher(async (product) => {
      if (product.id === 'MIL') throw new ProviderError('agro-quotes returned HTTP 500', 'agro-quotes', 500)
      return product.id === 'SOJ'
        ? [quote('2024-01-01', 20, 'SOJ'), quote('2024-01-02', 24, 'SOJ'), quote('2024-01-03', 22, 'SOJ')]
        : threeDayQuotes(product.id)
    })
    const service = new QuoteService({ catalog: testCatalog(), cache: new MemoryQuoteCache(), fetcher, now: () => NOW })

    const result = await service.getComparison(['BGI', 'SOJ', 'MIL'], RANGE)

    expect(result.errors).toEqual(['MIL: agro-quotes returned HTTP 500'])
    expect(Object.keys(result.quotes)).toEqual(['BGI', 'SOJ'])
    expect(result.correlation?.productIds).toEqual(['BGI', 'SOJ'])
    expect(result.correlation?.values[0]?.[1]).toBeCloseTo(1)
  })

  it('has no correlation when fewer than two products load', async () => {
    const service = new QuoteService({ catalog: testCatalog(), cache: new MemoryQuoteCache(), fetcher: fakeFetcher(), now: () => NOW })

    const result = await service.getComparison(['BGI', 'XXX'], RANGE)
    expect(result.correlation).toBeNull()
    expect(result.errors).toEqual(['XXX: Unknown product XXX'])
  })
})
