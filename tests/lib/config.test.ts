import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { CONFIG, loadRuntimeConfig } from '@/lib/config'
import { QUOTE_DEFAULTS } from '@/lib/quotes/defaults'
import { trailingRange } from '@/lib/utils/dates'
import { parseQuoteQuery } from '@/lib/utils/query'
import { ValidationError } from '@/lib/utils/errors'

describe('loadRuntimeConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadRuntimeConfig({})).toEqual({
      provider: { name: 'agro-quotes', baseUrl: 'https://api.example.com/agro', apiKey: undefined, timeoutMs: 10000 },
      cache: { dir: path.resolve('data/quote-cache'), ttlSeconds: 86400 },
      productsFile: path.resolve('src/data/products.json'),
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadRuntimeConfig({
      COMMODITY_API_KEY: ' test-secret ',
      COMMODITY_API_BASE_URL: 'https://quotes.test/api',
      QUOTE_CACHE_DIR: '/tmp/quotes',
      QUOTE_CACHE_TTL_SECONDS: '120',
    })
    expect(config.provider.apiKey).toBe('test-secret')
    expect(config.provider.baseUrl).toBe('https://quotes.test/api')
    expect(config.cache).toEqual({ dir: '/tmp/quotes', ttlSeconds: 120 })
  })

  it('treats a blank key as missing', () => {
    expect(loadRuntimeConfig({ COMMODITY_API_KEY: '   ' }).provider.apiKey).toBeUndefined()
  })

  it('rejects invalid values', () => {
    expect(() => loadRuntimeConfig({ QUOTE_CACHE_TTL_SECONDS: '-5' })).toThrow(ValidationError)
    expect(() => loadRuntimeConfig({ COMMODITY_API_BASE_URL: 'not a url' })).toThrow(ValidationError)
  })
})

describe('quote defaults', () => {
  it('are the same values the server configuration uses', () => {
    expect(CONFIG.quotes).toBe(QUOTE_DEFAULTS)
  })

  it('drive the query fallbacks', () => {
    const today = new Date(2024, 5, 15)
    expect(parseQuoteQuery(new URLSearchParams(), today)).toMatchObject({
      range: trailingRange(today, QUOTE_DEFAULTS.defaultRangeDays),
      window: QUOTE_DEFAULTS.defaultWindow,
    })
  })
})
