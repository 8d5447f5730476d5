import path from 'node:path'
import { z } from 'zod'
import { QUOTE_DEFAULTS } from '@/lib/quotes/defaults'
import { ValidationError } from '@/lib/utils/errors'

export const CONFIG = {
  app: {
    name: 'Commodity Quotes Dashboard',
    description: 'Daily commodity price quotes with moving averages and local caching',
    version: '0.1.0',
  },
  api: {
    provider: {
      name: 'agro-quotes',
      baseUrl: 'https://api.example.com/agro',
      timeoutMs: 10_000,
    },
  },
  cache: {
    dir: 'data/quote-cache',
    ttlSeconds: 86400, // 24 hours
  },
  products: {
    file: 'src/data/products.json',
  },
  quotes: QUOTE_DEFAULTS,
  // No automatic refetch - manual refresh only via the Refresh button
} as const

const EnvSchema = z.object({
  COMMODITY_API_KEY: z.string().optional(),
  COMMODITY_API_BASE_URL: z.string().url().optional(),
  QUOTE_CACHE_DIR: z.string().min(1).optional(),
  QUOTE_CACHE_TTL_SECONDS: z.coerce.number().int().positive().optional(),
  PRODUCTS_FILE: z.string().min(1).optional(),
})

export interface RuntimeConfig {
  provider: {
    name: string
    baseUrl: string
    apiKey: string | undefined
    timeoutMs: number
  }
  cache: {
    dir: string
    ttlSeconds: number
  }
  productsFile: string
}

/**
 * Resolve runtime settings from the environment. Relative paths are resolved
 * against the working directory, which is the project root under `next dev`,
 * `next start` and the test runner.
 */
export function loadRuntimeConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(`Invalid environment: ${issue?.message ?? 'unknown issue'}`, issue?.path.join('.'))
  }
  const vars = parsed.data
  const apiKey = vars.COMMODITY_API_KEY?.trim() || undefined

  return {
    provider: {
      name: CONFIG.api.provider.name,
      baseUrl: vars.COMMODITY_API_BASE_URL ?? CONFIG.api.provider.baseUrl,
      apiKey,
      timeoutMs: CONFIG.api.provider.timeoutMs,
    },
    cache: {
      dir: path.resolve(vars.QUOTE_CACHE_DIR ?? CONFIG.cache.dir),
      ttlSeconds: vars.QUOTE_CACHE_TTL_SECONDS ?? CONFIG.cache.ttlSeconds,
    },
    productsFile: path.resolve(vars.PRODUCTS_FILE ?? CONFIG.products.file),
  }
}
