import type { Product } from '@/lib/products/catalog'
import type { Quote } from '@/lib/quotes/types'
import { normalizeQuotes } from '@/lib/quotes/normalize'
import { isIsoDay, isWithinRange, type DateRange } from '@/lib/utils/dates'
import { AuthError, NotFoundError, ProviderError, getErrorMessage } from '@/lib/utils/errors'
import { ProviderQuotesResponseSchema } from './types'

export type ParseResult = { kind: 'ok'; quotes: Quote[] } | { kind: 'parse-error'; message: string }

export interface QuoteFetcher {
  fetchQuotes(product: Product, range: DateRange): Promise<Quote[]>
}

export interface QuoteProviderOptions {
  name: string
  baseUrl: string
  apiKey: string | undefined
  timeoutMs: number
}

/**
 * Accepts numbers and numeric strings, including the `1.234,56` decimal-comma
 * form the provider uses for BRL prices.
 */
export function toPrice(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null

  let text = value.trim()
  if (!text) return null
  if (text.includes(',')) {
    text = text.replace(/\./g, '').replace(',', '.')
  }
  const n = Number(text)
  return Number.isFinite(n) ? n : null
}

/**
 * Validate a provider payload and turn it into quotes for `product` within
 * `range`. Rows without a usable price or date are dropped.
 */
export function parseQuotesResponse(json: unknown, product: Product, range: DateRange): ParseResult {
  const parsed = ProviderQuotesResponseSchema.safeParse(json)
  if (!parsed.success) {
    return { kind: 'parse-error', message: 'Invalid provider response: ' + JSON.stringify(parsed.error.issues) }
  }

  const quotes: Quote[] = []
  for (const row of parsed.data.cotacoes) {
    const date = row.data.slice(0, 10)
    const price = toPrice(row.preco)
    if (price == null || !isIsoDay(date) || !isWithinRange(date, range)) continue
    quotes.push({ productId: product.id, date, price, unit: row.unidade?.trim() || product.unit })
  }

  return { kind: 'ok', quotes: normalizeQuotes(quotes) }
}

export class QuoteProviderClient implements QuoteFetcher {
  private readonly name: string
  private readonly apiKey: string | undefined
  private readonly baseUrl: string
  private readonly timeoutMs: number

  constructor(options: QuoteProviderOptions) {
    this.name = options.name
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs
  }

  private ensureApiKey(): string {
    if (!this.apiKey) {
      throw new AuthError('COMMODITY_API_KEY is required', this.name)
    }
    return this.apiKey
  }

  /** Single attempt; callers decide how to surface failures. */
  async fetchQuotes(product: Product, range: DateRange): Promise<Quote[]> {
    const apiKey = this.ensureApiKey()
    const url = new URL(`${this.baseUrl}/cotacoes`)
    url.searchParams.set('produto', product.providerCode)
    url.searchParams.set('inicio', range.start)
    url.searchParams.set('fim', range.end)

    console.log(`[provider] fetching ${product.id} ${range.start}..${range.end}`)

    let res: Response
    try {
      res = await fetch(url.toString(), {
        headers: { Accept: 'application/json', Authorization: `Bearer ${apiKey}` },
        cache: 'no-store',
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      const reason = error instanceof Error && error.name === 'TimeoutError' ? `timed out after ${this.timeoutMs}ms` : getErrorMessage(error)
      throw new ProviderError(`Request to ${this.name} failed: ${reason}`, this.name, undefined, { cause: error })
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(`${this.name} rejected the API credential (HTTP ${res.status})`, this.name, res.status)
    }
    if (res.status === 404) {
      throw new NotFoundError(`${product.displayName} is not available from ${this.name}`, product.id)
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '')
      const msg = `${this.name} returned HTTP ${res.status}${text ? `: ${text.slice(0, 300)}` : ''}`
      throw new ProviderError(msg, this.name, res.status)
    }

    let json: unknown
    try {
      json = await res.json()
    } catch (error) {
      throw new ProviderError(`${this.name} returned a non-JSON body`, this.name, res.status, { cause: error })
    }

    const result = parseQuotesResponse(json, product, range)
    if (result.kind === 'parse-error') {
      throw new ProviderError(result.message, this.name, res.status)
    }
    console.log(`[provider] ${product.id}: ${result.quotes.length} quotes`)
    return result.quotes
  }
}
