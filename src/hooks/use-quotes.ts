'use client'

import { useQuery, type UseQueryResult } from '@tanstack/react-query'
import type { CorrelationMatrix } from '@/lib/calculations/correlation'
import type { ExportFormat } from '@/lib/export/quotes-export'
import type { Product } from '@/lib/products/catalog'
import type { Quote } from '@/lib/quotes/types'
import type { QuoteView } from '@/lib/services/quote-view'
import type { DateRange } from '@/lib/utils/dates'

export interface QuoteViewResponse {
  data: QuoteView
  cached: boolean
  lastUpdated: string
}

export interface ComparisonData {
  range: DateRange
  correlation: CorrelationMatrix | null
  quotes: Record<string, Quote[]>
  errors: string[]
}

interface APIError {
  error?: string
  message?: string
}

async function readJson<T>(res: Response, fallbackMessage: string): Promise<T> {
  if (!res.ok) {
    const payload: APIError | null = await res.json().catch(() => null)
    throw new Error(payload?.message || fallbackMessage)
  }
  const json: T = await res.json()
  return json
}

function quoteParams(range: DateRange, extra: Record<string, string> = {}): string {
  return new URLSearchParams({ start: range.start, end: range.end, ...extra }).toString()
}

export function quoteUrl(productId: string, range: DateRange, window: number, fresh = false): string {
  const extra: Record<string, string> = { window: String(window) }
  if (fresh) extra.fresh = '1'
  return `/api/quotes/${encodeURIComponent(productId)}?${quoteParams(range, extra)}`
}

export function exportUrl(productId: string, range: DateRange, window: number, format: ExportFormat): string {
  return `/api/quotes/${encodeURIComponent(productId)}/export?${quoteParams(range, { window: String(window), format })}`
}

async function fetchProducts(): Promise<Product[]> {
  const res = await fetch('/api/products', { cache: 'no-store' })
  const json = await readJson<{ data: Product[] }>(res, 'Failed to load the product list')
  return json.data
}

async function fetchQuoteView(productId: string, range: DateRange, window: number): Promise<QuoteViewResponse> {
  const res = await fetch(quoteUrl(productId, range, window), { cache: 'no-store' })
  return readJson<QuoteViewResponse>(res, `Failed to load quotes for ${productId}`)
}

async function fetchComparison(productIds: string[], range: DateRange): Promise<ComparisonData> {
  const res = await fetch(`/api/quotes/compare?${quoteParams(range, { products: productIds.join(',') })}`, { cache: 'no-store' })
  const json = await readJson<{ data: ComparisonData }>(res, 'Failed to compare products')
  return json.data
}

// Quotes are daily; the server cache holds them for a day, so no background refetch
const STALE_TIME = 30 * 60 * 1000 // 30 minutes

export function useProducts(): UseQueryResult<Product[]> {
  return useQuery({
    queryKey: ['products'],
    queryFn: fetchProducts,
    staleTime: Infinity,
    refetchOnWindowFocus: false,
  })
}

export function useQuoteView(productId: string, range: DateRange, window: number): UseQueryResult<QuoteViewResponse> {
  return useQuery({
    queryKey: ['quotes', productId, range.start, range.end, window],
    queryFn: () => fetchQuoteView(productId, range, window),
    staleTime: STALE_TIME,
    refetchOnWindowFocus: false,
    // Provider failures are not retried automatically; the user refreshes
    retry: false,
  })
}

export function useComparison(productIds: string[], range: DateRange, enabled: boolean): UseQueryResult<ComparisonData> {
  return useQuery({
    queryKey: ['quotes', 'compare', productIds.join(','), range.start, range.end],
    queryFn: () => fetchComparison(productIds, range),
    enabled: enabled && productIds.length >= 2,
    staleTime: STALE_TIME,
    refetchOnWindowFocus: false,
    retry: false,
  })
}
