import { z } from 'zod'

export const QuoteSchema = z.object({
  productId: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  price: z.number().finite(),
  unit: z.string(),
})

export type Quote = z.infer<typeof QuoteSchema>

export const DateRangeSchema = z.object({
  start: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  end: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
})

export const CacheEntrySchema = z.object({
  productId: z.string().min(1),
  range: DateRangeSchema,
  fetchedAt: z.string().datetime(),
  quotes: z.array(QuoteSchema),
})

export type CacheEntry = z.infer<typeof CacheEntrySchema>

export interface PricePoint {
  date: string
  price: number
}

export interface ValuePoint {
  date: string
  value: number
}

export type QuoteSource = 'cache' | 'provider' | 'provider-uncached'
