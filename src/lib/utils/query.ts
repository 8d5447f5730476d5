import { z } from 'zod'
import { CONFIG } from '@/lib/config'
import { parseDateRange, trailingRange, type DateRange } from '@/lib/utils/dates'
import { ValidationError } from '@/lib/utils/errors'

const WindowSchema = z.coerce.number().int().min(1).max(CONFIG.quotes.maxRangeDays)

export interface QuoteQuery {
  range: DateRange
  window: number
  fresh: boolean
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid value'
}

/** Range from `start`/`end`, defaulting to the trailing window ending today. */
export function parseRangeParams(searchParams: URLSearchParams, today: Date = new Date()): DateRange {
  const fallback = trailingRange(today, CONFIG.quotes.defaultRangeDays)
  const start = searchParams.get('start') || fallback.start
  const end = searchParams.get('end') || fallback.end
  return parseDateRange(start, end, CONFIG.quotes.maxRangeDays)
}

export function parseQuoteQuery(searchParams: URLSearchParams, today: Date = new Date()): QuoteQuery {
  const rawWindow = searchParams.get('window')
  const window = WindowSchema.safeParse(rawWindow ?? CONFIG.quotes.defaultWindow)
  if (!window.success) {
    throw new ValidationError(`Invalid window: ${firstIssue(window.error)}`, 'window')
  }
  return {
    range: parseRangeParams(searchParams, today),
    window: window.data,
    fresh: searchParams.get('fresh') === '1',
  }
}

export function parseProductIds(value: string | null): string[] {
  const ids = (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
  const unique = [...new Set(ids)]
  if (unique.length < 2) {
    throw new ValidationError('Provide at least two comma-separated product ids', 'products')
  }
  return unique
}
