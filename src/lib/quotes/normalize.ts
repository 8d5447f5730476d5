import type { Quote } from './types'

/**
 * Sort ascending by date and drop duplicate dates; the last occurrence of a
 * date wins.
 */
export function normalizeQuotes(quotes: readonly Quote[]): Quote[] {
  const byDate = new Map<string, Quote>()
  for (const quote of quotes) {
    byDate.set(quote.date, quote)
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date))
}

export function isNormalized(quotes: readonly Quote[]): boolean {
  for (let i = 1; i < quotes.length; i++) {
    if (quotes[i - 1]!.date >= quotes[i]!.date) return false
  }
  return true
}
