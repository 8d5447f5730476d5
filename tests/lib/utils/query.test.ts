import { describe, expect, it } from 'vitest'
import { ValidationError } from '@/lib/utils/errors'
import { parseProductIds, parseQuoteQuery } from '@/lib/utils/query'

const TODAY = new Date(2024, 0, 30)

describe('parseQuoteQuery', () => {
  it('defaults to the last 30 days with a 7-day window', () => {
    expect(parseQuoteQuery(new URLSearchParams(), TODAY)).toEqual({
      range: { start: '2024-01-01', end: '2024-01-30' },
      window: 7,
      fresh: false,
    })
  })

  it('reads explicit parameters', () => {
    const params = new URLSearchParams({ start: '2024-03-01', end: '2024-03-10', window: '3', fresh: '1' })
    expect(parseQuoteQuery(params, TODAY)).toEqual({
      range: { start: '2024-03-01', end: '2024-03-10' },
      window: 3,
      fresh: true,
    })
  })

  it.each(['0', '-1', '2.5', 'abc', '91'])('rejects window=%s', (window) => {
    expect(() => parseQuoteQuery(new URLSearchParams({ window }), TODAY)).toThrow(ValidationError)
  })

  it('rejects a range longer than 90 days', () => {
    const params = new URLSearchParams({ start: '2024-01-01', end: '2024-06-01' })
    expect(() => parseQuoteQuery(params, TODAY)).toThrow(ValidationError)
  })
})

describe('parseProductIds', () => {
  it('splits, trims and removes duplicates', () => {
    expect(parseProductIds('BGI, SOJ,BGI,')).toEqual(['BGI', 'SOJ'])
  })

  it('requires two distinct products', () => {
    expect(() => parseProductIds('BGI,BGI')).toThrow(ValidationError)
    expect(() => parseProductIds(null)).toThrow(ValidationError)
  })
})
