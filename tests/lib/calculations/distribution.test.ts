import { describe, expect, it } from 'vitest'
import { monthlyAverages, priceHistogram } from '@/lib/calculations/distribution'
import { ValidationError } from '@/lib/utils/errors'
import { quote } from '../../_utils/fixtures'

describe('priceHistogram', () => {
  it('counts prices into equal-width bins with the maximum in the last bin', () => {
    const quotes = [quote('2024-01-01', 10), quote('2024-01-02', 12), quote('2024-01-03', 11), quote('2024-01-04', 15)]
    const bins = priceHistogram(quotes, 5)

    expect(bins.map((b) => b.count)).toEqual([1, 1, 1, 0, 1])
    expect(bins[0]).toEqual({ from: 10, to: 11, count: 1 })
    expect(bins[4]).toEqual({ from: 14, to: 15, count: 1 })
  })

  it('uses a single bin when every price is the same', () => {
    const quotes = [quote('2024-01-01', 7), quote('2024-01-02', 7)]
    expect(priceHistogram(quotes, 10)).toEqual([{ from: 7, to: 7, count: 2 }])
  })

  it('returns no bins for no quotes', () => {
    expect(priceHistogram([], 10)).toEqual([])
  })

  it('rejects an invalid bin count', () => {
    expect(() => priceHistogram([quote('2024-01-01', 1)], 0)).toThrow(ValidationError)
  })
})

describe('monthlyAverages', () => {
  it('averages prices per calendar month', () => {
    const quotes = [quote('2024-01-30', 10), quote('2024-01-31', 12), quote('2024-02-01', 11)]
    expect(monthlyAverages(quotes)).toEqual([
      { month: '2024-01', average: 11, observations: 2 },
      { month: '2024-02', average: 11, observations: 1 },
    ])
  })
})
