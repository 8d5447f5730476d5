import { describe, expect, it } from 'vitest'
import { aggregate, movingAverage, movingAverages, selectRange } from '@/lib/calculations/moving-average'
import { ValidationError } from '@/lib/utils/errors'
import { quote, threeDayQuotes } from '../../_utils/fixtures'

describe('aggregate', () => {
  it('computes a trailing two-day average', () => {
    const result = aggregate(threeDayQuotes(), 2)

    expect(result.series).toEqual([
      { date: '2024-01-01', price: 10 },
      { date: '2024-01-02', price: 12 },
      { date: '2024-01-03', price: 11 },
    ])
    expect(result.movingAverage).toEqual([
      { date: '2024-01-02', value: 11 },
      { date: '2024-01-03', value: 11.5 },
    ])
  })

  it('returns empty sequences for empty input', () => {
    expect(aggregate([], 7)).toEqual({ series: [], movingAverage: [] })
  })

  it('is deterministic for identical input', () => {
    const quotes = [quote('2024-01-01', 10.1), quote('2024-01-02', 10.2), quote('2024-01-03', 10.7), quote('2024-01-04', 9.9)]
    expect(aggregate(quotes, 3)).toEqual(aggregate(quotes, 3))
  })

  it('yields no average when the window is longer than the series', () => {
    const result = aggregate(threeDayQuotes(), 5)
    expect(result.series).toHaveLength(3)
    expect(result.movingAverage).toEqual([])
  })

  it('returns the prices themselves for a one-day window', () => {
    expect(aggregate(threeDayQuotes(), 1).movingAverage).toEqual([
      { date: '2024-01-01', value: 10 },
      { date: '2024-01-02', value: 12 },
      { date: '2024-01-03', value: 11 },
    ])
  })

  it('rejects a window that is not a positive integer', () => {
    expect(() => aggregate(threeDayQuotes(), 0)).toThrow(ValidationError)
    expect(() => aggregate(threeDayQuotes(), 1.5)).toThrow(ValidationError)
    expect(() => movingAverage([], -2)).toThrow(ValidationError)
  })

  it('does not modify its input', () => {
    const quotes = threeDayQuotes()
    const copy = structuredClone(quotes)
    aggregate(quotes, 2)
    expect(quotes).toEqual(copy)
  })
})

describe('selectRange', () => {
  it('keeps quotes inside the inclusive range', () => {
    const selected = selectRange(threeDayQuotes(), { start: '2024-01-02', end: '2024-01-03' })
    expect(selected.map((q) => q.date)).toEqual(['2024-01-02', '2024-01-03'])
  })

  it('returns nothing for a range outside the data', () => {
    expect(selectRange(threeDayQuotes(), { start: '2024-02-01', end: '2024-02-10' })).toEqual([])
  })
})

describe('movingAverages', () => {
  it('computes one series per window', () => {
    const result = movingAverages(threeDayQuotes(), [2, 3])
    expect(result[2]).toEqual([
      { date: '2024-01-02', value: 11 },
      { date: '2024-01-03', value: 11.5 },
    ])
    expect(result[3]).toEqual([{ date: '2024-01-03', value: 11 }])
  })
})
