import { describe, expect, it } from 'vitest'
import { correlationMatrix, pearsonCorrelation } from '@/lib/calculations/correlation'
import { ValidationError } from '@/lib/utils/errors'
import { quote } from '../../_utils/fixtures'

const DATES = ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04']

function series(productId: string, prices: number[]) {
  return prices.map((p, i) => quote(DATES[i] ?? '2024-12-31', p, productId))
}

describe('pearsonCorrelation', () => {
  it('is 1 for proportional series and -1 for mirrored ones', () => {
    expect(pearsonCorrelation([1, 2, 3, 4], [2, 4, 6, 8])).toBe(1)
    expect(pearsonCorrelation([1, 2, 3, 4], [4, 3, 2, 1])).toBe(-1)
  })

  it('is NaN when one series is constant', () => {
    expect(pearsonCorrelation([1, 2, 3], [5, 5, 5])).toBeNaN()
    expect(pearsonCorrelation([312.45, 312.45, 312.45, 312.45], [10, 12, 11, 13])).toBeNaN()
  })

  it('is NaN for mismatched or too short input', () => {
    expect(pearsonCorrelation([1], [1])).toBeNaN()
    expect(pearsonCorrelation([1, 2], [1, 2, 3])).toBeNaN()
  })
})

describe('correlationMatrix', () => {
  it('correlates every pair of products', () => {
    const matrix = correlationMatrix(
      new Map([
        ['BGI', series('BGI', [1, 2, 3, 4])],
        ['SOJ', series('SOJ', [2, 4, 6, 8])],
        ['MIL', series('MIL', [4, 3, 2, 1])],
      ])
    )

    expect(matrix.productIds).toEqual(['BGI', 'SOJ', 'MIL'])
    expect(matrix.commonDates).toBe(4)
    expect(matrix.values).toEqual([
      [1, 1, -1],
      [1, 1, -1],
      [-1, -1, 1],
    ])
  })

  it('only uses dates every product has', () => {
    const soja = series('SOJ', [2, 4, 6, 8]).filter((q) => q.date !== '2024-01-04')
    const matrix = correlationMatrix(
      new Map([
        ['BGI', series('BGI', [1, 2, 3, 100])],
        ['SOJ', soja],
      ])
    )
    expect(matrix.commonDates).toBe(3)
    expect(matrix.values[0]?.[1]).toBe(1)
  })

  it('leaves pairs undefined without two common dates', () => {
    const matrix = correlationMatrix(
      new Map([
        ['BGI', [quote('2024-01-01', 10, 'BGI')]],
        ['SOJ', [quote('2024-01-01', 20, 'SOJ')]],
      ])
    )
    expect(matrix.values).toEqual([
      [null, null],
      [null, null],
    ])
  })

  it('leaves pairs with a flat series undefined', () => {
    const flat = [312.45, 312.45, 312.45].map((p, i) => quote(DATES[i] ?? '2024-12-31', p, 'BEZ'))
    const matrix = correlationMatrix(
      new Map([
        ['BEZ', flat],
        ['SOJ', series('SOJ', [130, 131, 129])],
      ])
    )
    expect(matrix.values).toEqual([
      [null, null],
      [null, 1],
    ])
  })

  it('requires at least two products', () => {
    expect(() => correlationMatrix(new Map([['BGI', series('BGI', [1, 2])]]))).toThrow(ValidationError)
  })
})
