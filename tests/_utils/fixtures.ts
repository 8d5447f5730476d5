import { mkdtemp, rm } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { createProductCatalog, type Product, type ProductCatalog } from '@/lib/products/catalog'
import type { Quote } from '@/lib/quotes/types'

export const BOI_GORDO: Product = {
  id: 'BGI',
  displayName: 'Boi Gordo',
  category: 'livestock',
  unit: '@',
  providerCode: 'boi-gordo',
}

export const SOJA: Product = {
  id: 'SOJ',
  displayName: 'Soja',
  category: 'grain',
  unit: 'sc 60kg',
  providerCode: 'soja',
}

export const MILHO: Product = {
  id: 'MIL',
  displayName: 'Milho',
  category: 'grain',
  unit: 'sc 60kg',
  providerCode: 'milho',
}

export function testCatalog(): ProductCatalog {
  return createProductCatalog([BOI_GORDO, SOJA, MILHO])
}

export function quote(date: string, price: number, productId = 'BGI', unit = '@'): Quote {
  return { productId, date, price, unit }
}

/** `[(2024-01-01, 10), (2024-01-02, 12), (2024-01-03, 11)]` */
export function threeDayQuotes(productId = 'BGI'): Quote[] {
  return [quote('2024-01-01', 10, productId), quote('2024-01-02', 12, productId), quote('2024-01-03', 11, productId)]
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'quote-cache-test-'))
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) }
}
