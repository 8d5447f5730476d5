import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ValidationError, getErrorMessage } from '@/lib/utils/errors'

export const ProductCategorySchema = z.enum(['livestock', 'grain', 'other'])

export const ProductSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_-]+$/),
  displayName: z.string().min(1),
  category: ProductCategorySchema,
  unit: z.string().min(1),
  providerCode: z.string().min(1),
})

export type ProductCategory = z.infer<typeof ProductCategorySchema>
export type Product = z.infer<typeof ProductSchema>

const ProductListSchema = z.array(ProductSchema).min(1)

/**
 * Read-only product reference list. Built once at startup and passed to the
 * components that need it.
 */
export interface ProductCatalog {
  readonly products: readonly Product[]
  get(id: string): Product | undefined
}

export function createProductCatalog(products: readonly Product[]): ProductCatalog {
  const byId = new Map<string, Product>()
  for (const product of products) {
    if (byId.has(product.id)) {
      throw new ValidationError(`Duplicate product id ${product.id}`, 'id')
    }
    byId.set(product.id, Object.freeze({ ...product }))
  }
  const frozen = Object.freeze([...byId.values()])

  return {
    products: frozen,
    get: (id) => byId.get(id),
  }
}

export function parseProductList(json: unknown): Product[] {
  const parsed = ProductListSchema.safeParse(json)
  if (!parsed.success) {
    throw new ValidationError('Invalid product list: ' + JSON.stringify(parsed.error.issues))
  }
  return parsed.data
}

export async function loadProductCatalog(filePath: string): Promise<ProductCatalog> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new ValidationError(`Cannot read product list at ${filePath}: ${getErrorMessage(error)}`)
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new ValidationError(`Product list at ${filePath} is not valid JSON: ${getErrorMessage(error)}`)
  }

  const catalog = createProductCatalog(parseProductList(json))
  console.log(`[products] loaded ${catalog.products.length} products from ${filePath}`)
  return catalog
}
