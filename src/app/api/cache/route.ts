import { NextResponse } from 'next/server'
import { getAppContext } from '@/lib/services/app-context'
import { errorToResponse } from '@/lib/utils/errors'

export const runtime = 'nodejs'

/** Drop one product's cache entry (`?product=ID`) or the whole cache. */
export async function DELETE(request: Request) {
  try {
    const { searchParams } = new URL(request.url)
    const productId = searchParams.get('product')
    const ctx = await getAppContext()

    if (productId) {
      ctx.quotes.requireProduct(productId)
      await ctx.cache.delete(productId)
      return NextResponse.json({ cleared: 1 })
    }
    const cleared = await ctx.cache.clear()
    return NextResponse.json({ cleared })
  } catch (error) {
    console.error('Cache API error:', error)
    const { status, body } = errorToResponse(error)
    return NextResponse.json(body, { status })
  }
}
