import { NextResponse } from 'next/server'
import { getAppContext } from '@/lib/services/app-context'
import { errorToResponse } from '@/lib/utils/errors'
import { parseProductIds, parseRangeParams } from '@/lib/utils/query'

export const runtime = 'nodejs'

export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url)
    const productIds = parseProductIds(searchParams.get('products'))
    const range = parseRangeParams(searchParams)
    const ctx = await getAppContext()

    const comparison = await ctx.quotes.getComparison(productIds, range)
    return NextResponse.json({ data: comparison })
  } catch (error) {
    console.error('Compare API error:', error)
    const { status, body } = errorToResponse(error)
    return NextResponse.json(body, { status })
  }
}
