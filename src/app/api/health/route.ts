import { NextResponse } from 'next/server'
import { getAppContext } from '@/lib/services/app-context'
import { getErrorMessage } from '@/lib/utils/errors'

export const runtime = 'nodejs'

export async function GET() {
  let services = { cache: false, provider: false, products: false }
  let message: string | undefined

  try {
    const ctx = await getAppContext()
    services = {
      cache: await ctx.cache.checkHealth(),
      provider: Boolean(ctx.config.provider.apiKey),
      products: ctx.catalog.products.length > 0,
    }
  } catch (error) {
    message = getErrorMessage(error)
  }

  const up = Object.values(services).filter(Boolean).length
  const status = up === 3 ? 'healthy' : up > 0 ? 'degraded' : 'unhealthy'

  return NextResponse.json(
    {
      status,
      timestamp: new Date().toISOString(),
      services,
      message,
      uptime: process.uptime(),
    },
    { status: status === 'healthy' ? 200 : 503 }
  )
}
