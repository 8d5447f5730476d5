import { NextResponse } from 'next/server'
import { getAppContext } from '@/lib/services/app-context'
import { errorToResponse } from '@/lib/utils/errors'

export const runtime = 'nodejs'

export async function GET() {
  try {
    const { catalog } = await getAppContext()
    return NextResponse.json({ data: catalog.products })
  } catch (error) {
    console.error('Products API error:', error)
    const { status, body } = errorToResponse(error)
    return NextResponse.json(body, { status })
  }
}
