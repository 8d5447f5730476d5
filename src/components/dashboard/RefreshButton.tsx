'use client'

import { useQueryClient } from '@tanstack/react-query'
import { useState } from 'react'
import { quoteUrl } from '@/hooks/use-quotes'
import type { DateRange } from '@/lib/utils/dates'

interface RefreshButtonProps {
  productIds: string[]
  range: DateRange
  window: number
}

export function RefreshButton({ productIds, range, window }: RefreshButtonProps) {
  const queryClient = useQueryClient()
  const [isRefreshing, setIsRefreshing] = useState(false)

  const handleRefresh = async () => {
    setIsRefreshing(true)
    try {
      // fresh=1 bypasses the server cache and stores a new entry
      await Promise.allSettled(productIds.map((id) => fetch(quoteUrl(id, range, window, true), { cache: 'no-store' })))
      await queryClient.invalidateQueries({ queryKey: ['quotes'] })
    } finally {
      setIsRefreshing(false)
    }
  }

  return (
    <button
      onClick={() => void handleRefresh()}
      disabled={isRefreshing || productIds.length === 0}
      className="px-4 py-2 bg-blue-600 text-white rounded-md hover:bg-blue-700 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
    >
      {isRefreshing ? 'Refreshing...' : 'Refresh Data'}
    </button>
  )
}
