/**
 * Freshness of cached quotes and sanity checks on a quote series.
 */

import { differenceInCalendarDays, parseISO } from 'date-fns'
import type { Quote } from '@/lib/quotes/types'

export type DataFreshnessStatus = 'live' | 'delayed' | 'stale' | 'error'

export interface DataFreshnessInfo {
  status: DataFreshnessStatus
  ageInMinutes: number
  ageInHours: number
  timestamp: string
  formattedAge: string
  isStale: boolean
  warningMessage?: string
}

/** Upper bounds, in minutes, for `live` and `delayed`. */
export interface FreshnessThresholds {
  readonly live: number
  readonly delayed: number
}

export interface ValidationResult {
  isValid: boolean
  errors: string[]
  warnings: string[]
}

const LIVE_MINUTES = 60

/** Quotes count as stale once they outlive the cache TTL. */
export function thresholdsForTtl(ttlSeconds: number): FreshnessThresholds {
  const delayed = Math.max(1, Math.floor(ttlSeconds / 60))
  return { live: Math.min(LIVE_MINUTES, delayed), delayed }
}

function classify(ageInMinutes: number, thresholds: FreshnessThresholds): DataFreshnessStatus {
  if (ageInMinutes < 0) return 'error'
  if (ageInMinutes <= thresholds.live) return 'live'
  if (ageInMinutes <= thresholds.delayed) return 'delayed'
  return 'stale'
}

export function calculateDataFreshness(timestamp: string, thresholds: FreshnessThresholds, now: Date = new Date()): DataFreshnessInfo {
  const fetchedAt = Date.parse(timestamp)
  if (Number.isNaN(fetchedAt)) {
    return {
      status: 'error',
      ageInMinutes: NaN,
      ageInHours: NaN,
      timestamp,
      formattedAge: 'unknown',
      isStale: true,
      warningMessage: `Invalid timestamp: ${timestamp}`,
    }
  }

  const ageInMinutes = Math.floor((now.getTime() - fetchedAt) / 60_000)
  const status = classify(ageInMinutes, thresholds)
  const formattedAge = formatAge(ageInMinutes)

  let warningMessage: string | undefined
  if (status === 'error') warningMessage = 'Quote timestamp is in the future; check the system clock'
  if (status === 'stale') warningMessage = `Data was fetched ${formattedAge} and may be outdated`

  return {
    status,
    ageInMinutes,
    ageInHours: Math.floor(ageInMinutes / 60),
    timestamp,
    formattedAge,
    isStale: status === 'stale' || status === 'error',
    warningMessage,
  }
}

const AGE_UNITS: ReadonlyArray<[suffix: string, minutes: number]> = [
  ['y', 60 * 24 * 360],
  ['mo', 60 * 24 * 30],
  ['d', 60 * 24],
  ['h', 60],
  ['m', 1],
]

/** Largest whole unit, e.g. `3h ago`. */
export function formatAge(ageInMinutes: number): string {
  if (ageInMinutes < 1) return 'just now'
  for (const [suffix, minutes] of AGE_UNITS) {
    if (ageInMinutes >= minutes) return `${Math.floor(ageInMinutes / minutes)}${suffix} ago`
  }
  return 'just now'
}

/**
 * Prices must be positive. Calendar gaps longer than `maxGapDays` are
 * reported as warnings, since markets close for holidays.
 */
export function validateQuoteSeries(quotes: readonly Quote[], maxGapDays: number = 7): ValidationResult {
  const errors = quotes.filter((q) => q.price <= 0).map((q) => `Non-positive price ${q.price} on ${q.date}`)
  const warnings: string[] = []

  quotes.forEach((q, i) => {
    const prev = quotes[i - 1]
    if (!prev) return
    const gap = differenceInCalendarDays(parseISO(q.date), parseISO(prev.date))
    if (gap > maxGapDays) warnings.push(`No quotes between ${prev.date} and ${q.date} (${gap} days)`)
  })

  return { isValid: errors.length === 0, errors, warnings }
}

const STATUS_CLASSES: Record<DataFreshnessStatus, string> = {
  live: 'text-green-600 dark:text-green-400 bg-green-50 dark:bg-green-900/20',
  delayed: 'text-yellow-600 dark:text-yellow-400 bg-yellow-50 dark:bg-yellow-900/20',
  stale: 'text-red-600 dark:text-red-400 bg-red-50 dark:bg-red-900/20',
  error: 'text-gray-600 dark:text-gray-400 bg-gray-50 dark:bg-gray-900/20',
}

const STATUS_LABELS: Record<DataFreshnessStatus, string> = {
  live: 'Fresh',
  delayed: 'Cached',
  stale: 'Stale',
  error: 'Error',
}

export function getFreshnessColorClass(status: DataFreshnessStatus): string {
  return STATUS_CLASSES[status]
}

export function getFreshnessLabel(status: DataFreshnessStatus): string {
  return STATUS_LABELS[status]
}
