import { differenceInCalendarDays, format, isValid, parseISO, subDays } from 'date-fns'
import { ValidationError } from '@/lib/utils/errors'

/** Inclusive calendar-day range, both ends as `YYYY-MM-DD`. */
export interface DateRange {
  start: string
  end: string
}

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/

export function isIsoDay(value: string): boolean {
  if (!ISO_DAY.test(value)) return false
  const parsed = parseISO(value)
  return isValid(parsed) && format(parsed, 'yyyy-MM-dd') === value
}

export function toIsoDay(date: Date): string {
  return format(date, 'yyyy-MM-dd')
}

/**
 * Validate a user-supplied range. Throws ValidationError on malformed days,
 * reversed bounds or a span longer than `maxDays`.
 */
export function parseDateRange(start: string, end: string, maxDays: number): DateRange {
  if (!isIsoDay(start)) throw new ValidationError(`Invalid start date: ${start}`, 'start')
  if (!isIsoDay(end)) throw new ValidationError(`Invalid end date: ${end}`, 'end')
  if (start > end) throw new ValidationError(`Start date ${start} is after end date ${end}`, 'start')

  const spanDays = differenceInCalendarDays(parseISO(end), parseISO(start)) + 1
  if (spanDays > maxDays) {
    throw new ValidationError(`Date range spans ${spanDays} days; the maximum is ${maxDays}`, 'end')
  }
  return { start, end }
}

/** Range of `days` calendar days ending on `today`. */
export function trailingRange(today: Date, days: number): DateRange {
  return { start: toIsoDay(subDays(today, days - 1)), end: toIsoDay(today) }
}

export function rangeCovers(outer: DateRange, inner: DateRange): boolean {
  return outer.start <= inner.start && inner.end <= outer.end
}

export function isWithinRange(day: string, range: DateRange): boolean {
  return range.start <= day && day <= range.end
}
