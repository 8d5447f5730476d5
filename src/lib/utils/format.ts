import { format, parseISO } from 'date-fns'

const BRL = new Intl.NumberFormat('pt-BR', { style: 'currency', currency: 'BRL' })

/**
 * Format a quote price, e.g. `R$ 312,45 / @`
 */
export function formatPrice(value: number, unit?: string): string {
  const text = BRL.format(value)
  return unit ? `${text} / ${unit}` : text
}

/**
 * Format percentage
 */
export function formatPercentage(value: number | null, decimals: number = 2): string {
  if (value == null || !Number.isFinite(value)) return '—'
  const sign = value > 0 ? '+' : ''
  return `${sign}${value.toFixed(decimals)}%`
}

export function formatNumber(value: number | null, decimals: number = 2): string {
  if (value == null || !Number.isFinite(value)) return '—'
  return new Intl.NumberFormat('pt-BR', { minimumFractionDigits: decimals, maximumFractionDigits: decimals }).format(value)
}

/** `2024-01-15` → `15/01/2024` */
export function formatDay(day: string): string {
  return format(parseISO(day), 'dd/MM/yyyy')
}
