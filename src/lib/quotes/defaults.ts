/**
 * Query and analysis defaults. No Node imports: the dashboard page uses these
 * as well as the route handlers.
 */
export const QUOTE_DEFAULTS = {
  defaultRangeDays: 30,
  maxRangeDays: 90,
  defaultWindow: 7,
  movingAverageWindows: [7, 30, 90],
  changePeriods: 30,
  histogramBins: 20,
} as const
