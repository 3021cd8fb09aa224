// Time-series features: lags, rolling statistics, differences and percent changes

import log from '../logger'
import { TransformError } from '../errors'
import { getColumn, hasColumn, isNull, parseDateValue, selectRows, setColumn } from '../table'
import { mean, sampleStd } from '../stats'
import type { CellValue, Table, TimeSeriesConfig } from '../types'

export const DEFAULT_LAGS: readonly number[] = [1, 7, 30]
export const DEFAULT_ROLLING_WINDOWS: readonly number[] = [7, 30]

const DIFF_PERIODS = [1, 7]

function checkPeriods(name: string, periods: readonly number[]): void {
  for (const period of periods) {
    if (!Number.isInteger(period) || period < 1) {
      throw new TransformError(`${name} must be positive integers, got ${period}`)
    }
  }
}

function numericSeries(column: string, values: CellValue[]): Array<number | null> {
  return values.map(value => {
    if (isNull(value)) return null
    if (typeof value !== 'number') {
      throw new TransformError(`Column '${column}' holds non-numeric value '${String(value)}'`, column)
    }
    return value
  })
}

/**
 * Row order by date. Rows whose date is missing or unparseable go last;
 * ties keep their original order.
 */
function dateOrder(values: CellValue[]): number[] {
  const times = values.map(value => parseDateValue(value)?.getTime() ?? null)
  return values
    .map((_, index) => index)
    .sort((a, b) => {
      const ta = times[a] ?? null
      const tb = times[b] ?? null
      if (ta === null || tb === null) {
        return ta === tb ? a - b : ta === null ? 1 : -1
      }
      return ta - tb || a - b
    })
}

function shift(series: Array<number | null>, period: number): Array<number | null> {
  return series.map((_, i) => (i >= period ? series[i - period] ?? null : null))
}

/**
 * Window statistic over the last `window` rows, from the first non-null observation
 */
function rolling(
  series: Array<number | null>,
  window: number,
  statistic: (values: number[]) => number
): CellValue[] {
  return series.map((_, i) => {
    const observed: number[] = []
    for (const value of series.slice(Math.max(0, i - window + 1), i + 1)) {
      if (value !== null) observed.push(value)
    }
    if (observed.length === 0) return null
    const result = statistic(observed)
    return Number.isNaN(result) ? null : result
  })
}

function diff(series: Array<number | null>, period: number): CellValue[] {
  const previous = shift(series, period)
  return series.map((value, i) => {
    const before = previous[i] ?? null
    return value === null || before === null ? null : value - before
  })
}

function pctChange(series: Array<number | null>, period: number): CellValue[] {
  const previous = shift(series, period)
  return series.map((value, i) => {
    const before = previous[i] ?? null
    if (value === null || before === null || before === 0) return null
    return value / before - 1
  })
}

/**
 * Sort the table by `dateColumn` and append features of `valueColumn`:
 * `_lag_N`, `_rolling_mean_N`, `_rolling_std_N`, `_diff_1`, `_diff_7`,
 * `_pct_change_1` and `_pct_change_7`. Returns a new table.
 */
export function createTimeSeriesFeatures(table: Table, config: TimeSeriesConfig): Table {
  const { dateColumn, valueColumn } = config
  const lags = config.lags ?? DEFAULT_LAGS
  const windows = config.rollingWindows ?? DEFAULT_ROLLING_WINDOWS

  for (const column of [dateColumn, valueColumn]) {
    if (!hasColumn(table, column)) {
      throw new TransformError(`Column '${column}' not found`, column)
    }
  }
  checkPeriods('lags', lags)
  checkPeriods('rollingWindows', windows)

  const result = selectRows(table, dateOrder(getColumn(table, dateColumn)))
  const series = numericSeries(valueColumn, getColumn(result, valueColumn))
  const before = result.columns.length

  for (const lag of lags) {
    setColumn(result, `${valueColumn}_lag_${lag}`, shift(series, lag))
  }

  for (const window of windows) {
    setColumn(result, `${valueColumn}_rolling_mean_${window}`, rolling(series, window, mean))
    setColumn(result, `${valueColumn}_rolling_std_${window}`, rolling(series, window, sampleStd))
  }

  for (const period of DIFF_PERIODS) {
    setColumn(result, `${valueColumn}_diff_${period}`, diff(series, period))
  }
  for (const period of DIFF_PERIODS) {
    setColumn(result, `${valueColumn}_pct_change_${period}`, pctChange(series, period))
  }

  log.info(`[TRANSFORM] Added ${result.columns.length - before} time-series features for '${valueColumn}'`)
  return result
}
