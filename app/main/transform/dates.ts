// Calendar features from date columns

import { TransformError } from '../errors'
import {
  detectColumnType,
  getColumn,
  isNull,
  isTextType,
  parseDateValue,
  setColumn
} from '../table'
import type { CellValue, DateFeature, Table } from '../types'

export const DATE_FEATURES: readonly DateFeature[] = [
  'year',
  'month',
  'day',
  'dayofweek',
  'quarter',
  'weekofyear',
  'hour',
  'is_weekend',
  'is_month_start',
  'is_month_end'
]

const DETECTION_SAMPLE = 10

/**
 * ISO-8601 week number (weeks start on Monday, week 1 holds the first Thursday)
 */
export function isoWeek(date: Date): number {
  const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
  const dayNum = d.getUTCDay() || 7
  d.setUTCDate(d.getUTCDate() + 4 - dayNum)
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1)
  return Math.ceil(((d.getTime() - yearStart) / 86_400_000 + 1) / 7)
}

// Monday = 0 ... Sunday = 6
function dayOfWeek(date: Date): number {
  return (date.getUTCDay() + 6) % 7
}

function daysInMonth(date: Date): number {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)).getUTCDate()
}

export function dateFeatureValue(date: Date | null, feature: DateFeature): number | null {
  if (!date) return null

  switch (feature) {
    case 'year':
      return date.getUTCFullYear()
    case 'month':
      return date.getUTCMonth() + 1
    case 'day':
      return date.getUTCDate()
    case 'dayofweek':
      return dayOfWeek(date)
    case 'quarter':
      return Math.floor(date.getUTCMonth() / 3) + 1
    case 'weekofyear':
      return isoWeek(date)
    case 'hour':
      return date.getUTCHours()
    case 'is_weekend':
      return dayOfWeek(date) >= 5 ? 1 : 0
    case 'is_month_start':
      return date.getUTCDate() === 1 ? 1 : 0
    case 'is_month_end':
      return date.getUTCDate() === daysInMonth(date) ? 1 : 0
    default:
      throw new TransformError(`Unknown date feature '${String(feature)}'`)
  }
}

/**
 * A column holds dates when its values are dates, or when it is textual and
 * every one of its first non-null values parses as a date.
 */
export function looksLikeDateColumn(values: CellValue[]): boolean {
  const type = detectColumnType(values)
  if (type === 'datetime') return true
  if (!isTextType(type)) return false

  const sample = values.filter(v => !isNull(v)).slice(0, DETECTION_SAMPLE)
  return sample.length > 0 && sample.every(v => parseDateValue(v) !== null)
}

export function detectDateColumns(table: Table): string[] {
  return table.columns.filter(column => looksLikeDateColumn(getColumn(table, column)))
}

/**
 * Convert a column to dates and append `{column}_{feature}` columns. Mutates the table.
 * Unparseable values become null, as do their features.
 */
export function extractDateFeatures(table: Table, column: string, features: readonly DateFeature[]): string[] {
  const dates = getColumn(table, column).map(value => parseDateValue(value))
  setColumn(table, column, dates)

  const added: string[] = []
  for (const feature of features) {
    const name = `${column}_${feature}`
    setColumn(table, name, dates.map(date => dateFeatureValue(date, feature)))
    added.push(name)
  }
  return added
}
