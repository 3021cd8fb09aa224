// Column profiling and data-quality scoring

import { cellKey, detectColumnType, getColumn, isNull, isNumericType, parseDateValue, rowCount } from '../table'
import { countTrue, zscoreMask } from '../stats'
import type { CellValue, ColumnInfo, ColumnType, QualityMetric, QualityReport, SuggestedType, Table } from '../types'

const SAMPLE_SIZE = 3
const DATE_SAMPLE_SIZE = 10
const DATE_RATIO = 0.7
const OUTLIER_ZSCORE = 3

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

function distinctCount(values: CellValue[]): number {
  const keys = new Set<string>()
  for (const value of values) {
    if (!isNull(value)) keys.add(cellKey(value))
  }
  return keys.size
}

function mostlyDates(values: CellValue[]): boolean {
  const sample = values.filter(v => !isNull(v)).slice(0, DATE_SAMPLE_SIZE)
  if (sample.length === 0) return false
  const dates = sample.filter(v => parseDateValue(v) !== null).length
  return dates / sample.length > DATE_RATIO
}

function suggestType(type: ColumnType, values: CellValue[]): SuggestedType {
  if (isNumericType(type) || type === 'boolean') return 'numeric'
  if (type === 'datetime') return 'datetime'
  return mostlyDates(values) ? 'datetime' : 'string'
}

// =============================================================================
// PROFILING
// =============================================================================

export function profileColumn(values: CellValue[]): ColumnInfo {
  const dtype = detectColumnType(values)
  const nullCount = values.filter(isNull).length

  return {
    dtype,
    nullCount,
    nullPercentage: values.length === 0 ? 0 : round2((nullCount / values.length) * 100),
    uniqueCount: distinctCount(values),
    sampleValues: values.filter(v => !isNull(v)).slice(0, SAMPLE_SIZE),
    suggestedType: suggestType(dtype, values)
  }
}

export function profileTable(table: Table): Record<string, ColumnInfo> {
  const info: Record<string, ColumnInfo> = {}
  for (const column of table.columns) {
    info[column] = profileColumn(getColumn(table, column))
  }
  return info
}

// =============================================================================
// QUALITY
// =============================================================================

/**
 * Weighted score: 60% cell completeness, 40% share of distinct rows. 0 for an empty table.
 */
export function qualityScore(table: Table): number {
  const rows = rowCount(table)
  const cells = rows * table.columns.length
  if (rows === 0 || cells === 0) return 0

  let nulls = 0
  const rowKeys = new Set<string>()
  for (let i = 0; i < rows; i++) {
    const parts: string[] = []
    for (const column of table.columns) {
      const value = getColumn(table, column)[i] ?? null
      if (isNull(value)) nulls++
      parts.push(cellKey(value))
    }
    rowKeys.add(JSON.stringify(parts))
  }

  const completeness = (1 - nulls / cells) * 100
  const uniqueness = (rowKeys.size / rows) * 100
  return round2(completeness * 0.6 + uniqueness * 0.4)
}

export function buildQualityReport(table: Table): QualityReport {
  const rows = rowCount(table)
  const metrics: QualityMetric[] = []
  const issues: string[] = []
  const recommendations: string[] = []

  for (const column of table.columns) {
    const values = getColumn(table, column)
    const nulls = values.filter(isNull).length
    const completeness = rows === 0 ? 100 : (1 - nulls / rows) * 100
    const uniqueness = rows === 0 ? 0 : (distinctCount(values) / rows) * 100
    const outliers = isNumericType(detectColumnType(values))
      ? countTrue(zscoreMask(values, OUTLIER_ZSCORE))
      : 0

    metrics.push({
      column,
      completeness: round2(completeness),
      uniqueness: round2(uniqueness),
      validity: round2(completeness),
      outliersCount: outliers
    })

    if (completeness < 90) {
      issues.push(`Column '${column}' has ${(100 - completeness).toFixed(1)}% null values`)
    }
    if (outliers > 0) {
      issues.push(`Column '${column}' has ${outliers} outlier values`)
    }
  }

  const overallScore = qualityScore(table)
  if (overallScore < 70) {
    recommendations.push('Consider reviewing the data source')
  }
  if (metrics.some(m => m.completeness < 80)) {
    recommendations.push('Some columns have many missing values')
  }

  let validRows = 0
  for (let i = 0; i < rows; i++) {
    if (table.columns.every(column => !isNull(getColumn(table, column)[i] ?? null))) validRows++
  }

  return { overallScore, totalRows: rows, validRows, metrics, issues, recommendations }
}
