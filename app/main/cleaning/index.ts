// Data cleaning: text normalization, duplicates, nulls, outliers and retention

import log from '../logger'
import { DataCleaningError, errorMessage } from '../errors'
import {
  cellKey,
  cloneTable,
  compareCells,
  countNulls,
  detectColumnType,
  dropColumns,
  filterRows,
  getColumn,
  isNull,
  isNumericType,
  isTextType,
  rowCount,
  setColumn
} from '../table'
import {
  countTrue,
  iqrMask,
  max,
  mean,
  median,
  min,
  numericValues,
  quantile,
  sampleStd,
  zscoreMask
} from '../stats'
import type {
  CellValue,
  CleaningConfig,
  CleaningOutput,
  CleaningReport,
  KeepDuplicate,
  NullStrategy,
  OutlierColumnSummary,
  OutlierMethod,
  Table
} from '../types'

export const NULL_STRATEGIES: readonly NullStrategy[] = [
  'drop',
  'fill_zero',
  'fill_mean',
  'fill_median',
  'fill_mode',
  'fill_forward',
  'fill_backward',
  'fill_interpolate'
]

const OUTLIER_METHODS: readonly OutlierMethod[] = ['zscore', 'iqr']
const KEEP_OPTIONS: readonly KeepDuplicate[] = ['first', 'last', 'none']

const defaults: CleaningConfig = {
  removeDuplicates: true,
  duplicateSubset: null,
  keepDuplicate: 'first',
  handleNulls: true,
  nullStrategy: 'drop',
  nullThreshold: 0.5,
  requiredColumns: [],
  detectOutliers: true,
  outlierMethod: 'zscore',
  outlierThreshold: 3.0,
  iqrMultiplier: 1.5,
  removeOutliers: false,
  normalizeText: true,
  stripWhitespace: true,
  lowercaseText: false,
  minRetentionRate: 0.7
}

export const DEFAULT_CLEANING_CONFIG: Readonly<CleaningConfig> = Object.freeze(defaults)

// =============================================================================
// CONFIGURATION
// =============================================================================

function checkFraction(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new DataCleaningError(`${name} must be between 0 and 1, got ${value}`)
  }
}

/**
 * Fill defaults and freeze. Throws on values no cleaning run could honour.
 */
export function createCleaningConfig(overrides: Partial<CleaningConfig> = {}): Readonly<CleaningConfig> {
  const config: CleaningConfig = {
    ...DEFAULT_CLEANING_CONFIG,
    ...overrides,
    duplicateSubset: overrides.duplicateSubset ? [...overrides.duplicateSubset] : null,
    requiredColumns: [...(overrides.requiredColumns ?? DEFAULT_CLEANING_CONFIG.requiredColumns)]
  }

  if (!NULL_STRATEGIES.includes(config.nullStrategy)) {
    throw new DataCleaningError(`Unknown null strategy '${config.nullStrategy}'`)
  }
  if (!OUTLIER_METHODS.includes(config.outlierMethod)) {
    throw new DataCleaningError(`Unknown outlier method '${config.outlierMethod}'`)
  }
  if (!KEEP_OPTIONS.includes(config.keepDuplicate)) {
    throw new DataCleaningError(`Unknown duplicate keep option '${config.keepDuplicate}'`)
  }
  checkFraction('nullThreshold', config.nullThreshold)
  checkFraction('minRetentionRate', config.minRetentionRate)
  if (!(config.outlierThreshold > 0)) {
    throw new DataCleaningError(`outlierThreshold must be positive, got ${config.outlierThreshold}`)
  }
  if (!(config.iqrMultiplier >= 0)) {
    throw new DataCleaningError(`iqrMultiplier must not be negative, got ${config.iqrMultiplier}`)
  }

  return Object.freeze(config)
}

function emptyReport(table: Table): CleaningReport {
  return {
    originalRows: rowCount(table),
    originalColumns: table.columns.length,
    cleanedRows: 0,
    cleanedColumns: 0,
    duplicatesFound: 0,
    duplicatesRemoved: 0,
    nullsFound: 0,
    nullsHandled: 0,
    columnsDroppedNulls: [],
    outliersDetected: 0,
    outliersRemoved: 0,
    outlierDetails: {},
    retentionRate: 0,
    meetsRetentionRequirement: true,
    warnings: [],
    errors: []
  }
}

// =============================================================================
// STAGES
// =============================================================================

export function normalizeText(table: Table, config: Readonly<CleaningConfig>): Table {
  const result = cloneTable(table)

  for (const column of result.columns) {
    const values = getColumn(result, column)
    if (!isTextType(detectColumnType(values))) continue

    setColumn(result, column, values.map(value => {
      if (typeof value !== 'string') return value
      let text = config.stripWhitespace ? value.trim() : value
      if (config.lowercaseText) text = text.toLowerCase()
      // Only blanks that stripping produced become null
      if (config.stripWhitespace && value !== '' && text === '') return null
      return text
    }))
  }

  return result
}

export function removeDuplicates(
  table: Table,
  config: Readonly<CleaningConfig>,
  report: CleaningReport
): Table {
  const subset = config.duplicateSubset ?? table.columns
  const missing = subset.filter(c => !table.columns.includes(c))
  if (missing.length > 0) {
    throw new DataCleaningError(`Duplicate subset columns not found: ${missing.join(', ')}`, missing[0] ?? null)
  }

  const subsetValues = subset.map(c => getColumn(table, c))
  const keys: string[] = []
  for (let i = 0; i < rowCount(table); i++) {
    keys.push(subsetValues.map(values => cellKey(values[i] ?? null)).join('\u0001'))
  }

  const firstIndex = new Map<string, number>()
  const lastIndex = new Map<string, number>()
  const counts = new Map<string, number>()
  keys.forEach((key, i) => {
    if (!firstIndex.has(key)) firstIndex.set(key, i)
    lastIndex.set(key, i)
    counts.set(key, (counts.get(key) ?? 0) + 1)
  })

  const before = rowCount(table)
  const result = filterRows(table, i => {
    const key = keys[i] ?? ''
    if (config.keepDuplicate === 'first') return firstIndex.get(key) === i
    if (config.keepDuplicate === 'last') return lastIndex.get(key) === i
    return counts.get(key) === 1
  })

  report.duplicatesFound = before - rowCount(result)
  report.duplicatesRemoved = report.duplicatesFound

  if (report.duplicatesRemoved > 0) {
    log.info(`[CLEANING] Duplicates removed: ${report.duplicatesRemoved}`)
  }

  return result
}

export function dropHighNullColumns(
  table: Table,
  config: Readonly<CleaningConfig>,
  report: CleaningReport
): Table {
  const total = rowCount(table)
  if (total === 0) return table

  const toDrop = table.columns.filter(column => {
    if (config.requiredColumns.includes(column)) return false
    const nulls = getColumn(table, column).filter(v => isNull(v)).length
    return nulls / total > config.nullThreshold
  })

  if (toDrop.length === 0) return table

  report.columnsDroppedNulls = toDrop
  report.warnings.push(`Columns dropped for excess nulls: ${toDrop.join(', ')}`)
  log.warn(`[CLEANING] Columns dropped for excess nulls: ${toDrop.join(', ')}`)

  return dropColumns(table, toDrop)
}

function fillWith(values: CellValue[], fill: CellValue): CellValue[] {
  return values.map(v => (isNull(v) ? fill : v))
}

function forwardFill(values: CellValue[]): CellValue[] {
  let last: CellValue = null
  return values.map(v => {
    if (isNull(v)) return last
    last = v
    return v
  })
}

function backwardFill(values: CellValue[]): CellValue[] {
  return forwardFill([...values].reverse()).reverse()
}

function interpolateLinear(values: CellValue[]): CellValue[] {
  const result = [...values]
  let previous = -1

  values.forEach((value, i) => {
    if (typeof value !== 'number' || isNull(value)) return
    if (previous >= 0 && i - previous > 1) {
      const start = values[previous]
      if (typeof start === 'number') {
        const step = (value - start) / (i - previous)
        for (let j = previous + 1; j < i; j++) {
          result[j] = start + step * (j - previous)
        }
      }
    }
    previous = i
  })

  return result
}

function modeOf(values: CellValue[]): CellValue {
  const counts = new Map<string, { value: CellValue; count: number }>()
  for (const value of values) {
    if (isNull(value)) continue
    const key = cellKey(value)
    const entry = counts.get(key)
    if (entry) entry.count++
    else counts.set(key, { value, count: 1 })
  }

  let best: { value: CellValue; count: number } | null = null
  for (const entry of counts.values()) {
    if (
      best === null ||
      entry.count > best.count ||
      (entry.count === best.count && compareCells(entry.value, best.value) < 0)
    ) {
      best = entry
    }
  }
  return best ? best.value : null
}

export function handleNulls(
  table: Table,
  config: Readonly<CleaningConfig>,
  report: CleaningReport
): Table {
  report.nullsFound = countNulls(table)
  const strategy = config.nullStrategy

  if (strategy === 'drop') {
    const before = rowCount(table)
    const columns = table.columns.map(c => getColumn(table, c))
    const result = filterRows(table, i => columns.every(values => !isNull(values[i])))
    report.nullsHandled = before - rowCount(result)
    if (report.nullsHandled > 0) {
      log.info(`[CLEANING] Rows dropped for nulls: ${report.nullsHandled}`)
    }
    return result
  }

  const result = cloneTable(table)

  for (const column of result.columns) {
    const values = getColumn(result, column)
    const numeric = isNumericType(detectColumnType(values))
    let filled: CellValue[]

    switch (strategy) {
      case 'fill_zero':
        filled = fillWith(values, 0)
        break
      case 'fill_mean':
        filled = fillWith(numeric ? fillWith(values, mean(numericValues(values))) : values, '')
        break
      case 'fill_median':
        filled = fillWith(numeric ? fillWith(values, median(numericValues(values))) : values, '')
        break
      case 'fill_mode':
        filled = fillWith(values, modeOf(values))
        break
      case 'fill_forward':
        filled = forwardFill(values)
        break
      case 'fill_backward':
        filled = backwardFill(values)
        break
      case 'fill_interpolate':
        filled = backwardFill(forwardFill(numeric ? interpolateLinear(values) : values))
        break
      default:
        filled = values
    }

    setColumn(result, column, filled)
  }

  report.nullsHandled = report.nullsFound - countNulls(result)
  if (report.nullsHandled > 0) {
    log.info(`[CLEANING] Null values handled: ${report.nullsHandled}`)
  }

  return result
}

function outlierMask(values: CellValue[], config: Readonly<CleaningConfig>): boolean[] {
  return config.outlierMethod === 'zscore'
    ? zscoreMask(values, config.outlierThreshold)
    : iqrMask(values, config.iqrMultiplier)
}

export function handleOutliers(
  table: Table,
  config: Readonly<CleaningConfig>,
  report: CleaningReport
): Table {
  const flagged = new Array<boolean>(rowCount(table)).fill(false)
  let total = 0

  for (const column of table.columns) {
    const values = getColumn(table, column)
    if (!isNumericType(detectColumnType(values))) continue

    const mask = outlierMask(values, config)
    const count = countTrue(mask)
    if (count > 0) {
      report.outlierDetails[column] = count
      total += count
      mask.forEach((flag, i) => {
        if (flag) flagged[i] = true
      })
    }
  }

  report.outliersDetected = total

  if (config.removeOutliers && total > 0) {
    const result = filterRows(table, i => !flagged[i])
    report.outliersRemoved = rowCount(table) - rowCount(result)
    log.info(`[CLEANING] Outlier rows removed: ${report.outliersRemoved}`)
    return result
  }

  return table
}

// =============================================================================
// CLEANING RUN
// =============================================================================

/**
 * Run every enabled cleaning stage in order. The input table is left untouched.
 * A stage that fails is recorded in report.errors and skipped.
 */
export function cleanTable(table: Table, config: Partial<CleaningConfig> = {}): CleaningOutput {
  const settings = createCleaningConfig(config)
  const report = emptyReport(table)

  let current = cloneTable(table)

  const runStage = (name: string, stage: (input: Table) => Table): void => {
    try {
      current = stage(current)
    } catch (error) {
      report.errors.push(`${name}: ${errorMessage(error)}`)
      log.error(`[CLEANING] Stage '${name}' failed:`, errorMessage(error))
    }
  }

  if (settings.normalizeText) {
    runStage('normalize_text', input => normalizeText(input, settings))
  }
  if (settings.removeDuplicates) {
    runStage('remove_duplicates', input => removeDuplicates(input, settings, report))
  }
  runStage('drop_high_null_columns', input => dropHighNullColumns(input, settings, report))
  if (settings.handleNulls) {
    runStage('handle_nulls', input => handleNulls(input, settings, report))
  }
  if (settings.detectOutliers) {
    runStage('handle_outliers', input => handleOutliers(input, settings, report))
  }

  report.cleanedRows = rowCount(current)
  report.cleanedColumns = current.columns.length
  report.retentionRate = report.originalRows > 0 ? report.cleanedRows / report.originalRows : 1.0
  report.meetsRetentionRequirement = report.retentionRate >= settings.minRetentionRate

  if (!report.meetsRetentionRequirement) {
    const message =
      `Retention rate (${(report.retentionRate * 100).toFixed(1)}%) is below ` +
      `the required minimum (${(settings.minRetentionRate * 100).toFixed(0)}%)`
    report.warnings.push(message)
    log.warn(`[CLEANING] ${message}`)
  }

  log.info(
    `[CLEANING] ${report.cleanedRows}/${report.originalRows} rows kept (${(report.retentionRate * 100).toFixed(1)}%)`
  )

  return { table: current, report }
}

/**
 * Per numeric column statistics with z-score and IQR outlier counts
 */
export function getOutlierSummary(
  table: Table,
  config: Partial<CleaningConfig> = {}
): Record<string, OutlierColumnSummary> {
  const settings = createCleaningConfig(config)
  const summary: Record<string, OutlierColumnSummary> = {}

  for (const column of table.columns) {
    const values = getColumn(table, column)
    if (!isNumericType(detectColumnType(values))) continue

    const nums = numericValues(values)
    if (nums.length === 0) continue

    const zscore = zscoreMask(nums, settings.outlierThreshold)
    const iqr = iqrMask(nums, settings.iqrMultiplier)
    const q1 = quantile(nums, 0.25)
    const q3 = quantile(nums, 0.75)

    summary[column] = {
      count: nums.length,
      mean: mean(nums),
      std: sampleStd(nums),
      min: min(nums),
      max: max(nums),
      q1,
      q3,
      iqr: q3 - q1,
      zscoreOutliers: countTrue(zscore),
      iqrOutliers: countTrue(iqr),
      outlierValuesZscore: nums.filter((_, i) => zscore[i]).slice(0, 10)
    }
  }

  return summary
}
