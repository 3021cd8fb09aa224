// Feature transformation: fit once, replay with captured parameters, invert scaling

import log from '../logger'
import { TransformError, errorMessage } from '../errors'
import {
  cloneTable,
  detectColumnType,
  getColumn,
  hasColumn,
  isNumericType,
  isTextType,
  setColumn
} from '../table'
import { DATE_FEATURES, detectDateColumns, extractDateFeatures } from './dates'
import { ENCODING_METHODS, applyEncoding, fitEncoding } from './encoding'
import { SCALING_METHODS, applyScaling, fitScaling, invertScaling } from './scaling'
import type { CellValue, Table, TransformConfig, TransformOutput, TransformResult } from '../types'

export { isoWeek } from './dates'
export { createTimeSeriesFeatures } from './timeSeries'

const defaults: TransformConfig = {
  scalingMethod: 'none',
  scalingColumns: null,
  encodingMethod: 'label',
  encodingColumns: null,
  maxCategories: 50,
  ordinalOrder: {},
  extractDateFeatures: true,
  dateColumns: null,
  dateFeatures: ['year', 'month', 'day', 'dayofweek', 'quarter'],
  handleInfinity: true,
  infinityReplacement: null
}

export const DEFAULT_TRANSFORM_CONFIG: Readonly<TransformConfig> = Object.freeze(defaults)

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Fill defaults, copy every list and freeze
 */
export function createTransformConfig(overrides: Partial<TransformConfig> = {}): Readonly<TransformConfig> {
  const ordinalOrder: Record<string, string[]> = {}
  for (const [column, order] of Object.entries(overrides.ordinalOrder ?? {})) {
    ordinalOrder[column] = [...order]
  }

  const config: TransformConfig = {
    ...DEFAULT_TRANSFORM_CONFIG,
    ...overrides,
    scalingColumns: overrides.scalingColumns ? [...overrides.scalingColumns] : null,
    encodingColumns: overrides.encodingColumns ? [...overrides.encodingColumns] : null,
    dateColumns: overrides.dateColumns ? [...overrides.dateColumns] : null,
    dateFeatures: [...(overrides.dateFeatures ?? DEFAULT_TRANSFORM_CONFIG.dateFeatures)],
    ordinalOrder
  }

  if (!SCALING_METHODS.includes(config.scalingMethod)) {
    throw new TransformError(`Unknown scaling method '${config.scalingMethod}'`)
  }
  if (!ENCODING_METHODS.includes(config.encodingMethod)) {
    throw new TransformError(`Unknown encoding method '${config.encodingMethod}'`)
  }
  if (!Number.isInteger(config.maxCategories) || config.maxCategories < 1) {
    throw new TransformError(`maxCategories must be a positive integer, got ${config.maxCategories}`)
  }
  for (const feature of config.dateFeatures) {
    if (!DATE_FEATURES.includes(feature)) {
      throw new TransformError(`Unknown date feature '${feature}'`)
    }
  }

  return Object.freeze(config)
}

function snapshotConfig(config: Readonly<TransformConfig>): TransformConfig {
  const ordinalOrder: Record<string, string[]> = {}
  for (const [column, order] of Object.entries(config.ordinalOrder)) {
    ordinalOrder[column] = [...order]
  }
  return {
    ...config,
    scalingColumns: config.scalingColumns ? [...config.scalingColumns] : null,
    encodingColumns: config.encodingColumns ? [...config.encodingColumns] : null,
    dateColumns: config.dateColumns ? [...config.dateColumns] : null,
    dateFeatures: [...config.dateFeatures],
    ordinalOrder
  }
}

// =============================================================================
// STAGES
// =============================================================================

/**
 * Replace ±Infinity in numeric columns. Mutates the table.
 */
function replaceInfinity(table: Table, replacement: number | null): void {
  for (const column of table.columns) {
    const values = getColumn(table, column)
    if (!isNumericType(detectColumnType(values))) continue
    if (!values.some(v => v === Infinity || v === -Infinity)) continue
    setColumn(table, column, values.map(v => (v === Infinity || v === -Infinity ? replacement : v)))
  }
}

function categoricalColumns(table: Table, targetColumn: string | null): string[] {
  return table.columns.filter(
    column => column !== targetColumn && isTextType(detectColumnType(getColumn(table, column)))
  )
}

function numericColumns(table: Table): string[] {
  return table.columns.filter(column => isNumericType(detectColumnType(getColumn(table, column))))
}

function recordWarning(result: TransformResult, message: string): void {
  log.warn(`[TRANSFORM] ${message}`)
  result.warnings.push(message)
}

// =============================================================================
// FIT
// =============================================================================

/**
 * Learn every parameter from `table` and return the transformed copy plus the
 * result needed to replay or invert it. The input table is not mutated.
 */
export function fitTransform(
  table: Table,
  config: Partial<TransformConfig> = {},
  targetColumn: string | null = null
): TransformOutput {
  const settings = createTransformConfig(config)
  const current = cloneTable(table)

  const result: TransformResult = {
    originalColumns: [...table.columns],
    transformedColumns: [],
    newColumns: [],
    removedColumns: [],
    dateColumns: [],
    scalingParams: {},
    encodingMaps: {},
    transformationsApplied: [],
    warnings: [],
    config: snapshotConfig(settings)
  }

  if (settings.handleInfinity) {
    replaceInfinity(current, settings.infinityReplacement)
  }

  // Dates
  if (settings.extractDateFeatures) {
    const dateColumns = settings.dateColumns ?? detectDateColumns(current)
    for (const column of dateColumns) {
      if (!hasColumn(current, column)) continue
      try {
        extractDateFeatures(current, column, settings.dateFeatures)
        result.dateColumns.push(column)
        result.transformationsApplied.push(`date_features_${column}`)
      } catch (error) {
        recordWarning(result, `Date features for '${column}' failed: ${errorMessage(error)}`)
      }
    }
  }

  // Categorical encoding
  const encodingColumns = settings.encodingColumns ?? categoricalColumns(current, targetColumn)
  const method = settings.encodingMethod
  for (const column of encodingColumns) {
    if (!hasColumn(current, column)) continue
    if (method === 'target' && !targetColumn) continue
    try {
      const fitted = fitEncoding(column, getColumn(current, column), method, {
        maxCategories: settings.maxCategories,
        ordinalOrder: settings.ordinalOrder[column],
        target: method === 'target' && targetColumn ? getColumn(current, targetColumn) : undefined
      })
      const applied = applyEncoding(current, column, fitted.map)
      result.encodingMaps[column] = fitted.map
      result.transformationsApplied.push(`encode_${column}`)
      if (fitted.warning) recordWarning(result, fitted.warning)
      for (const warning of applied.warnings) recordWarning(result, warning)
    } catch (error) {
      recordWarning(result, `Encoding of '${column}' failed: ${errorMessage(error)}`)
    }
  }

  // Scaling
  const scalingMethod = settings.scalingMethod
  if (scalingMethod !== 'none') {
    const scalingColumns = settings.scalingColumns ?? numericColumns(current)
    for (const column of scalingColumns) {
      if (!hasColumn(current, column)) continue
      try {
        const values = getColumn(current, column)
        const params = fitScaling(column, values, scalingMethod)
        setColumn(current, column, applyScaling(column, values, params))
        result.scalingParams[column] = params
        result.transformationsApplied.push(`scale_${column}`)
      } catch (error) {
        recordWarning(result, `Scaling of '${column}' failed: ${errorMessage(error)}`)
      }
    }
  }

  const original = new Set(result.originalColumns)
  const final = new Set(current.columns)
  result.transformedColumns = [...current.columns]
  result.newColumns = current.columns.filter(column => !original.has(column))
  result.removedColumns = result.originalColumns.filter(column => !final.has(column))

  log.info(`[TRANSFORM] Applied ${result.transformationsApplied.length} transformations, ${result.warnings.length} warnings`)

  return { table: current, result }
}

// =============================================================================
// REPLAY & INVERSE
// =============================================================================

/**
 * Apply a fitted result to new data. Nothing is re-learned; columns the
 * result does not know are left as they are.
 */
export function transform(table: Table, result: TransformResult): Table {
  const settings = result.config
  const current = cloneTable(table)

  if (settings.handleInfinity) {
    replaceInfinity(current, settings.infinityReplacement)
  }

  if (settings.extractDateFeatures) {
    for (const column of result.dateColumns) {
      if (hasColumn(current, column)) {
        extractDateFeatures(current, column, settings.dateFeatures)
      }
    }
  }

  for (const [column, map] of Object.entries(result.encodingMaps)) {
    if (!hasColumn(current, column)) continue
    for (const warning of applyEncoding(current, column, map).warnings) {
      log.warn(`[TRANSFORM] ${warning}`)
    }
  }

  for (const [column, params] of Object.entries(result.scalingParams)) {
    if (!hasColumn(current, column)) continue
    try {
      setColumn(current, column, applyScaling(column, getColumn(current, column), params))
    } catch (error) {
      log.warn(`[TRANSFORM] Scaling of '${column}' skipped: ${errorMessage(error)}`)
    }
  }

  return current
}

/**
 * Undo the captured scaling of one column. Unknown columns come back unchanged.
 */
export function inverseTransformColumn(values: CellValue[], columnName: string, result: TransformResult): CellValue[] {
  if (!Object.prototype.hasOwnProperty.call(result.scalingParams, columnName)) return [...values]
  const params = result.scalingParams[columnName]
  return params ? invertScaling(values, params) : [...values]
}
