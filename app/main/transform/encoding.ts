// Categorical encoding: fit a mapping once, apply it to any table

import { TransformError } from '../errors'
import {
  categoryLabel,
  compareCells,
  getColumn,
  isNull,
  removeColumn,
  setColumn
} from '../table'
import type { CellValue, EncodingMap, EncodingMethod, Table } from '../types'

export const ENCODING_METHODS: readonly EncodingMethod[] = ['label', 'onehot', 'ordinal', 'frequency', 'target']

export interface EncodingOptions {
  maxCategories: number
  ordinalOrder?: string[]
  target?: CellValue[]
}

export interface FittedEncoding {
  map: EncodingMap
  warning?: string
}

function hasCode(codes: Record<string, number>, label: string): boolean {
  return Object.prototype.hasOwnProperty.call(codes, label)
}

/**
 * Distinct non-null values in first-seen order
 */
function distinctValues(values: CellValue[]): CellValue[] {
  const seen = new Set<string>()
  const result: CellValue[] = []
  for (const value of values) {
    if (isNull(value)) continue
    const label = categoryLabel(value)
    if (!seen.has(label)) {
      seen.add(label)
      result.push(value)
    }
  }
  return result
}

function sortedLabels(values: CellValue[]): string[] {
  return distinctValues(values)
    .sort(compareCells)
    .map(categoryLabel)
}

function indexCodes(categories: string[]): Record<string, number> {
  return Object.fromEntries(categories.map((category, index) => [category, index]))
}

function fitLabel(values: CellValue[]): EncodingMap {
  const categories = distinctValues(values).map(categoryLabel)
  return { method: 'label', categories, codes: indexCodes(categories) }
}

function fitOrdinal(values: CellValue[], order?: string[]): EncodingMap {
  const categories = order ? [...order] : sortedLabels(values)
  return { method: 'ordinal', categories, codes: indexCodes(categories) }
}

function fitFrequency(values: CellValue[]): EncodingMap {
  const counts = new Map<string, number>()
  let total = 0
  for (const value of values) {
    if (isNull(value)) continue
    const label = categoryLabel(value)
    counts.set(label, (counts.get(label) ?? 0) + 1)
    total++
  }

  const categories = Array.from(counts.keys())
  const codes = Object.fromEntries(categories.map(label => [label, (counts.get(label) ?? 0) / total]))
  return { method: 'frequency', categories, codes }
}

function fitTarget(values: CellValue[], target: CellValue[]): EncodingMap {
  const sums = new Map<string, { sum: number; count: number }>()

  values.forEach((value, i) => {
    if (isNull(value)) return
    const targetValue = target[i] ?? null
    if (isNull(targetValue)) return
    if (typeof targetValue !== 'number') {
      throw new TransformError(`Target value '${String(targetValue)}' is not numeric`)
    }
    const label = categoryLabel(value)
    const entry = sums.get(label) ?? { sum: 0, count: 0 }
    entry.sum += targetValue
    entry.count++
    sums.set(label, entry)
  })

  const categories = Array.from(sums.keys())
  const codes = Object.fromEntries(
    categories.map(label => {
      const entry = sums.get(label)
      return [label, entry ? entry.sum / entry.count : 0]
    })
  )
  return { method: 'target', categories, codes }
}

/**
 * Learn the mapping for one column. One-hot falls back to label codes above
 * `maxCategories` and reports the fallback as a warning.
 */
export function fitEncoding(
  column: string,
  values: CellValue[],
  method: EncodingMethod,
  options: EncodingOptions
): FittedEncoding {
  switch (method) {
    case 'label':
      return { map: fitLabel(values) }
    case 'ordinal':
      return { map: fitOrdinal(values, options.ordinalOrder) }
    case 'frequency':
      return { map: fitFrequency(values) }
    case 'target':
      if (!options.target) {
        throw new TransformError(`Target encoding of '${column}' needs a target column`, column)
      }
      return { map: fitTarget(values, options.target) }
    case 'onehot': {
      const categories = sortedLabels(values)
      if (categories.length <= options.maxCategories) {
        return { map: { method: 'onehot', categories, codes: indexCodes(categories) } }
      }
      return {
        map: fitLabel(values),
        warning: `Column '${column}' has ${categories.length} categories, using label encoding instead of one-hot`
      }
    }
    default:
      throw new TransformError(`Unknown encoding method '${String(method)}'`, column)
  }
}

export interface AppliedEncoding {
  added: string[]
  warnings: string[]
}

/**
 * Apply a captured mapping to a column. Mutates the table.
 * Values missing from the mapping become null; one-hot rows get all-false.
 * A one-hot column whose name is already taken is skipped with a warning.
 */
export function applyEncoding(table: Table, column: string, map: EncodingMap): AppliedEncoding {
  const values = getColumn(table, column)
  const applied: AppliedEncoding = { added: [], warnings: [] }

  if (map.method === 'onehot') {
    const labels = values.map(value => (isNull(value) ? null : categoryLabel(value)))
    const taken = new Set(table.columns)
    for (const category of map.categories) {
      const name = `${column}_${category}`
      if (taken.has(name)) {
        applied.warnings.push(`Column '${name}' already exists, one-hot category '${category}' of '${column}' skipped`)
        continue
      }
      setColumn(table, name, labels.map(label => label === category))
      applied.added.push(name)
    }
    removeColumn(table, column)
    return applied
  }

  setColumn(table, column, values.map(value => {
    if (isNull(value)) return null
    const label = categoryLabel(value)
    return hasCode(map.codes, label) ? (map.codes[label] ?? null) : null
  }))
  return applied
}
