// In-memory table model and cell helpers

import { AppError } from '../errors'
import type { CellValue, ColumnType, DataRow, Table } from '../types'

// =============================================================================
// CELLS
// =============================================================================

export function isNull(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value))
}

/**
 * Coerce an arbitrary row value into a table cell
 */
export function toCellValue(value: unknown): CellValue {
  if (isNull(value)) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value
  }
  return String(value)
}

/**
 * Parse a cell as a number. Booleans count as 0/1, dates never parse.
 */
export function parseNumber(value: CellValue): number | null {
  if (isNull(value)) return null
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed === '') return null
    const num = Number(trimmed)
    return Number.isNaN(num) ? null : num
  }
  return null
}

// Year-first dates with an optional time and zone: 2024-01-15, 2024/1/15 08:30, 2024-01-15T08:30:00.000Z
const DATE_PATTERN =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i

/**
 * Parse a cell as a date. Strings without a zone are read as UTC.
 */
export function parseDateValue(value: CellValue): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value
  }
  if (typeof value !== 'string') return null

  const match = DATE_PATTERN.exec(value.trim())
  if (!match) return null

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const hours = Number(match[4] ?? '0')
  const minutes = Number(match[5] ?? '0')
  const seconds = Number(match[6] ?? '0')
  const millis = Number((match[7] ?? '0').padEnd(3, '0'))
  const zone = match[8]

  if (hours > 23 || minutes > 59 || seconds > 59) return null

  let time = Date.UTC(year, month - 1, day, hours, minutes, seconds, millis)
  const check = new Date(time)
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null
  }

  if (zone && zone.toUpperCase() !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1
    const digits = zone.slice(1).replace(':', '')
    const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2))
    time -= sign * offsetMinutes * 60_000
  }

  return new Date(time)
}

/**
 * Identity key of a cell: equal keys mean equal values. Nulls share one key.
 */
export function cellKey(value: CellValue): string {
  if (isNull(value)) return '\u0000null'
  if (value instanceof Date) return `d:${value.getTime()}`
  if (typeof value === 'number') return `n:${value}`
  if (typeof value === 'boolean') return `b:${value}`
  return `s:${value}`
}

/**
 * Text form of a category, as stored in captured encoding maps
 */
export function categoryLabel(value: CellValue): string {
  if (value instanceof Date) return value.toISOString()
  return String(value)
}

function typeRank(value: CellValue): number {
  if (typeof value === 'boolean') return 0
  if (typeof value === 'number') return 1
  if (value instanceof Date) return 2
  return 3
}

/**
 * Total order over cells: nulls last, then by type, then by value
 */
export function compareCells(a: CellValue, b: CellValue): number {
  const aNull = isNull(a)
  const bNull = isNull(b)
  if (aNull || bNull) {
    return aNull === bNull ? 0 : aNull ? 1 : -1
  }

  const rankDiff = typeRank(a) - typeRank(b)
  if (rankDiff !== 0) return rankDiff

  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime()
  if (typeof a === 'number' && typeof b === 'number') return a - b

  const left = String(a)
  const right = String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

// =============================================================================
// COLUMN TYPES
// =============================================================================

export function detectColumnType(values: CellValue[]): ColumnType {
  let integers = 0
  let floats = 0
  let booleans = 0
  let dates = 0
  let strings = 0

  for (const value of values) {
    if (isNull(value)) continue
    if (typeof value === 'number') {
      if (Number.isInteger(value)) integers++
      else floats++
    } else if (typeof value === 'boolean') {
      booleans++
    } else if (value instanceof Date) {
      dates++
    } else {
      strings++
    }
  }

  const numbers = integers + floats
  const total = numbers + booleans + dates + strings
  if (total === 0) return 'empty'
  if (numbers === total) return floats > 0 ? 'float' : 'integer'
  if (booleans === total) return 'boolean'
  if (dates === total) return 'datetime'
  if (strings === total) return 'string'
  return 'mixed'
}

export function isNumericType(type: ColumnType): boolean {
  return type === 'integer' || type === 'float'
}

export function isTextType(type: ColumnType): boolean {
  return type === 'string' || type === 'mixed'
}

// =============================================================================
// TABLES
// =============================================================================

export function createTable(columns: string[], data: Record<string, CellValue[]>): Table {
  const first = columns[0]
  const expected = first === undefined ? 0 : (data[first] ?? []).length

  for (const column of columns) {
    const values = data[column]
    if (!values) {
      throw new AppError(`Column '${column}' has no values`, 'TABLE_SHAPE_ERROR', { column })
    }
    if (values.length !== expected) {
      throw new AppError(
        `Column '${column}' has ${values.length} values, expected ${expected}`,
        'TABLE_SHAPE_ERROR',
        { column }
      )
    }
  }

  const ownData: Record<string, CellValue[]> = {}
  for (const column of columns) {
    ownData[column] = data[column] ?? []
  }
  return { columns: [...columns], data: ownData }
}

/**
 * Build a table from row objects. Columns follow first-seen key order.
 */
export function tableFromRows(rows: DataRow[], columns?: string[]): Table {
  let names: string[]
  if (columns) {
    names = [...columns]
  } else {
    const allKeys = new Set<string>()
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        allKeys.add(key)
      }
    }
    names = Array.from(allKeys)
  }

  const data: Record<string, CellValue[]> = {}
  for (const name of names) {
    data[name] = rows.map(row => toCellValue(row[name]))
  }
  return { columns: names, data }
}

export function tableToRows(table: Table): DataRow[] {
  const count = rowCount(table)
  const rows: DataRow[] = []
  for (let i = 0; i < count; i++) {
    const row: DataRow = {}
    for (const column of table.columns) {
      row[column] = getColumn(table, column)[i] ?? null
    }
    rows.push(row)
  }
  return rows
}

export function rowCount(table: Table): number {
  const first = table.columns[0]
  if (first === undefined) return 0
  return (table.data[first] ?? []).length
}

export function hasColumn(table: Table, name: string): boolean {
  return table.columns.includes(name)
}

export function getColumn(table: Table, name: string): CellValue[] {
  const values = table.columns.includes(name) ? table.data[name] : undefined
  if (!values) {
    throw new AppError(`Column '${name}' not found`, 'COLUMN_NOT_FOUND', { column: name })
  }
  return values
}

export function cloneTable(table: Table): Table {
  const data: Record<string, CellValue[]> = {}
  for (const column of table.columns) {
    data[column] = [...getColumn(table, column)]
  }
  return { columns: [...table.columns], data }
}

/**
 * New table holding only the given row indices, in the given order
 */
export function selectRows(table: Table, indices: number[]): Table {
  const data: Record<string, CellValue[]> = {}
  for (const column of table.columns) {
    const values = getColumn(table, column)
    data[column] = indices.map(i => values[i] ?? null)
  }
  return { columns: [...table.columns], data }
}

export function filterRows(table: Table, keep: (index: number) => boolean): Table {
  const indices: number[] = []
  const count = rowCount(table)
  for (let i = 0; i < count; i++) {
    if (keep(i)) indices.push(i)
  }
  return selectRows(table, indices)
}

export function dropColumns(table: Table, names: string[]): Table {
  const dropped = new Set(names)
  const columns = table.columns.filter(c => !dropped.has(c))
  const data: Record<string, CellValue[]> = {}
  for (const column of columns) {
    data[column] = getColumn(table, column)
  }
  return { columns, data }
}

/**
 * Replace a column in place, or append it when new. Mutates the table.
 */
export function setColumn(table: Table, name: string, values: CellValue[]): void {
  if (table.columns.length > 0 && values.length !== rowCount(table)) {
    throw new AppError(
      `Column '${name}' has ${values.length} values, expected ${rowCount(table)}`,
      'TABLE_SHAPE_ERROR',
      { column: name }
    )
  }
  if (!table.columns.includes(name)) {
    table.columns.push(name)
  }
  table.data[name] = values
}

/**
 * Remove a column in place. Mutates the table.
 */
export function removeColumn(table: Table, name: string): void {
  table.columns = table.columns.filter(c => c !== name)
  delete table.data[name]
}

export function countNulls(table: Table): number {
  let total = 0
  for (const column of table.columns) {
    for (const value of getColumn(table, column)) {
      if (isNull(value)) total++
    }
  }
  return total
}

export function columnTypes(table: Table): Record<string, ColumnType> {
  const types: Record<string, ColumnType> = {}
  for (const column of table.columns) {
    types[column] = detectColumnType(getColumn(table, column))
  }
  return types
}
